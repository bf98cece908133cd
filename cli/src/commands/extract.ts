import type { Command } from "commander";
import fs from "node:fs/promises";
import path from "node:path";
import { generateMetadata, type MetadataDeps, type MetadataRecord } from "docmeta-api";
import { postMetadata } from "../lib/api-client.js";
import { getDefaultApiUrl } from "../lib/env.js";
import { logger } from "../lib/logger.js";
import { parseCount } from "../lib/options.js";

interface ExtractOptions {
  maxKeywords?: string;
  maxSentences?: string;
  /** A URL, or true when `--api` is given without one. */
  api?: string | boolean;
  compact?: boolean;
}

interface ExtractCommandDeps {
  metadataDeps?: MetadataDeps;
}

export async function cmdExtract(
  file: string,
  options: ExtractOptions,
  deps: ExtractCommandDeps = {},
): Promise<MetadataRecord> {
  const maxKeywords = parseCount(options.maxKeywords, "--max-keywords");
  const maxSummarySentences = parseCount(options.maxSentences, "--max-sentences");

  const bytes = await fs.readFile(file);
  const filename = path.basename(file);

  const api = options.api === true ? getDefaultApiUrl() : options.api || undefined;

  const record = api
    ? await postMetadata(api, {
        filename,
        content: bytes.toString("base64"),
        maxKeywords,
        maxSummarySentences,
      })
    : await generateMetadata({ filename, bytes }, { maxKeywords, maxSummarySentences }, deps.metadataDeps);

  logger.info(options.compact ? JSON.stringify(record) : JSON.stringify(record, null, 2));
  return record;
}

export function registerExtractCommand(program: Command): void {
  program
    .command("extract")
    .description("Extract metadata from a .txt, .docx or .pdf file and print it as JSON")
    .argument("<file>", "Document to process")
    .option("--max-keywords <n>", "Maximum number of keywords")
    .option("--max-sentences <n>", "Maximum number of summary sentences")
    .option(
      "--api [url]",
      "Send the file to a running docmeta service instead of processing locally (default: $DOCMETA_URL or http://localhost:8080)",
    )
    .option("--compact", "Print JSON on a single line")
    .action(async (file: string, options: ExtractOptions) => {
      await cmdExtract(file, options);
    });
}
