import type { Command } from "commander";
import fs from "node:fs/promises";
import path from "node:path";
import { detectFormat, extract, logger as pipelineLogger, resolveOptions, TesseractOcrEngine, type OcrEngine } from "docmeta-api";
import { logger } from "../lib/logger.js";
import { parseCount } from "../lib/options.js";

interface TextOptions {
  chars?: string;
}

interface TextCommandDeps {
  ocr?: OcrEngine;
}

export const DEFAULT_PREVIEW_CHARS = 500;

export function preview(text: string, chars: number): string {
  return text.length > chars ? `${text.slice(0, chars)}…` : text;
}

/**
 * Prints the extracted text (cut to `--chars`) followed by the embedded
 * author and creation date.
 */
export async function cmdText(file: string, options: TextOptions, deps: TextCommandDeps = {}): Promise<void> {
  const chars = parseCount(options.chars, "--chars") ?? DEFAULT_PREVIEW_CHARS;
  const settings = resolveOptions();

  const bytes = await fs.readFile(file);
  const filename = path.basename(file);
  const format = detectFormat({ filename, bytes });

  const content = await extract(bytes, format, {
    ocr: deps.ocr ?? new TesseractOcrEngine(pipelineLogger),
    logger: pipelineLogger,
    ocrSettings: {
      minTextLength: settings.ocrMinTextLength,
      dpi: settings.ocrDpi,
      timeoutMs: settings.ocrTimeoutMs,
    },
  });

  logger.info(`Format:   ${format}`);
  logger.info(`Author:   ${content.author ?? "-"}`);
  logger.info(`Created:  ${content.createdAt ?? "-"}`);
  logger.info(`Length:   ${content.text.length} characters`);
  logger.info("");
  logger.info(preview(content.text, chars));
}

export function registerTextCommand(program: Command): void {
  program
    .command("text")
    .description("Preview the text and embedded properties extracted from a file")
    .argument("<file>", "Document to read")
    .option("--chars <n>", "Number of characters to show", String(DEFAULT_PREVIEW_CHARS))
    .action(async (file: string, options: TextOptions) => {
      await cmdText(file, options);
    });
}
