import path from "node:path";
import { resolveOptions, type MetadataOptions } from "../config.js";
import { detectFormat, fileTypeFor, type DocumentInput } from "../doctype.js";
import { extract, TesseractOcrEngine, type OcrEngine } from "../extractors/index.js";
import { logger as defaultLogger, type Logger } from "../logger.js";
import {
  analyze,
  detectLanguage,
  keywords,
  loadLanguageModel,
  sections,
  type Analysis,
  type Entity,
  type LanguageDetector,
  type LanguageModel,
} from "../nlp/index.js";
import { tryCatch } from "../result.js";

export interface MetadataRecord {
  filename: string;
  file_type: string;
  language: string;
  author: string | null;
  created_at: string | null;
  word_count: number;
  reading_time_minutes: number;
  title: string;
  keywords: string[];
  summary: string;
  sections: string[];
  entities: Entity[];
}

export interface MetadataDeps {
  logger: Logger;
  ocr: OcrEngine;
  loadModel: () => Promise<LanguageModel>;
  detectLanguage?: LanguageDetector;
}

export function defaultMetadataDeps(logger: Logger = defaultLogger): MetadataDeps {
  return {
    logger,
    ocr: new TesseractOcrEngine(logger),
    loadModel: loadLanguageModel,
  };
}

const ELLIPSIS = "…";
const UNTITLED = "Untitled";

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export function readingTimeMinutes(wordCount: number, wordsPerMinute: number): number {
  return wordCount === 0 ? 0 : Math.ceil(wordCount / wordsPerMinute);
}

/**
 * The lines before the first blank line, joined on one line and truncated
 * to `maxWords` words. Text that opens with a blank line has no title
 * block and falls back to the filename stem, then to "Untitled".
 */
export function deriveTitle(text: string, filename: string, maxWords: number): string {
  const lines: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed) break;
    lines.push(trimmed);
  }

  const words = lines.join(" ").split(/\s+/).filter(Boolean);
  if (words.length > 0) {
    return words.length > maxWords ? `${words.slice(0, maxWords).join(" ")}${ELLIPSIS}` : words.join(" ");
  }

  const stem = path.basename(filename, path.extname(filename)).trim();
  return stem || UNTITLED;
}

async function analyzeText(text: string, options: MetadataOptions, deps: MetadataDeps): Promise<Analysis> {
  const model = await tryCatch(deps.loadModel);
  if (!model.ok) {
    deps.logger.warn({ err: model.error }, "language model unavailable, skipping summary and entities");
    return {
      keywords: keywords(text, options.maxKeywords),
      summary: "",
      sections: sections(text),
      entities: [],
    };
  }
  return analyze(text, options, model.value);
}

/**
 * Runs the whole pipeline on one document. Only invalid options reject
 * (with ConfigError); unreadable documents produce a record with empty
 * content.
 */
export async function generateMetadata(
  document: DocumentInput,
  overrides: Partial<MetadataOptions> = {},
  deps: MetadataDeps = defaultMetadataDeps(),
): Promise<MetadataRecord> {
  const options = resolveOptions(overrides);
  const startedAt = Date.now();

  const format = detectFormat(document);
  const content = await extract(document.bytes, format, {
    ocr: deps.ocr,
    logger: deps.logger,
    ocrSettings: {
      minTextLength: options.ocrMinTextLength,
      dpi: options.ocrDpi,
      timeoutMs: options.ocrTimeoutMs,
    },
  });

  const wordCount = countWords(content.text);
  const analysis = await analyzeText(content.text, options, deps);

  const record: MetadataRecord = {
    filename: document.filename,
    file_type: fileTypeFor(format, document),
    language: detectLanguage(content.text, deps.logger, deps.detectLanguage),
    author: content.author,
    created_at: content.createdAt,
    word_count: wordCount,
    reading_time_minutes: readingTimeMinutes(wordCount, options.wordsPerMinute),
    title: deriveTitle(content.text, document.filename, options.titleMaxWords),
    ...analysis,
  };

  deps.logger.info(
    {
      filename: document.filename,
      format,
      bytes: document.bytes.length,
      textLength: content.text.length,
      wordCount,
      keywords: record.keywords.length,
      sections: record.sections.length,
      entities: record.entities.length,
      durationMs: Date.now() - startedAt,
    },
    "metadata generated",
  );

  return record;
}
