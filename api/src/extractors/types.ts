import type { Logger } from "../logger.js";
import type { OcrEngine } from "./ocr.js";

export interface ExtractedContent {
  /** Extracted text; "" when nothing could be read, never absent. */
  text: string;
  author: string | null;
  /** ISO-8601 creation date from the document's embedded properties. */
  createdAt: string | null;
}

export interface EmbeddedProperties {
  author: string | null;
  createdAt: string | null;
}

export const EMPTY_CONTENT: Readonly<ExtractedContent> = Object.freeze({
  text: "",
  author: null,
  createdAt: null,
});

export const NO_PROPERTIES: Readonly<EmbeddedProperties> = Object.freeze({
  author: null,
  createdAt: null,
});

export interface OcrSettings {
  minTextLength: number;
  dpi: number;
  timeoutMs: number;
}

export interface ExtractorDeps {
  ocr: OcrEngine;
  logger: Logger;
  ocrSettings: OcrSettings;
}
