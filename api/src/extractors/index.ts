import type { DocumentFormat } from "../doctype.js";
import { extractDocx } from "./docx.js";
import { extractPdf } from "./pdf.js";
import { extractTxt } from "./text.js";
import { EMPTY_CONTENT, type ExtractedContent, type ExtractorDeps } from "./types.js";

/**
 * Text and embedded properties for a document of the given format. Never
 * rejects: unreadable input of any format yields empty text and null
 * properties.
 */
export async function extract(
  bytes: Buffer,
  format: DocumentFormat,
  deps: ExtractorDeps,
): Promise<ExtractedContent> {
  try {
    switch (format) {
      case "txt":
        return extractTxt(bytes);
      case "docx":
        return await extractDocx(bytes, deps.logger);
      case "pdf":
        return await extractPdf(bytes, deps);
      case "unknown":
      default:
        deps.logger.info({ format }, "unsupported document format, skipping extraction");
        return { ...EMPTY_CONTENT };
    }
  } catch (err) {
    deps.logger.error({ err, format }, "extraction failed unexpectedly");
    return { ...EMPTY_CONTENT };
  }
}

export * from "./types.js";
export { shouldUseOcr, TesseractOcrEngine, type OcrEngine, type OcrRequest } from "./ocr.js";
export { parsePdfDate, normalizeIsoDate } from "./dates.js";
