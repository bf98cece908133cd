import { extractText, getDocumentProxy, getMeta } from "unpdf";
import { errorMessage } from "../errors.js";
import { Ok, tryCatch, type Result } from "../result.js";
import { parsePdfDate } from "./dates.js";
import { shouldUseOcr, withTimeout } from "./ocr.js";
import { EMPTY_CONTENT, NO_PROPERTIES, type EmbeddedProperties, type ExtractedContent, type ExtractorDeps } from "./types.js";

export interface PdfTextLayer {
  text: string;
  pageCount: number;
  properties: EmbeddedProperties;
}

export type PdfTextLayerReader = (bytes: Buffer) => Promise<Result<PdfTextLayer>>;

function stringField(info: object, key: string): string | null {
  const value: unknown = Reflect.get(info, key);
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function propertiesFromInfo(info: unknown): EmbeddedProperties {
  if (typeof info !== "object" || info === null) {
    return { ...NO_PROPERTIES };
  }

  const creationDate = stringField(info, "CreationDate");
  return {
    author: stringField(info, "Author"),
    createdAt: creationDate ? parsePdfDate(creationDate) : null,
  };
}

/**
 * Reads the text layer of every page (joined with newlines) and the
 * document-info dictionary. A broken info dictionary only costs the
 * properties.
 */
export async function readPdfTextLayer(bytes: Buffer): Promise<Result<PdfTextLayer>> {
  return tryCatch(async () => {
    const pdf = await getDocumentProxy(new Uint8Array(bytes));

    try {
      const { totalPages, text } = await extractText(pdf, { mergePages: false });
      const meta = await tryCatch(() => getMeta(pdf));

      return {
        text: text.join("\n").normalize("NFC"),
        pageCount: totalPages,
        properties: meta.ok ? propertiesFromInfo(meta.value.info) : { ...NO_PROPERTIES },
      };
    } finally {
      await pdf.destroy();
    }
  });
}

async function runOcr(bytes: Buffer, deps: ExtractorDeps): Promise<Result<string>> {
  const { dpi, timeoutMs } = deps.ocrSettings;
  let timedOut = false;

  const work = deps.ocr.recognize(bytes, { dpi });
  work.catch((err: unknown) => {
    if (timedOut) {
      deps.logger.debug({ err }, "abandoned ocr run failed");
    }
  });

  const result = await tryCatch(() => withTimeout(work, timeoutMs));
  if (!result.ok) {
    timedOut = result.error.name === "OcrTimeoutError";
    return result;
  }
  return Ok(result.value.normalize("NFC"));
}

/**
 * Text-layer extraction with the scanned-document fallback: when the
 * trimmed text layer is shorter than `ocrSettings.minTextLength` the whole
 * document is OCR'd and the recognized text replaces the text layer. If OCR
 * fails the text layer is kept. A PDF that cannot be opened yields empty
 * content without an OCR attempt.
 */
export async function extractPdf(
  bytes: Buffer,
  deps: ExtractorDeps,
  readLayer: PdfTextLayerReader = readPdfTextLayer,
): Promise<ExtractedContent> {
  const layer = await readLayer(bytes);
  if (!layer.ok) {
    deps.logger.warn({ err: layer.error }, "pdf could not be read");
    return { ...EMPTY_CONTENT };
  }

  const { text, pageCount, properties } = layer.value;
  if (!shouldUseOcr(text, deps.ocrSettings.minTextLength)) {
    return { text, ...properties };
  }

  deps.logger.info(
    { pageCount, textLayerLength: text.trim().length, threshold: deps.ocrSettings.minTextLength },
    "pdf text layer too short, running ocr",
  );

  const recognized = await runOcr(bytes, deps);
  if (!recognized.ok) {
    deps.logger.warn({ reason: errorMessage(recognized.error) }, "ocr failed, keeping text layer");
    return { text, ...properties };
  }

  return { text: recognized.value, ...properties };
}
