import type { Logger } from "../logger.js";

/** PDF user space is 72 units per inch. */
const PDF_POINTS_PER_INCH = 72;

export interface OcrRequest {
  /** Rasterization resolution in dots per inch. */
  dpi: number;
}

/**
 * Turns the pages of a scanned PDF into text. Implementations rasterize and
 * recognize every page and join the page texts with newlines.
 */
export interface OcrEngine {
  recognize(pdf: Buffer, request: OcrRequest): Promise<string>;
}

/**
 * True when a PDF's text layer is too short to be trusted and the document
 * should be OCR'd instead. Page count and file size play no part: a short
 * but genuine text PDF is OCR'd as well.
 */
export function shouldUseOcr(textLayer: string, minTextLength: number): boolean {
  return textLayer.trim().length < minTextLength;
}

export function dpiToScale(dpi: number): number {
  return dpi / PDF_POINTS_PER_INCH;
}

export class OcrTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`OCR did not finish within ${timeoutMs}ms`);
    this.name = "OcrTimeoutError";
  }
}

/**
 * Races `work` against a timer. A limit of 0 waits indefinitely. The work
 * itself is not cancelled; its eventual result is ignored.
 */
export async function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  if (timeoutMs <= 0) {
    return work;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new OcrTimeoutError(timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * pdf-to-img rasterizer feeding a single tesseract.js worker. The worker is
 * created per document and terminated afterwards, whatever the outcome.
 * Both libraries are imported on first use so that text-only workloads
 * never load them.
 */
export class TesseractOcrEngine implements OcrEngine {
  constructor(
    private readonly logger: Logger,
    private readonly lang = "eng",
  ) {}

  async recognize(pdfBytes: Buffer, request: OcrRequest): Promise<string> {
    const { pdf } = await import("pdf-to-img");
    const { createWorker } = await import("tesseract.js");

    const document = await pdf(pdfBytes, { scale: dpiToScale(request.dpi) });
    const worker = await createWorker(this.lang);

    try {
      const pages: string[] = [];
      for await (const image of document) {
        const { data } = await worker.recognize(image);
        pages.push(data.text);
      }

      this.logger.debug({ pages: pages.length, dpi: request.dpi }, "ocr complete");
      return pages.join("\n");
    } finally {
      await worker.terminate();
    }
  }
}
