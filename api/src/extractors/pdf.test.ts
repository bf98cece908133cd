import { describe, it, expect, vi } from "vitest";
import { createLogger } from "../logger.js";
import { Err, Ok } from "../result.js";
import type { OcrEngine, OcrRequest } from "./ocr.js";
import { extractPdf, propertiesFromInfo, type PdfTextLayer } from "./pdf.js";
import type { ExtractorDeps } from "./types.js";

const logger = createLogger({ level: "silent" });

function fakeOcr(recognize: (pdf: Buffer, request: OcrRequest) => Promise<string>) {
  const engine: OcrEngine = { recognize: vi.fn(recognize) };
  return engine;
}

function deps(ocr: OcrEngine, timeoutMs = 0): ExtractorDeps {
  return { ocr, logger, ocrSettings: { minTextLength: 100, dpi: 300, timeoutMs } };
}

function layer(text: string): PdfTextLayer {
  return { text, pageCount: 1, properties: { author: "Jane Doe", createdAt: "2023-04-15T00:00:00" } };
}

const bytes = Buffer.from("%PDF-1.7");

describe("extractPdf", () => {
  it("runs OCR when the text layer is 50 characters", async () => {
    const ocr = fakeOcr(async () => "Recognized page one\nRecognized page two");

    const content = await extractPdf(bytes, deps(ocr), async () => Ok(layer("x".repeat(50))));

    expect(ocr.recognize).toHaveBeenCalledWith(bytes, { dpi: 300 });
    expect(content).toEqual({
      text: "Recognized page one\nRecognized page two",
      author: "Jane Doe",
      createdAt: "2023-04-15T00:00:00",
    });
  });

  it("keeps a 500 character text layer without OCR", async () => {
    const ocr = fakeOcr(async () => "unused");
    const text = "y".repeat(500);

    const content = await extractPdf(bytes, deps(ocr), async () => Ok(layer(text)));

    expect(ocr.recognize).not.toHaveBeenCalled();
    expect(content.text).toBe(text);
  });

  it("measures the trimmed text layer", async () => {
    const ocr = fakeOcr(async () => "scanned");

    await extractPdf(bytes, deps(ocr), async () => Ok(layer(`   ${"z".repeat(99)}\n\n\n   `)));

    expect(ocr.recognize).toHaveBeenCalledTimes(1);
  });

  it("keeps the text layer when OCR fails", async () => {
    const ocr = fakeOcr(async () => {
      throw new Error("worker crashed");
    });

    const content = await extractPdf(bytes, deps(ocr), async () => Ok(layer("short")));

    expect(content).toEqual({ text: "short", author: "Jane Doe", createdAt: "2023-04-15T00:00:00" });
  });

  it("keeps the text layer when OCR times out", async () => {
    const ocr = fakeOcr(() => new Promise<string>(() => undefined));

    const content = await extractPdf(bytes, deps(ocr, 20), async () => Ok(layer("short")));

    expect(content.text).toBe("short");
  });

  it("does not attempt OCR on a PDF that cannot be opened", async () => {
    const ocr = fakeOcr(async () => "unused");

    const content = await extractPdf(bytes, deps(ocr), async () => Err(new Error("Invalid PDF structure")));

    expect(ocr.recognize).not.toHaveBeenCalled();
    expect(content).toEqual({ text: "", author: null, createdAt: null });
  });
});

describe("propertiesFromInfo", () => {
  it("reads Author and CreationDate", () => {
    expect(propertiesFromInfo({ Author: " Jane Doe ", CreationDate: "D:20230415093000+02'00'" })).toEqual({
      author: "Jane Doe",
      createdAt: "2023-04-15T09:30:00+02:00",
    });
  });

  it("nulls malformed or missing fields", () => {
    expect(propertiesFromInfo({ Author: 42, CreationDate: "sometime" })).toEqual({ author: null, createdAt: null });
    expect(propertiesFromInfo(undefined)).toEqual({ author: null, createdAt: null });
  });
});
