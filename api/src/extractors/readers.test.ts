import { describe, it, expect, vi } from "vitest";
import JSZip from "jszip";
import { createLogger } from "../logger.js";
import { readDocxText } from "./docx.js";
import { extract } from "./index.js";
import { readPdfTextLayer } from "./pdf.js";

const WORD_NS = "http://schemas.openxmlformats.org/wordprocessingml/2006/main";

function paragraph(text?: string): string {
  return text === undefined ? "<w:p/>" : `<w:p><w:r><w:t>${text}</w:t></w:r></w:p>`;
}

async function buildDocx(paragraphs: string[]): Promise<Buffer> {
  const zip = new JSZip();
  zip.file(
    "[Content_Types].xml",
    '<?xml version="1.0" encoding="UTF-8"?>' +
      '<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">' +
      '<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>' +
      '<Default Extension="xml" ContentType="application/xml"/>' +
      '<Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>' +
      "</Types>",
  );
  zip.file(
    "_rels/.rels",
    '<?xml version="1.0" encoding="UTF-8"?>' +
      '<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">' +
      '<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/document.xml"/>' +
      "</Relationships>",
  );
  zip.file(
    "word/document.xml",
    `<?xml version="1.0" encoding="UTF-8"?><w:document xmlns:w="${WORD_NS}"><w:body>${paragraphs.join("")}</w:body></w:document>`,
  );
  return zip.generateAsync({ type: "nodebuffer" });
}

/** A one-page PDF with a Helvetica text line and an info dictionary, xref offsets computed. */
function buildPdf(line: string, info: string): Buffer {
  const content = `BT /F1 24 Tf 72 720 Td (${line}) Tj ET`;
  const objects = [
    "<< /Type /Catalog /Pages 2 0 R >>",
    "<< /Type /Pages /Kids [3 0 R] /Count 1 >>",
    "<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Contents 4 0 R /Resources << /Font << /F1 5 0 R >> >> >>",
    `<< /Length ${content.length} >>\nstream\n${content}\nendstream`,
    "<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>",
    info,
  ];

  let body = "%PDF-1.4\n";
  const offsets: number[] = [];
  objects.forEach((object, i) => {
    offsets.push(body.length);
    body += `${i + 1} 0 obj\n${object}\nendobj\n`;
  });

  const xrefOffset = body.length;
  body += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  body += offsets.map((offset) => `${String(offset).padStart(10, "0")} 00000 n \n`).join("");
  body += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R /Info 6 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

  return Buffer.from(body, "latin1");
}

const PDF = buildPdf("Hello World", "<< /Author (Jane Doe) /CreationDate (D:20230415093000+02'00') >>");

describe("mammoth docx reading", () => {
  it("puts one paragraph per line and keeps empty paragraphs", async () => {
    const bytes = await buildDocx([paragraph("Title line"), paragraph(), paragraph("Body one"), paragraph("Body two")]);

    await expect(readDocxText(bytes)).resolves.toEqual({ ok: true, value: "Title line\n\nBody one\nBody two" });
  });
});

describe("unpdf text layer reading", () => {
  it("reads page text and the info dictionary", async () => {
    await expect(readPdfTextLayer(PDF)).resolves.toEqual({
      ok: true,
      value: {
        text: "Hello World",
        pageCount: 1,
        properties: { author: "Jane Doe", createdAt: "2023-04-15T09:30:00+02:00" },
      },
    });
  });

  it("extracts a text PDF above the threshold without OCR", async () => {
    const ocr = { recognize: vi.fn(async () => "unused") };

    const content = await extract(PDF, "pdf", {
      ocr,
      logger: createLogger({ level: "silent" }),
      ocrSettings: { minTextLength: 5, dpi: 300, timeoutMs: 0 },
    });

    expect(content).toEqual({ text: "Hello World", author: "Jane Doe", createdAt: "2023-04-15T09:30:00+02:00" });
    expect(ocr.recognize).not.toHaveBeenCalled();
  });
});
