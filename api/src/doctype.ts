import path from "node:path";

export type DocumentFormat = "txt" | "docx" | "pdf" | "unknown";

export interface DocumentInput {
  filename: string;
  bytes: Buffer;
  /** Extension (".pdf") or MIME type ("application/pdf") announced by the caller. */
  declaredType?: string;
}

export const DOCX_MIME_TYPE = "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

const EXTENSION_FORMATS: Record<string, DocumentFormat> = {
  ".txt": "txt",
  ".docx": "docx",
  ".pdf": "pdf",
};

const MIME_FORMATS: Record<string, DocumentFormat> = {
  "text/plain": "txt",
  [DOCX_MIME_TYPE]: "docx",
  "application/pdf": "pdf",
};

const CANONICAL_EXTENSIONS: Record<Exclude<DocumentFormat, "unknown">, string> = {
  txt: ".txt",
  docx: ".docx",
  pdf: ".pdf",
};

const PDF_MAGIC = Buffer.from("%PDF-", "latin1");
const ZIP_MAGIC = Buffer.from([0x50, 0x4b, 0x03, 0x04]);
const DOCX_MAIN_PART = Buffer.from("word/document.xml", "latin1");

/**
 * The extension the caller declared: `declaredType` when it looks like an
 * extension, otherwise the filename's. Always lowercase, "" when absent.
 */
export function declaredExtension(input: Pick<DocumentInput, "filename" | "declaredType">): string {
  const declared = (input.declaredType || "").trim().toLowerCase();
  if (declared.startsWith(".")) {
    return declared;
  }
  return path.extname(input.filename).toLowerCase();
}

function formatFromDeclaration(input: DocumentInput): DocumentFormat {
  const declared = (input.declaredType || "").trim().toLowerCase();
  if (declared && !declared.startsWith(".")) {
    const mime = declared.split(";")[0].trim();
    const byMime = MIME_FORMATS[mime];
    if (byMime) return byMime;
  }

  return EXTENSION_FORMATS[declaredExtension(input)] ?? "unknown";
}

/**
 * Recognizes PDFs by their header and DOCX files as ZIP archives carrying a
 * WordprocessingML main part. The PDF header may be preceded by junk bytes,
 * so the first kilobyte is searched.
 */
export function sniffFormat(bytes: Buffer): DocumentFormat {
  const head = bytes.subarray(0, 1024);
  if (head.indexOf(PDF_MAGIC) !== -1) {
    return "pdf";
  }
  if (bytes.subarray(0, ZIP_MAGIC.length).equals(ZIP_MAGIC) && bytes.indexOf(DOCX_MAIN_PART) !== -1) {
    return "docx";
  }
  return "unknown";
}

export function detectFormat(input: DocumentInput): DocumentFormat {
  const declared = formatFromDeclaration(input);
  if (declared !== "unknown") {
    return declared;
  }
  return sniffFormat(input.bytes);
}

/**
 * The `file_type` reported for a document: the canonical extension of the
 * detected format, or whatever extension was declared when nothing matched.
 */
export function fileTypeFor(format: DocumentFormat, input: Pick<DocumentInput, "filename" | "declaredType">): string {
  if (format === "unknown") {
    return declaredExtension(input);
  }
  return CANONICAL_EXTENSIONS[format];
}
