import type { ExtractedContent } from "./types.js";

// Non-fatal decoder: malformed sequences become U+FFFD and a leading BOM is
// consumed.
const decoder = new TextDecoder("utf-8", { fatal: false });

export function decodeText(bytes: Uint8Array): string {
  return decoder.decode(bytes).normalize("NFC");
}

export function extractTxt(bytes: Buffer): ExtractedContent {
  return { text: decodeText(bytes), author: null, createdAt: null };
}
