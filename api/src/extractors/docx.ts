import JSZip from "jszip";
import mammoth from "mammoth";
import { parseStringPromise, processors } from "xml2js";
import type { Logger } from "../logger.js";
import { tryCatch, type Result } from "../result.js";
import { normalizeIsoDate } from "./dates.js";
import { EMPTY_CONTENT, NO_PROPERTIES, type EmbeddedProperties, type ExtractedContent } from "./types.js";

const CORE_PROPERTIES_PART = "docProps/core.xml";

/** Text content of an xml2js node: a string, `{ _: text }`, or an array of either. */
function nodeText(node: unknown): string | null {
  if (Array.isArray(node)) {
    return nodeText(node[0]);
  }
  if (typeof node === "string") {
    const value = node.trim();
    return value.length > 0 ? value : null;
  }
  if (typeof node === "object" && node !== null) {
    return nodeText(Reflect.get(node, "_"));
  }
  return null;
}

/**
 * Reads `creator` and `created` whatever namespace prefixes the producer
 * chose.
 */
export async function parseCoreProperties(xml: string): Promise<EmbeddedProperties> {
  const parsed: unknown = await parseStringPromise(xml, { tagNameProcessors: [processors.stripPrefix] });
  const root: unknown = typeof parsed === "object" && parsed !== null ? Reflect.get(parsed, "coreProperties") : null;
  if (typeof root !== "object" || root === null) {
    return { ...NO_PROPERTIES };
  }

  const created = nodeText(Reflect.get(root, "created"));
  return {
    author: nodeText(Reflect.get(root, "creator")),
    createdAt: created ? normalizeIsoDate(created) : null,
  };
}

/**
 * mammoth terminates every paragraph with a blank line. Splitting on that
 * separator recovers the paragraphs (empty ones included) so they can be
 * joined one per line.
 */
export function paragraphsToLines(rawText: string): string {
  const paragraphs = rawText.split("\n\n");
  if (paragraphs.length > 0 && paragraphs[paragraphs.length - 1] === "") {
    paragraphs.pop();
  }
  return paragraphs.join("\n");
}

export async function readDocxText(bytes: Buffer): Promise<Result<string>> {
  return tryCatch(async () => {
    const result = await mammoth.extractRawText({ buffer: bytes });
    return paragraphsToLines(result.value).normalize("NFC");
  });
}

/**
 * Author and creation date from the package's core properties part.
 */
export async function readDocxProperties(bytes: Buffer): Promise<Result<EmbeddedProperties>> {
  return tryCatch(async () => {
    const zip = await JSZip.loadAsync(bytes);
    const part = zip.file(CORE_PROPERTIES_PART);
    if (!part) {
      return { ...NO_PROPERTIES };
    }

    return parseCoreProperties(await part.async("string"));
  });
}

export async function extractDocx(bytes: Buffer, logger: Logger): Promise<ExtractedContent> {
  const text = await readDocxText(bytes);
  if (!text.ok) {
    logger.warn({ err: text.error }, "docx text extraction failed");
    return { ...EMPTY_CONTENT };
  }

  const properties = await readDocxProperties(bytes);
  if (!properties.ok) {
    logger.warn({ err: properties.error }, "docx core properties unreadable");
  }

  return {
    text: text.value,
    ...(properties.ok ? properties.value : NO_PROPERTIES),
  };
}
