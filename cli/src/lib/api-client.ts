import type { MetadataRecord } from "docmeta-api";

export interface MetadataRequest {
  filename: string;
  /** Document bytes, base64-encoded. */
  content: string;
  declaredType?: string;
  maxKeywords?: number;
  maxSummarySentences?: number;
}

export async function postMetadata(api: string, request: MetadataRequest): Promise<MetadataRecord> {
  const res = await fetch(`${api.replace(/\/+$/, "")}/metadata`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(request),
  });

  if (!res.ok) {
    const text = await res.text().catch(() => "");
    throw new Error(`Metadata request failed: ${res.status} ${text}`.trim());
  }

  const body: unknown = await res.json();
  if (!isMetadataRecord(body)) {
    throw new Error("Metadata response is not a metadata record");
  }
  return body;
}

export function isMetadataRecord(value: unknown): value is MetadataRecord {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const stringFields = ["filename", "file_type", "language", "title", "summary"];
  const numberFields = ["word_count", "reading_time_minutes"];
  const arrayFields = ["keywords", "sections", "entities"];
  return (
    stringFields.every((key) => typeof Reflect.get(value, key) === "string") &&
    numberFields.every((key) => typeof Reflect.get(value, key) === "number") &&
    arrayFields.every((key) => Array.isArray(Reflect.get(value, key)))
  );
}
