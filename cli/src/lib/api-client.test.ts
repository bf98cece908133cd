import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { isMetadataRecord, postMetadata } from "./api-client.js";

describe("isMetadataRecord", () => {
  it("accepts a record and rejects other shapes", () => {
    const record = {
      filename: "a.txt",
      file_type: ".txt",
      language: "unknown",
      author: null,
      created_at: null,
      word_count: 0,
      reading_time_minutes: 0,
      title: "a",
      keywords: [],
      summary: "",
      sections: [],
      entities: [],
    };

    expect(isMetadataRecord(record)).toBe(true);
    expect(isMetadataRecord({ ...record, keywords: "none" })).toBe(false);
    expect(isMetadataRecord(null)).toBe(false);
  });
});

describe("postMetadata", () => {
  let fetchMock: typeof globalThis.fetch;

  beforeEach(() => {
    fetchMock = globalThis.fetch;
  });

  afterEach(() => {
    globalThis.fetch = fetchMock;
  });

  it("rejects a response that is not a metadata record", async () => {
    globalThis.fetch = async () =>
      new Response(JSON.stringify({ ok: true }), {
        status: 200,
        headers: { "content-type": "application/json" },
      });

    await expect(postMetadata("http://localhost:8080", { filename: "a.txt", content: "" })).rejects.toThrow(
      "Metadata response is not a metadata record",
    );
  });

  it("includes the service error body", async () => {
    globalThis.fetch = async () =>
      new Response(JSON.stringify({ code: "CONFIG_ERROR" }), { status: 400 });

    await expect(postMetadata("http://localhost:8080", { filename: "a.txt", content: "" })).rejects.toThrow(
      'Metadata request failed: 400 {"code":"CONFIG_ERROR"}',
    );
  });
});
