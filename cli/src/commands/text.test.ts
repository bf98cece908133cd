import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { cmdText, preview } from "./text.js";

describe("preview", () => {
  it("cuts long text and marks the cut", () => {
    expect(preview("Hello world", 5)).toBe("Hello…");
    expect(preview("Hello", 5)).toBe("Hello");
  });
});

describe("text command", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "docmeta-text-test-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("prints the properties and a preview of the text", async () => {
    const file = path.join(dir, "memo.txt");
    await fs.writeFile(file, "Hello world, this is a memo.");
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    await cmdText(file, { chars: "11" });

    expect(log.mock.calls.map(([line]) => line)).toEqual([
      "Format:   txt",
      "Author:   -",
      "Created:  -",
      "Length:   28 characters",
      "",
      "Hello world…",
    ]);
  });

  it("rejects a malformed --chars value", async () => {
    await expect(cmdText(path.join(dir, "memo.txt"), { chars: "-1" })).rejects.toThrow(
      '--chars must be a non-negative integer, got "-1"',
    );
  });
});
