import { describe, it, expect } from "vitest";
import { decodeText, extractTxt } from "./text.js";

describe("decodeText", () => {
  it("drops a leading BOM", () => {
    expect(decodeText(Buffer.from([0xef, 0xbb, 0xbf, 0x68, 0x69]))).toBe("hi");
  });

  it("replaces undecodable bytes instead of failing", () => {
    expect(decodeText(Buffer.from([0x61, 0xff, 0x62]))).toBe("a\uFFFDb");
  });

  it("normalizes to NFC", () => {
    expect(decodeText(Buffer.from("Cafe\u0301", "utf8"))).toBe("Caf\u00e9");
  });
});

describe("extractTxt", () => {
  it("returns the text with no embedded properties", () => {
    expect(extractTxt(Buffer.from("Line one\nLine two"))).toEqual({
      text: "Line one\nLine two",
      author: null,
      createdAt: null,
    });
  });
});
