import { describe, expect, it } from "vitest";
import { findLineEnd, findLineStart, getLineAt } from "./lines";

describe("line boundaries", () => {
  const text = "first\nsecond\n\nlast";

  it("finds the line around an offset", () => {
    expect(getLineAt(text, 8)).toEqual({ start: 6, end: 12, text: "second" });
  });

  it("treats an offset right after a newline as the next line", () => {
    expect(getLineAt(text, 6)).toEqual({ start: 6, end: 12, text: "second" });
  });

  it("treats an offset right before a newline as the same line", () => {
    expect(getLineAt(text, 5)).toEqual({ start: 0, end: 5, text: "first" });
  });

  it("handles empty lines", () => {
    expect(getLineAt(text, 13)).toEqual({ start: 13, end: 13, text: "" });
  });

  it("handles the last line and empty text", () => {
    expect(getLineAt(text, text.length)).toEqual({
      start: 14,
      end: 18,
      text: "last",
    });
    expect(getLineAt("", 0)).toEqual({ start: 0, end: 0, text: "" });
  });

  it("counts UTF-16 code units in Cyrillic and emoji lines", () => {
    const unicode = "привет 👋🏽\nмир";
    // "привет " is 7 units, the waving hand with skin tone is 4
    expect(findLineEnd(unicode, 0)).toBe(11);
    expect(findLineStart(unicode, 13)).toBe(12);
    expect(getLineAt(unicode, 3).text).toBe("привет 👋🏽");
  });
});
