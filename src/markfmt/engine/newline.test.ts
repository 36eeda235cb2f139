import { describe, expect, it } from "vitest";
import { createBuffer } from "../core/buffer";
import { handleNewline } from "./newline";

describe("handleNewline", () => {
  it("continues a numbered list from the current number", () => {
    expect(handleNewline(createBuffer("3. foo"))).toEqual({
      buffer: { text: "3. foo\n4. ", selection: { start: 10, end: 10 } },
      handled: true,
    });
  });

  it("continues a list numbered past 2^53", () => {
    expect(handleNewline(createBuffer("99999999999999999999. x")).buffer.text).toBe(
      "99999999999999999999. x\n100000000000000000000. ",
    );
  });

  it("continues bullets with the same indentation and character", () => {
    expect(handleNewline(createBuffer("- item")).buffer).toEqual({
      text: "- item\n- ",
      selection: { start: 9, end: 9 },
    });
    expect(handleNewline(createBuffer("  + nested")).buffer).toEqual({
      text: "  + nested\n  + ",
      selection: { start: 15, end: 15 },
    });
  });

  it("continues a blockquote", () => {
    expect(handleNewline(createBuffer("> quote")).buffer).toEqual({
      text: "> quote\n> ",
      selection: { start: 10, end: 10 },
    });
  });

  it("splits an item when the caret is mid-line", () => {
    expect(handleNewline(createBuffer("- ab", 3)).buffer).toEqual({
      text: "- a\n- b",
      selection: { start: 6, end: 6 },
    });
  });

  it("deletes an empty item instead of adding another", () => {
    expect(handleNewline(createBuffer("- "))).toEqual({
      buffer: { text: "", selection: { start: 0, end: 0 } },
      handled: true,
    });
    expect(handleNewline(createBuffer("a\n- ")).buffer).toEqual({
      text: "a\n",
      selection: { start: 2, end: 2 },
    });
  });

  it("treats trailing whitespace after the marker as empty", () => {
    expect(handleNewline(createBuffer("-  ")).buffer.text).toBe("");
    expect(handleNewline(createBuffer(">   ")).buffer.text).toBe("");
    expect(handleNewline(createBuffer(">")).buffer.text).toBe("");
    expect(handleNewline(createBuffer("  7. ")).buffer.text).toBe("");
  });

  it("only clears the caret line when ending a list mid-document", () => {
    expect(handleNewline(createBuffer("- a\n- \n- c", 6)).buffer).toEqual({
      text: "- a\n\n- c",
      selection: { start: 4, end: 4 },
    });
  });

  it("counts Cyrillic text in UTF-16 units", () => {
    expect(handleNewline(createBuffer("- привет")).buffer).toEqual({
      text: "- привет\n- ",
      selection: { start: 11, end: 11 },
    });
  });

  it("leaves plain lines to the default newline", () => {
    const buffer = createBuffer("hello");
    expect(handleNewline(buffer)).toEqual({ buffer, handled: false });
  });

  it("rejects range selections", () => {
    const buffer = createBuffer("- item", 2, 6);
    expect(handleNewline(buffer)).toEqual({ buffer, handled: false });
  });
});
