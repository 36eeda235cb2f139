import { describe, expect, it } from "vitest";
import type { Buffer, BufferMutator } from "../core/types";
import { toggleBlockquote } from "../extensions/blockquote/blockquote";
import { insertCodeBlock } from "../extensions/code-block/code-block";
import { toggleHeading } from "../extensions/heading/heading";
import { insertHorizontalRule } from "../extensions/horizontal-rule/horizontal-rule";
import {
  toggleBold,
  toggleInlineCode,
  toggleItalic,
} from "../extensions/inline-marker/inline-marker";
import { insertLink } from "../extensions/link/link";
import {
  toggleBulletList,
  toggleNumberedList,
} from "../extensions/list/list";
import { detectFormatState } from "./format-state";
import { handleNewline } from "./newline";

const texts = [
  "",
  "a",
  "**",
  "- ",
  "1. x\n",
  "```\n",
  "# H\n\n",
  "привет\n> 👋🏽",
  "***x*** `y`",
];

const mutators: Record<string, BufferMutator> = {
  bold: (buffer) => toggleBold(buffer),
  italic: (buffer) => toggleItalic(buffer),
  inlineCode: (buffer) => toggleInlineCode(buffer),
  h1: (buffer) => toggleHeading(buffer, 1),
  h3: (buffer) => toggleHeading(buffer, 3),
  bullet: toggleBulletList,
  numbered: toggleNumberedList,
  quote: toggleBlockquote,
  codeBlock: insertCodeBlock,
  link: (buffer) => insertLink(buffer),
  rule: insertHorizontalRule,
  newline: (buffer) => handleNewline(buffer).buffer,
};

function* buffers(): Generator<Buffer> {
  for (const text of texts) {
    // Includes offsets outside the text to exercise input clamping.
    for (let start = -1; start <= text.length + 1; start++) {
      for (let end = start; end <= text.length + 1; end++) {
        yield { text, selection: { start, end } };
      }
    }
  }
}

describe("offset safety", () => {
  it("never returns a selection outside the new text", () => {
    for (const buffer of buffers()) {
      for (const [name, mutate] of Object.entries(mutators)) {
        const { text, selection } = mutate(buffer);
        const context = `${name} on ${JSON.stringify(buffer)}`;
        expect(selection.start, context).toBeGreaterThanOrEqual(0);
        expect(selection.start, context).toBeLessThanOrEqual(selection.end);
        expect(selection.end, context).toBeLessThanOrEqual(text.length);
      }
    }
  });

  it("inspects every buffer without throwing", () => {
    for (const buffer of buffers()) {
      expect(() => detectFormatState(buffer)).not.toThrow();
    }
  });
});
