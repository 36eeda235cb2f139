import { normalizeBuffer, spliceText, withCursor } from "../../core/buffer";
import { findLineEnd } from "../../core/lines";
import type { Buffer } from "../../core/types";

export const HORIZONTAL_RULE = "\n\n---\n\n";

// Always below the current line, never splitting inline content. The caret
// lands on the blank line after the rule.
export function insertHorizontalRule(buffer: Buffer): Buffer {
  const { text, selection } = normalizeBuffer(buffer);
  const insertAt = findLineEnd(text, selection.start);
  return withCursor(
    spliceText(text, insertAt, insertAt, HORIZONTAL_RULE),
    insertAt + HORIZONTAL_RULE.length - 1,
  );
}
