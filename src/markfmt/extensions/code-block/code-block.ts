import {
  normalizeBuffer,
  selectedText,
  spliceText,
  withCursor,
} from "../../core/buffer";
import { findLineEnd } from "../../core/lines";
import type { Buffer } from "../../core/types";

export const CODE_FENCE = "```";

/**
 * Whether `offset` falls inside a fenced code block.
 *
 * Walks every line up to and including the caret line and flips on each line
 * whose trimmed text starts with a fence. Fences are not matched as pairs; an
 * odd count before the caret means the caret is inside.
 */
export function isInsideCodeBlock(text: string, offset: number): boolean {
  let inside = false;
  let lineStart = 0;
  while (lineStart <= offset) {
    const lineEnd = Math.min(findLineEnd(text, lineStart), offset);
    if (text.slice(lineStart, lineEnd).trim().startsWith(CODE_FENCE)) {
      inside = !inside;
    }
    lineStart = lineEnd + 1;
  }
  return inside;
}

export function insertCodeBlock(buffer: Buffer): Buffer {
  const { text, selection } = normalizeBuffer(buffer);
  const inner = selectedText({ text, selection });

  const insertion =
    inner === ""
      ? `${CODE_FENCE}\n\n${CODE_FENCE}`
      : `${CODE_FENCE}\n${inner}\n${CODE_FENCE}`;

  return withCursor(
    spliceText(text, selection.start, selection.end, insertion),
    selection.start + CODE_FENCE.length + 1,
  );
}
