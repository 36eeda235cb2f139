import { normalizeBuffer, spliceText, withCursor } from "../../core/buffer";
import { getLineAt } from "../../core/lines";
import type { Buffer } from "../../core/types";

function findGroupPrefix(
  line: string,
  group: readonly string[],
): string | null {
  // Longest first so "### " wins over a shorter member it could shadow.
  const ordered = [...group].sort((a, b) => b.length - a.length);
  return ordered.find((candidate) => line.startsWith(candidate)) ?? null;
}

/**
 * Toggle `prefix` at the start of the line holding the caret.
 *
 * With an `exclusiveGroup`, any member of the group already on the line is
 * replaced instead of stacked, so a line carries at most one of them. The
 * result is always a collapsed caret that never moves before the line start.
 */
export function linePrefixToggle(
  buffer: Buffer,
  prefix: string,
  exclusiveGroup?: readonly string[],
): Buffer {
  const { text, selection } = normalizeBuffer(buffer);
  const line = getLineAt(text, selection.start);

  let newLine: string;
  let cursorDelta: number;

  const existing = exclusiveGroup
    ? findGroupPrefix(line.text, exclusiveGroup)
    : null;

  if (line.text.startsWith(prefix)) {
    newLine = line.text.slice(prefix.length);
    cursorDelta = -prefix.length;
  } else if (existing !== null) {
    newLine = prefix + line.text.slice(existing.length);
    cursorDelta = prefix.length - existing.length;
  } else {
    newLine = prefix + line.text;
    cursorDelta = prefix.length;
  }

  const newText = spliceText(text, line.start, line.end, newLine);
  return withCursor(
    newText,
    Math.max(line.start, selection.start + cursorDelta),
  );
}
