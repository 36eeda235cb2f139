import {
  isCollapsed,
  normalizeBuffer,
  spliceText,
  withCursor,
} from "../core/buffer";
import { getLineAt } from "../core/lines";
import type { Buffer, NewlineResult } from "../core/types";
import { matchBlockquoteLine } from "../extensions/blockquote/blockquote";
import {
  matchBulletLine,
  matchNumberedLine,
  type LineMarkerMatch,
} from "../extensions/list/list";

// Checked in order. The patterns need different leading characters, so at
// most one of them matches a line.
const lineMatchers: Array<(line: string) => LineMarkerMatch | null> = [
  matchBulletLine,
  matchNumberedLine,
  matchBlockquoteLine,
];

function matchContinuableLine(line: string): LineMarkerMatch | null {
  for (const matcher of lineMatchers) {
    const match = matcher(line);
    if (match) {
      return match;
    }
  }
  return null;
}

/**
 * Handle Enter before the host inserts its own newline.
 *
 * On a list or quote line the next line starts with the continued marker.
 * On a line holding nothing but the marker the whole line is cleared, which
 * ends the list. `handled: false` leaves the buffer untouched and the host
 * should insert a plain newline.
 */
export function handleNewline(buffer: Buffer): NewlineResult {
  const normalized = normalizeBuffer(buffer);
  const { text, selection } = normalized;
  if (!isCollapsed(selection)) {
    return { buffer: normalized, handled: false };
  }

  const line = getLineAt(text, selection.start);
  const match = matchContinuableLine(line.text);
  if (!match) {
    return { buffer: normalized, handled: false };
  }

  if (line.text.trimEnd() === match.marker.trimEnd()) {
    return {
      buffer: withCursor(spliceText(text, line.start, line.end, ""), line.start),
      handled: true,
    };
  }

  const insertion = `\n${match.continuation}`;
  return {
    buffer: withCursor(
      spliceText(text, selection.start, selection.end, insertion),
      selection.start + insertion.length,
    ),
    handled: true,
  };
}
