import type { Buffer } from "../../core/types";
import { linePrefixToggle } from "../line-prefix/line-prefix";
import type { LineMarkerMatch } from "../list/list";

export const BLOCKQUOTE_PATTERN = /^>\s?/;
export const BLOCKQUOTE_PREFIX = "> ";

export function matchBlockquoteLine(line: string): LineMarkerMatch | null {
  const match = BLOCKQUOTE_PATTERN.exec(line);
  if (!match) {
    return null;
  }
  return {
    kind: "blockquote",
    marker: match[0],
    continuation: BLOCKQUOTE_PREFIX,
  };
}

export function isBlockquoteLine(line: string): boolean {
  return BLOCKQUOTE_PATTERN.test(line);
}

export function toggleBlockquote(buffer: Buffer): Buffer {
  return linePrefixToggle(buffer, BLOCKQUOTE_PREFIX);
}
