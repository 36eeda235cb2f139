import type { Buffer } from "../../core/types";
import { linePrefixToggle } from "../line-prefix/line-prefix";

export const BULLET_PATTERN = /^(\s*)([-*+])\s/;
export const NUMBERED_PATTERN = /^(\s*)(\d+)\.\s/;

export const BULLET_PREFIX = "- ";
export const NUMBERED_PREFIX = "1. ";

export type LineMarkerMatch = {
  kind: "bullet" | "numbered" | "blockquote";
  /** Full matched marker including indentation and trailing whitespace. */
  marker: string;
  /** Prefix to start the next item with. */
  continuation: string;
};

export function matchBulletLine(line: string): LineMarkerMatch | null {
  const match = BULLET_PATTERN.exec(line);
  if (!match) {
    return null;
  }
  const [marker, indent, bullet] = match;
  return { kind: "bullet", marker, continuation: `${indent}${bullet} ` };
}

// The next number comes from this line alone; earlier items are not
// recounted, so a list numbered out of order continues from the edited line.
export function matchNumberedLine(line: string): LineMarkerMatch | null {
  const match = NUMBERED_PATTERN.exec(line);
  if (!match) {
    return null;
  }
  const [marker, indent, digits] = match;
  const next = BigInt(digits) + 1n;
  return { kind: "numbered", marker, continuation: `${indent}${next}. ` };
}

export function isBulletLine(line: string): boolean {
  return BULLET_PATTERN.test(line);
}

export function isNumberedLine(line: string): boolean {
  return NUMBERED_PATTERN.test(line);
}

export function toggleBulletList(buffer: Buffer): Buffer {
  return linePrefixToggle(buffer, BULLET_PREFIX);
}

export function toggleNumberedList(buffer: Buffer): Buffer {
  return linePrefixToggle(buffer, NUMBERED_PREFIX);
}
