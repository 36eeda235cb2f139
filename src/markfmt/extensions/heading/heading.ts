import type { Buffer, HeadingLevel } from "../../core/types";
import { linePrefixToggle } from "../line-prefix/line-prefix";

// Only a space ends the marker, matching the prefixes the toggler writes.
export const HEADING_PATTERN = /^(#{1,6}) /;

// Every ATX heading prefix, so applying H2 to an H5 line replaces it.
export const HEADING_PREFIXES: readonly string[] = [1, 2, 3, 4, 5, 6].map(
  (count) => `${"#".repeat(count)} `,
);

export function headingPrefix(level: HeadingLevel): string {
  return `${"#".repeat(level)} `;
}

export function getHeadingLevel(line: string): number {
  const match = HEADING_PATTERN.exec(line);
  return match ? match[1].length : 0;
}

export function toggleHeading(buffer: Buffer, level: HeadingLevel): Buffer {
  return linePrefixToggle(buffer, headingPrefix(level), HEADING_PREFIXES);
}
