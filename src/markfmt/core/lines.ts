export type LineInfo = {
  start: number;
  end: number;
  text: string;
};

export function findLineStart(text: string, offset: number): number {
  if (offset <= 0) {
    return 0;
  }
  return text.lastIndexOf("\n", offset - 1) + 1;
}

export function findLineEnd(text: string, offset: number): number {
  const index = text.indexOf("\n", Math.max(0, offset));
  return index === -1 ? text.length : index;
}

// Get the line containing `offset`. A caret right after "\n" belongs to the
// following line.
export function getLineAt(text: string, offset: number): LineInfo {
  const start = findLineStart(text, offset);
  const end = findLineEnd(text, offset);
  return { start, end, text: text.slice(start, end) };
}
