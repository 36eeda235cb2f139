import type { Buffer, Selection } from "./types";

export function clampOffset(offset: number, length: number): number {
  if (!Number.isFinite(offset) || offset <= 0) {
    return 0;
  }
  return Math.min(Math.floor(offset), length);
}

export function clampSelection(selection: Selection, length: number): Selection {
  const a = clampOffset(selection.start, length);
  const b = clampOffset(selection.end, length);
  return a <= b ? { start: a, end: b } : { start: b, end: a };
}

/**
 * Build a buffer, clamping both offsets into the text and ordering them so
 * that `start <= end`. Omitted offsets place the caret at the end of text.
 */
export function createBuffer(
  text: string,
  start: number = text.length,
  end: number = start,
): Buffer {
  return { text, selection: clampSelection({ start, end }, text.length) };
}

export function normalizeBuffer(buffer: Buffer): Buffer {
  const { text, selection } = buffer;
  const clamped = clampSelection(selection, text.length);
  if (clamped.start === selection.start && clamped.end === selection.end) {
    return buffer;
  }
  return { text, selection: clamped };
}

export function spliceText(
  text: string,
  start: number,
  end: number,
  insert: string,
): string {
  return text.slice(0, start) + insert + text.slice(end);
}

export function selectedText(buffer: Buffer): string {
  return buffer.text.slice(buffer.selection.start, buffer.selection.end);
}

export function isCollapsed(selection: Selection): boolean {
  return selection.start === selection.end;
}

/** Mutators build their results through these, so output offsets are clamped. */
export function withSelection(text: string, start: number, end: number): Buffer {
  return createBuffer(text, start, end);
}

export function withCursor(text: string, offset: number): Buffer {
  return createBuffer(text, offset, offset);
}
