export type Selection = {
  start: number;
  end: number;
};

/**
 * Immutable snapshot of the editing surface. Offsets are UTF-16 code units
 * into `text`; `start === end` is a collapsed caret.
 */
export type Buffer = {
  readonly text: string;
  readonly selection: Readonly<Selection>;
};

export type HeadingLevel = 1 | 2 | 3;

export type FormatState = {
  isBold: boolean;
  isItalic: boolean;
  isInlineCode: boolean;
  isCodeBlock: boolean;
  isBulletList: boolean;
  isNumberedList: boolean;
  isBlockquote: boolean;
  /** 0 when the line is not a heading, otherwise the number of leading `#`. */
  headingLevel: number;
};

export type NewlineResult = {
  buffer: Buffer;
  handled: boolean;
};

export type InlineMarker = "**" | "*" | "`";

export type BufferMutator = (buffer: Buffer) => Buffer;

export const emptyFormatState: Readonly<FormatState> = {
  isBold: false,
  isItalic: false,
  isInlineCode: false,
  isCodeBlock: false,
  isBulletList: false,
  isNumberedList: false,
  isBlockquote: false,
  headingLevel: 0,
};
