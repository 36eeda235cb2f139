import { normalizeBuffer } from "../core/buffer";
import { getLineAt } from "../core/lines";
import { emptyFormatState, type Buffer, type FormatState } from "../core/types";
import { isBlockquoteLine } from "../extensions/blockquote/blockquote";
import { isInsideCodeBlock } from "../extensions/code-block/code-block";
import { getHeadingLevel } from "../extensions/heading/heading";
import { isMarkerActive } from "../extensions/inline-marker/inline-marker";
import { isBulletLine, isNumberedLine } from "../extensions/list/list";

/** Describe which Markdown constructs are active at the buffer's selection. */
export function detectFormatState(buffer: Buffer): FormatState {
  const { text, selection } = normalizeBuffer(buffer);
  if (text === "") {
    return { ...emptyFormatState };
  }

  const line = getLineAt(text, selection.start).text;

  return {
    isBold: isMarkerActive(text, selection, "**"),
    isItalic: isMarkerActive(text, selection, "*"),
    isInlineCode: isMarkerActive(text, selection, "`"),
    isCodeBlock: isInsideCodeBlock(text, selection.start),
    isBulletList: isBulletLine(line),
    isNumberedList: isNumberedLine(line),
    isBlockquote: isBlockquoteLine(line),
    headingLevel: getHeadingLevel(line),
  };
}
