import {
  normalizeBuffer,
  selectedText,
  spliceText,
  withSelection,
} from "../../core/buffer";
import {
  defaultFormattingSettings,
  resolvePlaceholders,
  type FormattingSettings,
} from "../../core/settings";
import type { Buffer } from "../../core/types";

/**
 * Insert a `[text](url)` link. Selected text becomes the link text and the
 * url placeholder is selected; otherwise the link text placeholder is.
 */
export function insertLink(
  buffer: Buffer,
  settings: FormattingSettings = defaultFormattingSettings,
): Buffer {
  const { text, selection } = normalizeBuffer(buffer);
  const { linkText, linkUrl } = resolvePlaceholders(settings);
  const inner = selectedText({ text, selection });
  const label = inner === "" ? linkText : inner;
  const newText = spliceText(
    text,
    selection.start,
    selection.end,
    `[${label}](${linkUrl})`,
  );

  if (inner === "") {
    const labelStart = selection.start + 1;
    return withSelection(newText, labelStart, labelStart + label.length);
  }

  // Past "[", the label and "]("
  const urlStart = selection.start + label.length + 3;
  return withSelection(newText, urlStart, urlStart + linkUrl.length);
}
