export type {
  Buffer,
  BufferMutator,
  FormatState,
  HeadingLevel,
  InlineMarker,
  NewlineResult,
  Selection,
} from "./core/types";
export { emptyFormatState } from "./core/types";
export {
  clampOffset,
  clampSelection,
  createBuffer,
  normalizeBuffer,
  spliceText,
} from "./core/buffer";
export { findLineEnd, findLineStart, getLineAt } from "./core/lines";
export type { LineInfo } from "./core/lines";
export {
  defaultFormattingSettings,
  resolvePlaceholders,
  resolveToolbarStrings,
} from "./core/settings";
export type { FormattingSettings } from "./core/settings";
export { localeStrings, resolveLocale } from "./l10n/strings";
export type {
  Locale,
  LocaleStrings,
  PlaceholderStrings,
  ToolbarStrings,
} from "./l10n/strings";
export { detectFormatState } from "./engine/format-state";
export { handleNewline } from "./engine/newline";
export * from "./extensions";
export {
  applyToolbarCommand,
  buildToolbarItems,
  isToolbarCommandId,
} from "./toolbar/toolbar";
export type {
  ToolbarCommand,
  ToolbarCommandId,
  ToolbarItem,
} from "./toolbar/toolbar";
