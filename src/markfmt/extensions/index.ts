export {
  isInsideMarkerSpan,
  isMarkerActive,
  isWrappedWith,
  placeholderForMarker,
  toggleBold,
  toggleInlineCode,
  toggleItalic,
  wrapToggle,
} from "./inline-marker/inline-marker";
export { linePrefixToggle } from "./line-prefix/line-prefix";
export {
  HEADING_PATTERN,
  HEADING_PREFIXES,
  getHeadingLevel,
  headingPrefix,
  toggleHeading,
} from "./heading/heading";
export {
  BULLET_PATTERN,
  NUMBERED_PATTERN,
  isBulletLine,
  isNumberedLine,
  matchBulletLine,
  matchNumberedLine,
  toggleBulletList,
  toggleNumberedList,
} from "./list/list";
export type { LineMarkerMatch } from "./list/list";
export {
  BLOCKQUOTE_PATTERN,
  isBlockquoteLine,
  matchBlockquoteLine,
  toggleBlockquote,
} from "./blockquote/blockquote";
export {
  CODE_FENCE,
  insertCodeBlock,
  isInsideCodeBlock,
} from "./code-block/code-block";
export { insertLink } from "./link/link";
export { insertHorizontalRule } from "./horizontal-rule/horizontal-rule";
