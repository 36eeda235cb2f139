import {
  normalizeBuffer,
  selectedText,
  spliceText,
  withSelection,
} from "../../core/buffer";
import { getLineAt } from "../../core/lines";
import {
  defaultFormattingSettings,
  resolvePlaceholders,
  type FormattingSettings,
} from "../../core/settings";
import type { Buffer, InlineMarker, Selection } from "../../core/types";
import type { PlaceholderStrings } from "../../l10n/strings";
import { BULLET_PATTERN } from "../list/list";

type MarkerSpanRule = {
  char: string;
  // Delimiter run lengths that open or close this marker. A run of three
  // counts for both bold and italic.
  runLengths: readonly number[];
};

const spanRules: Record<InlineMarker, MarkerSpanRule> = {
  "**": { char: "*", runLengths: [2, 3] },
  "*": { char: "*", runLengths: [1, 3] },
  "`": { char: "`", runLengths: [1] },
};

const placeholderKeys: Record<InlineMarker, keyof PlaceholderStrings> = {
  "**": "bold",
  "*": "italic",
  "`": "code",
};

/**
 * Whether the selection sits exactly between two copies of `marker`.
 *
 * Single-character markers are rejected when the neighbouring character
 * repeats the marker, so `*` never matches the inner half of `**`.
 */
export function isWrappedWith(
  text: string,
  selection: Selection,
  marker: string,
): boolean {
  const before = selection.start - marker.length;
  const after = selection.end + marker.length;
  if (before < 0 || after > text.length) {
    return false;
  }

  if (
    text.slice(before, selection.start) !== marker ||
    text.slice(selection.end, after) !== marker
  ) {
    return false;
  }

  if (marker.length !== 1) {
    return true;
  }

  return text[before - 1] !== marker && text[after] !== marker;
}

type DelimiterRun = {
  start: number;
  end: number;
  canOpen: boolean;
  canClose: boolean;
};

type MarkerSpan = { start: number; end: number };

const WHITESPACE_PATTERN = /\s/;

// A run opens only when text follows it and closes only when text precedes
// it, so "2 * 3 * 4" has no italic span.
function findDelimiterRuns(
  line: string,
  from: number,
  rule: MarkerSpanRule,
): DelimiterRun[] {
  const runs: DelimiterRun[] = [];
  let i = from;
  while (i < line.length) {
    if (line[i] !== rule.char) {
      i += 1;
      continue;
    }
    const start = i;
    while (i < line.length && line[i] === rule.char) {
      i += 1;
    }
    if (rule.runLengths.includes(i - start)) {
      runs.push({
        start,
        end: i,
        canOpen: i < line.length && !WHITESPACE_PATTERN.test(line[i]),
        canClose: start > 0 && !WHITESPACE_PATTERN.test(line[start - 1]),
      });
    }
  }
  return runs;
}

function findMarkerSpans(runs: DelimiterRun[]): MarkerSpan[] {
  const spans: MarkerSpan[] = [];
  let opener: DelimiterRun | null = null;
  for (const run of runs) {
    if (opener && run.canClose) {
      spans.push({ start: opener.end, end: run.start });
      opener = null;
    } else if (run.canOpen) {
      opener = run;
    }
  }
  return spans;
}

/**
 * Whether the selection lies inside a `marker` span on its line. Delimiter
 * runs are paired left to right; a leading `* ` bullet is not a delimiter.
 */
export function isInsideMarkerSpan(
  text: string,
  selection: Selection,
  marker: InlineMarker,
): boolean {
  const line = getLineAt(text, selection.start);
  if (selection.end > line.end) {
    return false;
  }

  const rule = spanRules[marker];
  const bullet = rule.char === "*" ? BULLET_PATTERN.exec(line.text) : null;
  const runs = findDelimiterRuns(line.text, bullet ? bullet[0].length : 0, rule);

  const start = selection.start - line.start;
  const end = selection.end - line.start;
  return findMarkerSpans(runs).some(
    (span) => start >= span.start && end <= span.end,
  );
}

export function isMarkerActive(
  text: string,
  selection: Selection,
  marker: InlineMarker,
): boolean {
  return (
    isWrappedWith(text, selection, marker) ||
    isInsideMarkerSpan(text, selection, marker)
  );
}

export function placeholderForMarker(
  marker: InlineMarker,
  settings: FormattingSettings = defaultFormattingSettings,
): string {
  return resolvePlaceholders(settings)[placeholderKeys[marker]];
}

/**
 * Toggle a symmetric inline marker around the selection.
 *
 * An already wrapped selection is unwrapped; an empty selection receives the
 * marker pair around a selected placeholder; anything else is wrapped and
 * stays selected.
 */
export function wrapToggle(
  buffer: Buffer,
  marker: InlineMarker,
  settings: FormattingSettings = defaultFormattingSettings,
): Buffer {
  const { text, selection } = normalizeBuffer(buffer);
  const { start, end } = selection;
  const inner = selectedText({ text, selection });

  if (isWrappedWith(text, selection, marker)) {
    const from = start - marker.length;
    return withSelection(
      spliceText(text, from, end + marker.length, inner),
      from,
      from + inner.length,
    );
  }

  if (inner === "") {
    const placeholder = placeholderForMarker(marker, settings);
    return withSelection(
      spliceText(text, start, end, `${marker}${placeholder}${marker}`),
      start + marker.length,
      start + marker.length + placeholder.length,
    );
  }

  return withSelection(
    spliceText(text, start, end, `${marker}${inner}${marker}`),
    start + marker.length,
    end + marker.length,
  );
}

export function toggleBold(
  buffer: Buffer,
  settings?: FormattingSettings,
): Buffer {
  return wrapToggle(buffer, "**", settings);
}

export function toggleItalic(
  buffer: Buffer,
  settings?: FormattingSettings,
): Buffer {
  return wrapToggle(buffer, "*", settings);
}

export function toggleInlineCode(
  buffer: Buffer,
  settings?: FormattingSettings,
): Buffer {
  return wrapToggle(buffer, "`", settings);
}
