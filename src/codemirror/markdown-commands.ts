import type { EditorState, StateCommand } from "@codemirror/state";
import { EditorSelection, Transaction } from "@codemirror/state";
import {
  defaultFormattingSettings,
  type FormattingSettings,
} from "../markfmt/core/settings";
import type { Buffer, BufferMutator } from "../markfmt/core/types";
import { handleNewline } from "../markfmt/engine/newline";
import { toggleBlockquote } from "../markfmt/extensions/blockquote/blockquote";
import { insertCodeBlock } from "../markfmt/extensions/code-block/code-block";
import { toggleHeading } from "../markfmt/extensions/heading/heading";
import { insertHorizontalRule } from "../markfmt/extensions/horizontal-rule/horizontal-rule";
import {
  toggleBold,
  toggleInlineCode,
  toggleItalic,
} from "../markfmt/extensions/inline-marker/inline-marker";
import { insertLink } from "../markfmt/extensions/link/link";
import {
  toggleBulletList,
  toggleNumberedList,
} from "../markfmt/extensions/list/list";

export type TextChange = { from: number; to: number; insert: string };

export type MarkdownKeyBinding = { key: string; run: StateCommand };

// Smallest single replacement turning `before` into `after`, found by
// trimming the common prefix and suffix.
export function diffText(before: string, after: string): TextChange | null {
  if (before === after) {
    return null;
  }

  const max = Math.min(before.length, after.length);
  let prefix = 0;
  while (
    prefix < max &&
    before.charCodeAt(prefix) === after.charCodeAt(prefix)
  ) {
    prefix++;
  }

  let suffix = 0;
  while (
    suffix < max - prefix &&
    before.charCodeAt(before.length - 1 - suffix) ===
      after.charCodeAt(after.length - 1 - suffix)
  ) {
    suffix++;
  }

  return {
    from: prefix,
    to: before.length - suffix,
    insert: after.slice(prefix, after.length - suffix),
  };
}

// Only the main selection range takes part; formatting commands act on a
// single caret or range.
export function bufferFromState(state: EditorState): Buffer {
  const range = state.selection.main;
  return {
    text: state.doc.toString(),
    selection: { start: range.from, end: range.to },
  };
}

function dispatchBuffer(
  state: EditorState,
  dispatch: (transaction: Transaction) => void,
  before: Buffer,
  after: Buffer,
) {
  const change = diffText(before.text, after.text);
  dispatch(
    state.update({
      changes: change ?? [],
      selection: EditorSelection.single(
        after.selection.start,
        after.selection.end,
      ),
      scrollIntoView: true,
      annotations: Transaction.userEvent.of("input"),
    }),
  );
}

export function toStateCommand(mutator: BufferMutator): StateCommand {
  return ({ state, dispatch }) => {
    const before = bufferFromState(state);
    dispatchBuffer(state, dispatch, before, mutator(before));
    return true;
  };
}

// Enter binding: returns false when the line is not a list or quote so the
// default newline command runs.
export const continueMarkdownList: StateCommand = ({ state, dispatch }) => {
  const before = bufferFromState(state);
  const { buffer, handled } = handleNewline(before);
  if (!handled) {
    return false;
  }
  dispatchBuffer(state, dispatch, before, buffer);
  return true;
};

export type MarkdownCommands = {
  toggleBold: StateCommand;
  toggleItalic: StateCommand;
  toggleInlineCode: StateCommand;
  toggleHeading1: StateCommand;
  toggleHeading2: StateCommand;
  toggleHeading3: StateCommand;
  toggleBulletList: StateCommand;
  toggleNumberedList: StateCommand;
  toggleQuote: StateCommand;
  insertCodeBlock: StateCommand;
  insertLink: StateCommand;
  insertHorizontalRule: StateCommand;
  continueMarkdownList: StateCommand;
};

export function createMarkdownCommands(
  settings: FormattingSettings = defaultFormattingSettings,
): MarkdownCommands {
  return {
    toggleBold: toStateCommand((buffer) => toggleBold(buffer, settings)),
    toggleItalic: toStateCommand((buffer) => toggleItalic(buffer, settings)),
    toggleInlineCode: toStateCommand((buffer) =>
      toggleInlineCode(buffer, settings),
    ),
    toggleHeading1: toStateCommand((buffer) => toggleHeading(buffer, 1)),
    toggleHeading2: toStateCommand((buffer) => toggleHeading(buffer, 2)),
    toggleHeading3: toStateCommand((buffer) => toggleHeading(buffer, 3)),
    toggleBulletList: toStateCommand(toggleBulletList),
    toggleNumberedList: toStateCommand(toggleNumberedList),
    toggleQuote: toStateCommand(toggleBlockquote),
    insertCodeBlock: toStateCommand(insertCodeBlock),
    insertLink: toStateCommand((buffer) => insertLink(buffer, settings)),
    insertHorizontalRule: toStateCommand(insertHorizontalRule),
    continueMarkdownList,
  };
}

export function createMarkdownKeyBindings(
  commands: MarkdownCommands = createMarkdownCommands(),
): MarkdownKeyBinding[] {
  return [
    { key: "Mod-b", run: commands.toggleBold },
    { key: "Mod-i", run: commands.toggleItalic },
    { key: "Mod-`", run: commands.toggleInlineCode },
    { key: "Enter", run: commands.continueMarkdownList },
  ];
}

export const markdownCommands = createMarkdownCommands();

export const markdownKeyBindings = createMarkdownKeyBindings(markdownCommands);
