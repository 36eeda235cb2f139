import {
  defaultFormattingSettings,
  resolveToolbarStrings,
  type FormattingSettings,
} from "../core/settings";
import type { Buffer, FormatState } from "../core/types";
import { toggleBlockquote } from "../extensions/blockquote/blockquote";
import { insertCodeBlock } from "../extensions/code-block/code-block";
import { toggleHeading } from "../extensions/heading/heading";
import { insertHorizontalRule } from "../extensions/horizontal-rule/horizontal-rule";
import {
  toggleBold,
  toggleInlineCode,
  toggleItalic,
} from "../extensions/inline-marker/inline-marker";
import { insertLink } from "../extensions/link/link";
import {
  toggleBulletList,
  toggleNumberedList,
} from "../extensions/list/list";
import type { ToolbarStrings } from "../l10n/strings";

export type ToolbarCommandId =
  | "bold"
  | "italic"
  | "h1"
  | "h2"
  | "h3"
  | "inline_code"
  | "code_block"
  | "bullet_list"
  | "numbered_list"
  | "quote"
  | "link"
  | "horizontal_rule";

export type ToolbarCommand = {
  id: ToolbarCommandId;
  tooltip: string;
  /** Text shown instead of an icon, e.g. "H1". */
  label?: string;
  /** CodeMirror-style key, e.g. "Mod-b". */
  shortcut?: string;
  isActive: boolean;
};

export type ToolbarItem =
  | { type: "command"; command: ToolbarCommand }
  | { type: "divider" };

type CommandDefinition = {
  id: ToolbarCommandId;
  tooltip: keyof ToolbarStrings;
  label?: string;
  shortcut?: string;
  isActive: (state: FormatState) => boolean;
  run: (buffer: Buffer, settings: FormattingSettings) => Buffer;
};

const never = () => false;

const commandGroups: CommandDefinition[][] = [
  [
    {
      id: "bold",
      tooltip: "bold",
      shortcut: "Mod-b",
      isActive: (state) => state.isBold,
      run: toggleBold,
    },
    {
      id: "italic",
      tooltip: "italic",
      shortcut: "Mod-i",
      isActive: (state) => state.isItalic,
      run: toggleItalic,
    },
  ],
  [
    {
      id: "h1",
      tooltip: "heading1",
      label: "H1",
      isActive: (state) => state.headingLevel === 1,
      run: (buffer) => toggleHeading(buffer, 1),
    },
    {
      id: "h2",
      tooltip: "heading2",
      label: "H2",
      isActive: (state) => state.headingLevel === 2,
      run: (buffer) => toggleHeading(buffer, 2),
    },
    {
      id: "h3",
      tooltip: "heading3",
      label: "H3",
      isActive: (state) => state.headingLevel === 3,
      run: (buffer) => toggleHeading(buffer, 3),
    },
  ],
  [
    {
      id: "inline_code",
      tooltip: "inlineCode",
      shortcut: "Mod-`",
      isActive: (state) => state.isInlineCode,
      run: toggleInlineCode,
    },
    {
      id: "code_block",
      tooltip: "codeBlock",
      isActive: (state) => state.isCodeBlock,
      run: insertCodeBlock,
    },
  ],
  [
    {
      id: "bullet_list",
      tooltip: "bulletList",
      isActive: (state) => state.isBulletList,
      run: toggleBulletList,
    },
    {
      id: "numbered_list",
      tooltip: "numberedList",
      isActive: (state) => state.isNumberedList,
      run: toggleNumberedList,
    },
  ],
  [
    {
      id: "quote",
      tooltip: "quote",
      isActive: (state) => state.isBlockquote,
      run: toggleBlockquote,
    },
    { id: "link", tooltip: "link", isActive: never, run: insertLink },
    {
      id: "horizontal_rule",
      tooltip: "horizontalRule",
      isActive: never,
      run: insertHorizontalRule,
    },
  ],
];

const commandsById = new Map<string, CommandDefinition>(
  commandGroups.flat().map((definition) => [definition.id, definition]),
);

export function isToolbarCommandId(id: string): id is ToolbarCommandId {
  return commandsById.has(id);
}

/**
 * Toolbar buttons for the current format state, grouped and separated by
 * dividers.
 */
export function buildToolbarItems(
  state: FormatState,
  settings: FormattingSettings = defaultFormattingSettings,
): ToolbarItem[] {
  const strings = resolveToolbarStrings(settings);
  const items: ToolbarItem[] = [];

  commandGroups.forEach((group, index) => {
    if (index > 0) {
      items.push({ type: "divider" });
    }
    for (const definition of group) {
      const command: ToolbarCommand = {
        id: definition.id,
        tooltip: strings[definition.tooltip],
        isActive: definition.isActive(state),
      };
      if (definition.label) {
        command.label = definition.label;
      }
      if (definition.shortcut) {
        command.shortcut = definition.shortcut;
      }
      items.push({ type: "command", command });
    }
  });

  return items;
}

/**
 * Run a toolbar command by id. Ids come from the UI layer as plain strings;
 * an unknown id leaves the buffer as it is.
 */
export function applyToolbarCommand(
  buffer: Buffer,
  id: string,
  settings: FormattingSettings = defaultFormattingSettings,
): Buffer {
  const definition = commandsById.get(id);
  if (!definition) {
    console.warn(`Unknown toolbar command: ${id}`);
    return buffer;
  }
  return definition.run(buffer, settings);
}
