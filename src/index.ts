export * from "./markfmt";
export {
  bufferFromState,
  continueMarkdownList,
  createMarkdownCommands,
  createMarkdownKeyBindings,
  diffText,
  markdownCommands,
  markdownKeyBindings,
  toStateCommand,
} from "./codemirror/markdown-commands";
export type {
  MarkdownCommands,
  MarkdownKeyBinding,
  TextChange,
} from "./codemirror/markdown-commands";
