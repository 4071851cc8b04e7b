export type AppMode =
  | "normal"
  | "insert"
  | "search"
  | "search-advanced"
  | "search-replace"
  | "command"
  | "input-note"
  | "input-folder"
  | "move"
  | "help"
  | "delete-confirm";

export type FocusedPane = "folders" | "editor" | "preview";

export type NamedKey =
  | "enter"
  | "escape"
  | "backspace"
  | "delete"
  | "tab"
  | "up"
  | "down"
  | "left"
  | "right"
  | "pageUp"
  | "pageDown";

export type KeyEvent = { type: "char"; char: string; ctrl: boolean } | { type: NamedKey };

export function charKey(char: string): KeyEvent {
  return { type: "char", char, ctrl: false };
}

export function ctrlKey(char: string): KeyEvent {
  return { type: "char", char, ctrl: true };
}

export function namedKey(type: NamedKey): KeyEvent {
  return { type };
}

export const MODE_LABELS: Record<AppMode, string> = {
  normal: "NORMAL",
  insert: "INSERT",
  search: "SEARCH",
  "search-advanced": "ADV SEARCH",
  "search-replace": "REPLACE",
  command: "COMMAND",
  "input-note": "NEW NOTE",
  "input-folder": "NEW FOLDER",
  move: "MOVE",
  help: "HELP",
  "delete-confirm": "DELETE?"
};

export const PANE_LABELS: Record<FocusedPane, string> = {
  folders: "📁 FOLDERS",
  editor: "📝 EDITOR",
  preview: "👁️ PREVIEW"
};
