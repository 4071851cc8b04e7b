import type { Key } from "ink";
import { charKey, ctrlKey, namedKey, type KeyEvent } from "@inkwell/ui-features";

export type KeyFlags = Pick<
  Key,
  | "upArrow"
  | "downArrow"
  | "leftArrow"
  | "rightArrow"
  | "pageUp"
  | "pageDown"
  | "return"
  | "escape"
  | "ctrl"
  | "tab"
  | "backspace"
  | "delete"
>;

/** Translates one Ink input callback into state machine key events. */
export function toKeyEvents(input: string, key: KeyFlags): KeyEvent[] {
  if (key.return) {
    return [namedKey("enter")];
  }
  if (key.escape) {
    return [namedKey("escape")];
  }
  if (key.tab) {
    return [namedKey("tab")];
  }
  // Most terminals send DEL for the Backspace key, which Ink reports as `delete`.
  if (key.backspace || key.delete) {
    return [namedKey("backspace")];
  }
  if (key.upArrow) {
    return [namedKey("up")];
  }
  if (key.downArrow) {
    return [namedKey("down")];
  }
  if (key.leftArrow) {
    return [namedKey("left")];
  }
  if (key.rightArrow) {
    return [namedKey("right")];
  }
  if (key.pageUp) {
    return [namedKey("pageUp")];
  }
  if (key.pageDown) {
    return [namedKey("pageDown")];
  }
  if (key.ctrl) {
    return input ? [ctrlKey(input.toLowerCase())] : [];
  }

  const events: KeyEvent[] = [];
  for (const char of input.replace(/\r\n?/g, "\n")) {
    events.push(char === "\n" ? namedKey("enter") : char === "\t" ? namedKey("tab") : charKey(char));
  }
  return events;
}
