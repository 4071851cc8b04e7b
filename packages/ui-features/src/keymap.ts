import type { AppState } from "./appState";
import { executeCommand } from "./commands";
import type { AppMode, KeyEvent } from "./modes";

type KeyHandler = (state: AppState, key: KeyEvent) => void;
type TextBuffer = "inputBuffer" | "commandBuffer";

/** Plain typing and backspace for the prompt modes. Returns true when the key was consumed. */
function editText(state: AppState, key: KeyEvent, buffer: TextBuffer): boolean {
  if (key.type === "char" && !key.ctrl) {
    state[buffer] += key.char;
    return true;
  }
  if (key.type === "backspace") {
    state[buffer] = state[buffer].slice(0, -1);
    return true;
  }
  return false;
}

function moveVertically(state: AppState, direction: 1 | -1): void {
  if (state.isReading()) {
    state.scrollLines(direction);
  } else if (direction > 0) {
    state.navigateDown();
  } else {
    state.navigateUp();
  }
}

function jump(state: AppState, toEnd: boolean): void {
  if (state.isReading()) {
    if (toEnd) {
      state.editor.scrollToBottom();
    } else {
      state.editor.scrollToTop();
    }
  } else if (toEnd) {
    state.navigateToBottom();
  } else {
    state.navigateToTop();
  }
}

function handleNormalCtrl(state: AppState, char: string): void {
  switch (char) {
    case "f":
      state.startAdvancedSearch();
      break;
    case "r":
      state.startReplace();
      break;
    case "s":
      state.writeNote();
      break;
    case "u":
      if (state.isReading()) {
        state.scrollHalfPage(-1);
      }
      break;
    case "d":
      if (state.isReading()) {
        state.scrollHalfPage(1);
      }
      break;
    default:
      break;
  }
}

function handleNormal(state: AppState, key: KeyEvent): void {
  if (key.type !== "char") {
    switch (key.type) {
      case "down":
        moveVertically(state, 1);
        break;
      case "up":
        moveVertically(state, -1);
        break;
      case "tab":
        state.cyclePane();
        break;
      case "enter":
        state.activateSelection();
        break;
      case "pageUp":
        if (state.isReading()) {
          state.scrollPage(-1);
        }
        break;
      case "pageDown":
        if (state.isReading()) {
          state.scrollPage(1);
        }
        break;
      default:
        break;
    }
    return;
  }

  if (key.ctrl) {
    handleNormalCtrl(state, key.char);
    return;
  }

  const selected = state.selectedItem();
  switch (key.char) {
    case "j":
      moveVertically(state, 1);
      break;
    case "k":
      moveVertically(state, -1);
      break;
    case "g":
      jump(state, false);
      break;
    case "G":
      jump(state, true);
      break;
    case "n":
      state.startNoteInput(selected?.type === "folder" ? selected.id : null);
      break;
    case "f":
      state.startFolderInput(null);
      break;
    case "F":
      state.startFolderInput(selected ? state.folderContext(selected) : null);
      break;
    case "i":
      state.startInsert();
      break;
    case "e":
      state.openInExternalEditor();
      break;
    case "d":
      state.startDelete();
      break;
    case "m":
      state.startMove();
      break;
    case "p":
      state.togglePreview();
      break;
    case "/":
      state.inputBuffer = "";
      state.mode = "search";
      break;
    case ":":
      state.commandBuffer = "";
      state.mode = "command";
      break;
    case "?":
      state.mode = "help";
      break;
    case "q":
      state.quit();
      break;
    default:
      break;
  }
}

function handleInsertCtrl(state: AppState, char: string): void {
  switch (char) {
    case "s":
      state.writeNote();
      break;
    case "t":
      state.togglePreview();
      break;
    case "u":
      state.scrollHalfPage(-1);
      break;
    case "d":
      state.scrollHalfPage(1);
      break;
    case "n":
      state.completion.next();
      break;
    case "p":
      state.completion.previous();
      break;
    default:
      break;
  }
}

function handleInsert(state: AppState, key: KeyEvent): void {
  const { editor, completion } = state;

  switch (key.type) {
    case "char":
      if (key.ctrl) {
        handleInsertCtrl(state, key.char);
        return;
      }
      editor.insert(key.char);
      state.markModified();
      state.updateCompletions();
      break;
    case "escape":
      if (completion.active) {
        completion.deactivate();
      } else {
        state.leaveInsert();
      }
      return;
    case "tab":
      if (state.applyCompletion()) {
        return;
      }
      editor.tab();
      state.markModified();
      break;
    case "enter":
      completion.deactivate();
      editor.newline();
      state.markModified();
      break;
    case "backspace":
      if (editor.backspace()) {
        state.markModified();
        state.updateCompletions();
      }
      break;
    case "delete":
      completion.deactivate();
      if (editor.deleteForward()) {
        state.markModified();
      }
      break;
    case "up":
      if (completion.active) {
        completion.previous();
        return;
      }
      editor.moveUp();
      break;
    case "down":
      if (completion.active) {
        completion.next();
        return;
      }
      editor.moveDown();
      break;
    case "left":
      completion.deactivate();
      editor.moveLeft();
      break;
    case "right":
      completion.deactivate();
      editor.moveRight();
      break;
    case "pageUp":
      state.scrollPage(-1);
      return;
    case "pageDown":
      state.scrollPage(1);
      return;
  }
  state.followCursor();
}

function handleSearch(state: AppState, key: KeyEvent): void {
  if (editText(state, key, "inputBuffer")) {
    return;
  }
  if (key.type === "escape") {
    state.inputBuffer = "";
    state.mode = "normal";
  } else if (key.type === "enter") {
    const query = state.inputBuffer;
    state.inputBuffer = "";
    state.mode = "normal";
    if (query) {
      state.quickSearch(query);
    }
  }
}

function handleAdvancedSearch(state: AppState, key: KeyEvent): void {
  if (editText(state, key, "inputBuffer")) {
    return;
  }
  switch (key.type) {
    case "escape":
      state.inputBuffer = "";
      state.mode = "normal";
      break;
    case "enter": {
      const query = state.inputBuffer;
      state.inputBuffer = "";
      state.mode = "normal";
      if (query) {
        state.advancedSearch(query);
      }
      break;
    }
    case "up":
      state.historyBack();
      break;
    case "down":
      state.historyForward();
      break;
    default:
      break;
  }
}

function handleReplace(state: AppState, key: KeyEvent): void {
  if (key.type === "char" && key.ctrl) {
    if (key.char === "r") {
      state.toggleReplaceRegex();
    } else if (key.char === "c") {
      state.toggleReplaceCase();
    }
    return;
  }
  if (editText(state, key, "inputBuffer")) {
    return;
  }
  if (key.type === "escape") {
    state.inputBuffer = "";
    state.mode = "normal";
  } else if (key.type === "enter") {
    const input = state.inputBuffer;
    state.inputBuffer = "";
    state.mode = "normal";
    state.replaceInCurrentNote(input);
  }
}

function handleCommand(state: AppState, key: KeyEvent): void {
  if (editText(state, key, "commandBuffer")) {
    return;
  }
  if (key.type === "escape") {
    state.commandBuffer = "";
    state.mode = "normal";
  } else if (key.type === "enter") {
    const line = state.commandBuffer;
    state.commandBuffer = "";
    state.mode = "normal";
    executeCommand(state, line);
  }
}

function handleNameInput(finish: (state: AppState) => void): KeyHandler {
  return (state, key) => {
    if (editText(state, key, "inputBuffer")) {
      return;
    }
    if (key.type === "escape") {
      state.cancelInput();
    } else if (key.type === "enter") {
      finish(state);
    }
  };
}

function handleMove(state: AppState, key: KeyEvent): void {
  const char = key.type === "char" && !key.ctrl ? key.char : null;
  if (key.type === "escape") {
    state.cancelMove();
  } else if (key.type === "enter") {
    state.executeMove();
  } else if (key.type === "down" || char === "j") {
    state.navigateDown();
  } else if (key.type === "up" || char === "k") {
    state.navigateUp();
  } else if (char === "g") {
    state.navigateToTop();
  } else if (char === "G") {
    state.navigateToBottom();
  } else if (char === "?") {
    state.feedback.setMessage("Move mode: j/k=navigate, Enter=move to selected location, Esc=cancel");
  }
}

function handleHelp(state: AppState, key: KeyEvent): void {
  if (key.type === "escape" || (key.type === "char" && (key.char === "?" || key.char === "q"))) {
    state.mode = "normal";
  }
}

function handleDeleteConfirm(state: AppState, key: KeyEvent): void {
  const confirmed = key.type === "enter" || (key.type === "char" && !key.ctrl && (key.char === "y" || key.char === "Y"));
  if (confirmed) {
    state.confirmDelete();
  } else {
    state.cancelDelete();
  }
}

const HANDLERS: Record<AppMode, KeyHandler> = {
  normal: handleNormal,
  insert: handleInsert,
  search: handleSearch,
  "search-advanced": handleAdvancedSearch,
  "search-replace": handleReplace,
  command: handleCommand,
  "input-note": handleNameInput((state) => state.finishNoteInput()),
  "input-folder": handleNameInput((state) => state.finishFolderInput()),
  move: handleMove,
  help: handleHelp,
  "delete-confirm": handleDeleteConfirm
};

export function handleKey(state: AppState, key: KeyEvent): void {
  HANDLERS[state.mode](state, key);
}
