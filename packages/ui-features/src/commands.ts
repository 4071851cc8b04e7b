import type { AppState } from "./appState";

type CommandHandler = (state: AppState, argument: string) => void;

const COMMANDS: Record<string, CommandHandler> = {
  q: (state) => state.quit(),
  quit: (state) => state.quit(),
  w: (state) => {
    state.writeNote();
  },
  write: (state) => {
    state.writeNote();
  },
  wq: (state) => {
    if (state.writeNote()) {
      state.quit();
    }
  },
  export: (state, directory) => state.exportToDirectory(directory || undefined),
  import: (state, directory) => {
    if (!directory) {
      state.feedback.error("Usage: import <directory>");
      return;
    }
    state.importFromDirectory(directory);
  },
  backup: (state) => state.createBackup(),
  backups: (state) => state.showBackups(),
  restore: (state, file) => state.restoreBackup(file || undefined),
  tag: (state, tag) => state.tagCurrentNote(tag),
  untag: (state, tag) => state.untagCurrentNote(tag),
  rename: (state, name) => state.renameSelected(name),
  clearhistory: (state) => state.clearSearchHistory()
};

/** Runs a `:` command line such as `export ~/notes` or `wq`. */
export function executeCommand(state: AppState, input: string): void {
  const line = input.trim();
  if (!line) {
    return;
  }

  const separator = line.search(/\s/);
  const name = separator === -1 ? line : line.slice(0, separator);
  const argument = separator === -1 ? "" : line.slice(separator).trim();
  const handler = Object.hasOwn(COMMANDS, name) ? COMMANDS[name] : undefined;
  if (!handler) {
    state.feedback.setMessage(`Unknown command: ${line}`);
    return;
  }
  handler(state, argument);
}
