import type { Notebook } from "@inkwell/vault-core";

/** Persistence the state machine relies on; `FileNotebookStorage` is the production one. */
export interface NotebookStorage {
  save(notebook: Notebook): void;
  backup(): string;
  /** Newest first. */
  listBackups(): string[];
  restore(backupFile: string): Notebook;
}

export interface ExternalEditor {
  /** Resolved editor command, or null when none is available. */
  readonly command: string | null;
  /** Blocks until the editor exits and returns the edited text. */
  edit(title: string, content: string): string;
}
