import { Notebook, StorageError, type NotebookData } from "@inkwell/vault-core";
import { AppState } from "./appState";
import { handleKey } from "./keymap";
import { charKey, namedKey, type KeyEvent } from "./modes";
import type { ExternalEditor, NotebookStorage } from "./services";

/** In-process stand-in for `FileNotebookStorage`. */
export class MemoryStorage implements NotebookStorage {
  readonly saves: NotebookData[] = [];
  readonly backups: Array<{ name: string; data: NotebookData }> = [];
  failure: string | null = null;

  save(notebook: Notebook): void {
    if (this.failure) {
      throw new StorageError("write-failed", this.failure);
    }
    this.saves.push(notebook.toData());
  }

  backup(): string {
    const latest = this.saves[this.saves.length - 1];
    if (!latest) {
      throw new StorageError("backup-failed", "Nothing to back up yet: the notebook has not been saved");
    }
    const name = `notebook_backup_2024010${this.backups.length + 1}_000000.json`;
    this.backups.push({ name, data: latest });
    return `/data/backups/${name}`;
  }

  listBackups(): string[] {
    return this.backups.map((entry) => `/data/backups/${entry.name}`).reverse();
  }

  restore(backupFile: string): Notebook {
    const entry = this.backups.find((candidate) => backupFile.endsWith(candidate.name));
    if (!entry) {
      throw new StorageError("read-failed", `Backup not found: ${backupFile}`);
    }
    return Notebook.fromData(entry.data);
  }
}

export class FakeEditor implements ExternalEditor {
  readonly edits: Array<{ title: string; content: string }> = [];

  constructor(
    readonly command: string | null = "fake-editor",
    private readonly rewrite: (content: string) => string = (content) => content
  ) {}

  edit(title: string, content: string): string {
    this.edits.push({ title, content });
    return this.rewrite(content);
  }
}

export const TEST_TIME = "2024-01-01T00:00:00.000Z";

export function createTestState(notebook = new Notebook(), externalEditor: ExternalEditor = new FakeEditor()) {
  const storage = new MemoryStorage();
  let now = Date.parse("2024-03-01T10:00:00.000Z");
  const state = new AppState({
    notebook,
    storage,
    externalEditor,
    exportDir: "unused-export-dir",
    clock: () => now
  });
  return {
    state,
    storage,
    advance(milliseconds: number) {
      now += milliseconds;
    }
  };
}

export function press(state: AppState, ...keys: KeyEvent[]): void {
  for (const key of keys) {
    handleKey(state, key);
  }
}

export function typeText(state: AppState, text: string): void {
  for (const char of text) {
    handleKey(state, charKey(char));
  }
}

export function runCommand(state: AppState, line: string): void {
  press(state, charKey(":"));
  typeText(state, line);
  press(state, namedKey("enter"));
}
