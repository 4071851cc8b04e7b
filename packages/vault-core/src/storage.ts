import { copyFileSync, existsSync, mkdirSync, readdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { basename, join } from "node:path";
import { StorageError, errorMessage } from "./errors";
import { Notebook } from "./notebook";
import type { Folder, Note, NotebookData } from "./types";

const NOTEBOOK_FILE = "notebook.json";
const BACKUP_DIR = "backups";
const BACKUP_PREFIX = "notebook_backup_";

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === "string");
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === "string";
}

export function isNote(value: unknown): value is Note {
  if (!value || typeof value !== "object") {
    return false;
  }

  const note = value as Partial<Note>;
  return (
    typeof note.id === "string" &&
    typeof note.title === "string" &&
    typeof note.content === "string" &&
    typeof note.createdAt === "string" &&
    typeof note.modifiedAt === "string" &&
    isStringArray(note.tags) &&
    isOptionalString(note.folderId) &&
    isOptionalString(note.filePath)
  );
}

export function isFolder(value: unknown): value is Folder {
  if (!value || typeof value !== "object") {
    return false;
  }

  const folder = value as Partial<Folder>;
  return (
    typeof folder.id === "string" &&
    typeof folder.name === "string" &&
    typeof folder.createdAt === "string" &&
    typeof folder.expanded === "boolean" &&
    isOptionalString(folder.parentId)
  );
}

function isRecordOf<T>(value: unknown, guard: (entry: unknown) => entry is T): value is Record<string, T> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && Object.values(value).every(guard);
}

export function isNotebookData(value: unknown): value is NotebookData {
  if (!value || typeof value !== "object") {
    return false;
  }

  const data = value as Partial<NotebookData>;
  return isRecordOf(data.folders, isFolder) && isRecordOf(data.notes, isNote) && isStringArray(data.rootFolderIds);
}

export function serializeNotebook(notebook: Notebook): string {
  return JSON.stringify(notebook.toData(), null, 2);
}

export function deserializeNotebook(raw: string): Notebook {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new StorageError("invalid-data", `Notebook file is not valid JSON: ${errorMessage(error, "parse error")}`, {
      cause: error
    });
  }

  if (!isNotebookData(parsed)) {
    throw new StorageError("invalid-data", "Notebook file has an unexpected shape");
  }
  return Notebook.fromData(parsed);
}

function backupStamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, "")}_${iso.slice(11, 19).replace(/:/g, "")}`;
}

export class FileNotebookStorage {
  readonly notebookFile: string;
  readonly backupDir: string;

  constructor(readonly dataDir: string) {
    this.notebookFile = join(dataDir, NOTEBOOK_FILE);
    this.backupDir = join(dataDir, BACKUP_DIR);
  }

  exists(): boolean {
    return existsSync(this.notebookFile);
  }

  load(): Notebook {
    if (!this.exists()) {
      return new Notebook();
    }

    let raw: string;
    try {
      raw = readFileSync(this.notebookFile, "utf8");
    } catch (error) {
      throw new StorageError("read-failed", `Failed to read ${this.notebookFile}: ${errorMessage(error, "unknown error")}`, {
        cause: error
      });
    }
    return deserializeNotebook(raw);
  }

  save(notebook: Notebook): void {
    const temporary = `${this.notebookFile}.tmp`;
    try {
      mkdirSync(this.dataDir, { recursive: true });
      writeFileSync(temporary, serializeNotebook(notebook), "utf8");
      renameSync(temporary, this.notebookFile);
    } catch (error) {
      throw new StorageError("write-failed", `Failed to save notebook: ${errorMessage(error, "unknown error")}`, {
        cause: error
      });
    }
  }

  backup(now = new Date()): string {
    if (!this.exists()) {
      throw new StorageError("backup-failed", "Nothing to back up yet: the notebook has not been saved");
    }

    const target = join(this.backupDir, `${BACKUP_PREFIX}${backupStamp(now)}.json`);
    try {
      mkdirSync(this.backupDir, { recursive: true });
      copyFileSync(this.notebookFile, target);
    } catch (error) {
      throw new StorageError("backup-failed", `Backup failed: ${errorMessage(error, "unknown error")}`, { cause: error });
    }
    return target;
  }

  /** Newest first. */
  listBackups(): string[] {
    if (!existsSync(this.backupDir)) {
      return [];
    }

    return readdirSync(this.backupDir)
      .filter((name) => name.startsWith(BACKUP_PREFIX) && name.endsWith(".json"))
      .sort()
      .reverse()
      .map((name) => join(this.backupDir, name));
  }

  restore(backupFile: string): Notebook {
    const source = basename(backupFile) === backupFile ? join(this.backupDir, backupFile) : backupFile;
    if (!existsSync(source)) {
      throw new StorageError("read-failed", `Backup not found: ${backupFile}`);
    }

    const notebook = deserializeNotebook(readFileSync(source, "utf8"));
    try {
      mkdirSync(this.dataDir, { recursive: true });
      copyFileSync(source, this.notebookFile);
    } catch (error) {
      throw new StorageError("write-failed", `Failed to restore backup: ${errorMessage(error, "unknown error")}`, {
        cause: error
      });
    }
    return notebook;
  }
}
