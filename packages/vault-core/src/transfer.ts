import { existsSync, mkdirSync, readdirSync, readFileSync, statSync, writeFileSync } from "node:fs";
import { extname, join, parse } from "node:path";
import { formatNoteForExport, parseMarkdownNote, sanitizeFileName } from "@inkwell/doc-engine";
import { NotebookError, StorageError, errorMessage } from "./errors";
import { createNote } from "./note";
import type { Notebook } from "./notebook";
import type { Note } from "./types";

export interface ImportFailure {
  file: string;
  reason: string;
}

export interface ImportReport {
  imported: Note[];
  failures: ImportFailure[];
}

function uniqueFileName(base: string, taken: Set<string>): string {
  let candidate = `${base}.md`;
  for (let suffix = 2; taken.has(candidate.toLowerCase()); suffix += 1) {
    candidate = `${base} (${suffix}).md`;
  }
  taken.add(candidate.toLowerCase());
  return candidate;
}

/** Writes one markdown file per note and returns the written paths. */
export function exportNotes(notebook: Notebook, directory: string): string[] {
  try {
    mkdirSync(directory, { recursive: true });
  } catch (error) {
    throw new StorageError("write-failed", `Failed to create export directory: ${errorMessage(error, "unknown error")}`, {
      cause: error
    });
  }

  const taken = new Set<string>();
  const written: string[] = [];
  for (const note of notebook.notes.values()) {
    const target = join(directory, uniqueFileName(sanitizeFileName(note.title), taken));
    try {
      writeFileSync(target, formatNoteForExport(note), "utf8");
    } catch (error) {
      throw new StorageError("write-failed", `Failed to write note '${note.title}': ${errorMessage(error, "unknown error")}`, {
        cause: error
      });
    }
    written.push(target);
  }
  return written;
}

function importFile(notebook: Notebook, path: string): Note {
  const raw = readFileSync(path, "utf8");
  const parsed = parseMarkdownNote(raw, parse(path).name);

  if (notebook.findNoteByTitle(parsed.title)) {
    throw new NotebookError("duplicate-title", `Note with title '${parsed.title}' already exists`);
  }

  const base = createNote(parsed.title);
  const createdAt = parsed.createdAt ?? base.createdAt;
  const modifiedAt = parsed.modifiedAt && parsed.modifiedAt >= createdAt ? parsed.modifiedAt : createdAt;
  const note: Note = {
    ...base,
    content: parsed.content,
    tags: parsed.tags,
    createdAt,
    modifiedAt,
    filePath: path
  };
  notebook.addNote(note);
  return note;
}

/** Imports every `.md` file of a directory; failures are collected per file. */
export function importNotes(notebook: Notebook, directory: string): ImportReport {
  if (!existsSync(directory)) {
    throw new StorageError("read-failed", "Import directory does not exist");
  }

  let entries: string[];
  try {
    entries = readdirSync(directory).sort();
  } catch (error) {
    throw new StorageError("read-failed", `Failed to read import directory: ${errorMessage(error, "unknown error")}`, {
      cause: error
    });
  }

  const report: ImportReport = { imported: [], failures: [] };
  for (const name of entries) {
    const path = join(directory, name);
    if (extname(name) !== ".md") {
      continue;
    }

    try {
      if (!statSync(path).isFile()) {
        continue;
      }
      report.imported.push(importFile(notebook, path));
    } catch (error) {
      report.failures.push({ file: name, reason: errorMessage(error, "unreadable file") });
    }
  }
  return report;
}
