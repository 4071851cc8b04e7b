import { randomUUID } from "node:crypto";
import type { Folder, Note } from "./types";

function nowIso(): string {
  return new Date().toISOString();
}

/** Never earlier than `createdAt`, even when the clock moved backwards. */
function touchedAt(note: Note, now: string): string {
  return now < note.createdAt ? note.createdAt : now;
}

export function createNote(title: string, folderId?: string, now = nowIso()): Note {
  return {
    id: randomUUID(),
    title,
    content: "",
    ...(folderId ? { folderId } : {}),
    createdAt: now,
    modifiedAt: now,
    tags: []
  };
}

export function createFolder(name: string, parentId?: string, now = nowIso()): Folder {
  return {
    id: randomUUID(),
    name,
    ...(parentId ? { parentId } : {}),
    createdAt: now,
    expanded: true
  };
}

export function withContent(note: Note, content: string, now = nowIso()): Note {
  return { ...note, content, modifiedAt: touchedAt(note, now) };
}

export function withTitle(note: Note, title: string, now = nowIso()): Note {
  return { ...note, title, modifiedAt: touchedAt(note, now) };
}

export function withFolder(note: Note, folderId: string | null, now = nowIso()): Note {
  const { folderId: _previous, ...rest } = note;
  return {
    ...rest,
    ...(folderId ? { folderId } : {}),
    modifiedAt: touchedAt(note, now)
  };
}

export function withTag(note: Note, tag: string, now = nowIso()): Note {
  if (note.tags.includes(tag)) {
    return note;
  }
  return { ...note, tags: [...note.tags, tag], modifiedAt: touchedAt(note, now) };
}

export function withoutTag(note: Note, tag: string, now = nowIso()): Note {
  if (!note.tags.includes(tag)) {
    return note;
  }
  return { ...note, tags: note.tags.filter((entry) => entry !== tag), modifiedAt: touchedAt(note, now) };
}
