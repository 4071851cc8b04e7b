import { NotebookError } from "./errors";
import { withFolder } from "./note";
import type { Folder, FolderTreeNode, Note, NotebookData } from "./types";

export class Notebook {
  readonly folders = new Map<string, Folder>();
  readonly notes = new Map<string, Note>();
  rootFolderIds: string[] = [];

  static fromData(data: NotebookData): Notebook {
    const notebook = new Notebook();
    for (const [id, folder] of Object.entries(data.folders)) {
      notebook.folders.set(id, folder);
    }
    for (const [id, note] of Object.entries(data.notes)) {
      notebook.notes.set(id, note);
    }
    // Listed roots keep their order; parentless folders the list missed go last.
    const roots = new Set<string>();
    for (const id of data.rootFolderIds) {
      const folder = notebook.folders.get(id);
      if (folder && folder.parentId === undefined) {
        roots.add(id);
      }
    }
    for (const [id, folder] of notebook.folders) {
      if (folder.parentId === undefined) {
        roots.add(id);
      }
    }
    notebook.rootFolderIds = [...roots];
    return notebook;
  }

  toData(): NotebookData {
    return {
      folders: Object.fromEntries(this.folders),
      notes: Object.fromEntries(this.notes),
      rootFolderIds: [...this.rootFolderIds]
    };
  }

  isEmpty(): boolean {
    return this.folders.size === 0 && this.notes.size === 0;
  }

  addFolder(folder: Folder): void {
    if (folder.parentId === undefined && !this.rootFolderIds.includes(folder.id)) {
      this.rootFolderIds.push(folder.id);
    }
    this.folders.set(folder.id, folder);
  }

  addNote(note: Note): void {
    this.notes.set(note.id, note);
  }

  /** Commits a working copy back into the notebook. */
  putNote(note: Note): void {
    this.notes.set(note.id, note);
  }

  removeNote(noteId: string): void {
    this.notes.delete(noteId);
  }

  removeFolder(folderId: string): void {
    if (!this.folders.has(folderId)) {
      throw new NotebookError("not-found", "Folder not found");
    }

    const hasChildren = [...this.folders.values()].some((folder) => folder.parentId === folderId);
    if (hasChildren) {
      throw new NotebookError("has-children", "Cannot delete folder with subfolders");
    }

    const hasNotes = [...this.notes.values()].some((note) => note.folderId === folderId);
    if (hasNotes) {
      throw new NotebookError("has-notes", "Cannot delete folder with notes");
    }

    this.rootFolderIds = this.rootFolderIds.filter((id) => id !== folderId);
    this.folders.delete(folderId);
  }

  renameFolder(folderId: string, name: string): void {
    const folder = this.folders.get(folderId);
    if (!folder) {
      throw new NotebookError("not-found", "Folder not found");
    }
    this.folders.set(folderId, { ...folder, name });
  }

  toggleExpanded(folderId: string): boolean {
    const folder = this.folders.get(folderId);
    if (!folder) {
      return false;
    }
    this.folders.set(folderId, { ...folder, expanded: !folder.expanded });
    return true;
  }

  /** Expands every folder on the path to the note so it shows up in the tree. */
  expandAncestors(noteId: string): void {
    const visited = new Set<string>();
    let folderId = this.notes.get(noteId)?.folderId;
    while (folderId && !visited.has(folderId)) {
      visited.add(folderId);
      const folder = this.folders.get(folderId);
      if (!folder) {
        return;
      }
      if (!folder.expanded) {
        this.folders.set(folderId, { ...folder, expanded: true });
      }
      folderId = folder.parentId;
    }
  }

  getFolderNotes(folderId: string | null): Note[] {
    return [...this.notes.values()].filter((note) => (note.folderId ?? null) === folderId);
  }

  findNoteByTitle(title: string): Note | undefined {
    return [...this.notes.values()].find((note) => note.title === title);
  }

  buildFolderTree(): FolderTreeNode[] {
    const childFolders = new Map<string, Folder[]>();
    for (const folder of this.folders.values()) {
      if (folder.parentId !== undefined) {
        const siblings = childFolders.get(folder.parentId) ?? [];
        siblings.push(folder);
        childFolders.set(folder.parentId, siblings);
      }
    }

    const folderNotes = new Map<string, Note[]>();
    for (const note of this.notes.values()) {
      if (note.folderId !== undefined) {
        const owned = folderNotes.get(note.folderId) ?? [];
        owned.push(note);
        folderNotes.set(note.folderId, owned);
      }
    }

    const buildNode = (folder: Folder, depth: number): FolderTreeNode => ({
      folder,
      depth,
      notes: folderNotes.get(folder.id) ?? [],
      children: (childFolders.get(folder.id) ?? []).map((child) => buildNode(child, depth + 1))
    });

    const tree: FolderTreeNode[] = [];
    for (const rootId of this.rootFolderIds) {
      const folder = this.folders.get(rootId);
      if (folder) {
        tree.push(buildNode(folder, 0));
      }
    }
    return tree;
  }

  searchNotes(query: string): Note[] {
    const needle = query.toLowerCase();
    return [...this.notes.values()].filter(
      (note) =>
        note.title.toLowerCase().includes(needle) ||
        note.content.toLowerCase().includes(needle) ||
        note.tags.some((tag) => tag.toLowerCase().includes(needle))
    );
  }

  /** True when `ancestorId` is `folderId` itself or sits on its parent chain. */
  isFolderAncestor(ancestorId: string, folderId: string): boolean {
    const visited = new Set<string>();
    let current: string | undefined = folderId;
    while (current !== undefined && !visited.has(current)) {
      if (current === ancestorId) {
        return true;
      }
      visited.add(current);
      current = this.folders.get(current)?.parentId;
    }
    return false;
  }

  moveNote(noteId: string, destinationId: string | null, now?: string): Note {
    const note = this.notes.get(noteId);
    if (!note) {
      throw new NotebookError("not-found", "Note not found");
    }
    if ((note.folderId ?? null) === destinationId) {
      throw new NotebookError("same-location", "Note is already in this location");
    }
    if (destinationId !== null && !this.folders.has(destinationId)) {
      throw new NotebookError("not-found", "Destination folder not found");
    }

    const moved = withFolder(note, destinationId, now);
    this.notes.set(noteId, moved);
    return moved;
  }

  moveFolder(folderId: string, destinationId: string | null): void {
    const folder = this.folders.get(folderId);
    if (!folder) {
      throw new NotebookError("not-found", "Folder not found");
    }
    if (destinationId !== null && this.isFolderAncestor(folderId, destinationId)) {
      throw new NotebookError("cyclic-move", "Cannot move folder into its own subfolder");
    }
    if ((folder.parentId ?? null) === destinationId) {
      throw new NotebookError("same-location", "Folder is already in this location");
    }
    if (destinationId !== null && !this.folders.has(destinationId)) {
      throw new NotebookError("not-found", "Destination folder not found");
    }

    const { parentId: _previous, ...rest } = folder;
    if (destinationId === null) {
      this.folders.set(folderId, rest);
      if (!this.rootFolderIds.includes(folderId)) {
        this.rootFolderIds.push(folderId);
      }
      return;
    }

    this.rootFolderIds = this.rootFolderIds.filter((id) => id !== folderId);
    this.folders.set(folderId, { ...rest, parentId: destinationId });
  }
}
