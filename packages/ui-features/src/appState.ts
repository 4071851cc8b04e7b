import { basename } from "node:path";
import { AutocompleteState, MarkdownAutocomplete, applySuggestion } from "@inkwell/doc-engine";
import {
  SearchEngine,
  createSearchQuery,
  parseAdvancedQuery,
  type ReplaceResult,
  type SearchQuery,
  type SearchResult
} from "@inkwell/indexer";
import {
  NotebookError,
  createFolder,
  createNote,
  errorMessage,
  exportNotes,
  flattenTree,
  importNotes,
  withContent,
  withTag,
  withTitle,
  withoutTag,
  type Folder,
  type ImportReport,
  type Notebook,
  type Note,
  type TreeItem,
  type TreeItemType
} from "@inkwell/vault-core";
import { EditorBuffer, HALF_PAGE_LINES, PAGE_LINES } from "./editor";
import { StatusFeedback } from "./feedback";
import { MAX_SUGGESTION_ROWS } from "./layout";
import type { AppMode, FocusedPane } from "./modes";
import type { ExternalEditor, NotebookStorage } from "./services";

export interface PendingItem {
  id: string;
  type: TreeItemType;
  name: string;
}

export interface ReplaceOptions {
  isRegex: boolean;
  caseSensitive: boolean;
}

export interface AppStateOptions {
  notebook: Notebook;
  storage: NotebookStorage;
  externalEditor: ExternalEditor;
  exportDir: string;
  clock?: () => number;
  feedbackTtlMs?: number;
}

export const DEFAULT_VIEWPORT_HEIGHT = 20;

export class AppState {
  notebook: Notebook;
  readonly search = new SearchEngine();
  readonly autocomplete = new MarkdownAutocomplete();
  readonly completion = new AutocompleteState();
  readonly editor = new EditorBuffer();
  readonly feedback: StatusFeedback;

  mode: AppMode = "normal";
  focusedPane: FocusedPane = "folders";
  previewEnabled = false;
  shouldQuit = false;

  treeItems: TreeItem[] = [];
  selectedIndex = 0;
  /** Last committed version of the note open in the editor. */
  currentNote: Note | null = null;

  inputBuffer = "";
  commandBuffer = "";
  pendingParentId: string | null = null;
  pendingMove: PendingItem | null = null;
  pendingDelete: PendingItem | null = null;
  replaceOptions: ReplaceOptions = { isRegex: false, caseSensitive: false };
  historyCursor = -1;

  searchResults: SearchResult<Note>[] = [];
  legacyResults: Note[] = [];
  viewportHeight = DEFAULT_VIEWPORT_HEIGHT;

  readonly exportDir: string;
  private readonly storage: NotebookStorage;
  private readonly externalEditor: ExternalEditor;
  private readonly clock: () => number;

  constructor(options: AppStateOptions) {
    this.notebook = options.notebook;
    this.storage = options.storage;
    this.externalEditor = options.externalEditor;
    this.exportDir = options.exportDir;
    this.clock = options.clock ?? Date.now;
    this.feedback = new StatusFeedback({ clock: this.clock, ttlMs: options.feedbackTtlMs });
    this.refreshTree();
  }

  private now(): string {
    return new Date(this.clock()).toISOString();
  }

  get externalEditorCommand(): string | null {
    return this.externalEditor.command;
  }

  // Tree

  refreshTree(): void {
    this.treeItems = flattenTree(this.notebook);
    this.selectedIndex = Math.max(0, Math.min(this.selectedIndex, this.treeItems.length - 1));
  }

  selectedItem(): TreeItem | undefined {
    return this.treeItems[this.selectedIndex];
  }

  selectItem(id: string): boolean {
    const index = this.treeItems.findIndex((item) => item.id === id);
    if (index === -1) {
      return false;
    }
    this.selectedIndex = index;
    return true;
  }

  navigateUp(): void {
    this.selectedIndex = Math.max(0, this.selectedIndex - 1);
  }

  navigateDown(): void {
    this.selectedIndex = Math.max(0, Math.min(this.selectedIndex + 1, this.treeItems.length - 1));
  }

  navigateToTop(): void {
    this.selectedIndex = 0;
  }

  navigateToBottom(): void {
    this.selectedIndex = Math.max(0, this.treeItems.length - 1);
  }

  /** The folder an item stands for as a destination or parent: itself, or a note's folder. */
  folderContext(item: TreeItem): string | null {
    if (item.type === "folder") {
      return item.id;
    }
    const folderId = this.notebook.notes.get(item.id)?.folderId;
    return folderId !== undefined && this.notebook.folders.has(folderId) ? folderId : null;
  }

  findFolderByName(name: string): Folder | undefined {
    const folders = [...this.notebook.folders.values()];
    const lowered = name.toLowerCase();
    return folders.find((folder) => folder.name === name) ?? folders.find((folder) => folder.name.toLowerCase() === lowered);
  }

  activateSelection(): void {
    const item = this.selectedItem();
    if (!item) {
      return;
    }
    if (item.type === "note") {
      this.openNote(item.id);
      return;
    }
    this.notebook.toggleExpanded(item.id);
    this.refreshTree();
  }

  // Notes

  openNote(noteId: string): boolean {
    const note = this.notebook.notes.get(noteId);
    if (!note) {
      return false;
    }
    this.currentNote = note;
    this.editor.load(note.content);
    this.completion.deactivate();
    this.focusedPane = "editor";
    this.feedback.saveStatus = "saved";
    return true;
  }

  /** Expands the folders above a note and selects its tree row. */
  revealNote(noteId: string): void {
    this.notebook.expandAncestors(noteId);
    this.refreshTree();
    this.selectItem(noteId);
  }

  private closeNote(): void {
    this.currentNote = null;
    this.editor.load("");
    this.completion.deactivate();
  }

  markModified(): void {
    this.feedback.saveStatus = "modified";
  }

  private commitWorkingCopy(): Note | null {
    const note = this.currentNote;
    if (!note) {
      return null;
    }

    this.feedback.saveStatus = "saving";
    const committed = this.editor.content === note.content ? note : withContent(note, this.editor.content, this.now());
    this.notebook.putNote(committed);
    this.currentNote = committed;
    this.refreshTree();
    this.feedback.saveStatus = "saved";
    return committed;
  }

  /** Writes the editor content into the notebook, without touching the disk. */
  commitNote(): boolean {
    if (!this.commitWorkingCopy()) {
      this.feedback.error("No note to save");
      return false;
    }
    this.feedback.success("Note saved successfully", "💾");
    return true;
  }

  persist(): boolean {
    try {
      this.storage.save(this.notebook);
      return true;
    } catch (error) {
      this.feedback.saveStatus = "error";
      this.feedback.error(`Save failed: ${errorMessage(error, "unknown error")}`);
      return false;
    }
  }

  /** Commits the open note, if any, and saves the notebook. */
  writeNote(): boolean {
    const note = this.commitWorkingCopy();
    if (!this.persist()) {
      return false;
    }
    this.feedback.success(note ? "Note saved successfully" : "Notebook saved", "💾");
    return true;
  }

  startInsert(): void {
    if (!this.currentNote) {
      this.feedback.setMessage("No note selected");
      return;
    }
    this.mode = "insert";
    this.focusedPane = "editor";
  }

  leaveInsert(): void {
    this.completion.deactivate();
    this.mode = "normal";
    this.commitNote();
  }

  startNoteInput(parentId: string | null): void {
    this.pendingParentId = parentId;
    this.inputBuffer = "";
    this.mode = "input-note";
  }

  startFolderInput(parentId: string | null): void {
    this.pendingParentId = parentId;
    this.inputBuffer = "";
    this.mode = "input-folder";
  }

  finishNoteInput(): void {
    const title = this.inputBuffer.trim() || "Untitled Note";
    const note = createNote(title, this.pendingParentId ?? undefined, this.now());
    this.notebook.addNote(note);
    this.pendingParentId = null;
    this.inputBuffer = "";

    this.revealNote(note.id);
    this.openNote(note.id);
    this.mode = "insert";
    this.feedback.setMessage("New note created");
  }

  finishFolderInput(): void {
    const name = this.inputBuffer.trim() || "New Folder";
    const folder = createFolder(name, this.pendingParentId ?? undefined, this.now());
    this.notebook.addFolder(folder);
    this.pendingParentId = null;
    this.inputBuffer = "";

    this.refreshTree();
    this.selectItem(folder.id);
    this.mode = "normal";
    this.feedback.setMessage("New folder created");
  }

  cancelInput(): void {
    this.mode = "normal";
    this.inputBuffer = "";
    this.pendingParentId = null;
  }

  // Panes and scrolling

  togglePreview(): void {
    this.previewEnabled = !this.previewEnabled;
    if (this.previewEnabled && this.focusedPane === "folders") {
      this.focusedPane = "editor";
    }
    if (!this.previewEnabled && this.focusedPane === "preview") {
      this.focusedPane = "editor";
    }
    this.feedback.setMessage(
      this.previewEnabled ? "Preview enabled - showing markdown preview" : "Preview disabled - showing editor only"
    );
  }

  cyclePane(): void {
    const order: FocusedPane[] = this.previewEnabled ? ["folders", "editor", "preview"] : ["folders", "editor"];
    const index = order.indexOf(this.focusedPane);
    this.focusedPane = index === -1 ? "editor" : order[(index + 1) % order.length];
  }

  /** True when vertical keys should scroll the note instead of moving through the tree. */
  isReading(): boolean {
    return this.focusedPane !== "folders" && this.currentNote !== null;
  }

  scrollLines(delta: number): void {
    this.editor.scrollBy(delta);
  }

  scrollHalfPage(direction: 1 | -1): void {
    this.editor.scrollBy(direction * HALF_PAGE_LINES);
  }

  scrollPage(direction: 1 | -1): void {
    this.editor.scrollBy(direction * PAGE_LINES);
  }

  /** Editor rows left for text once the suggestion popup takes its share. */
  textViewportHeight(): number {
    const popupRows =
      this.mode === "insert" && this.completion.active
        ? Math.min(this.completion.suggestions.length, MAX_SUGGESTION_ROWS)
        : 0;
    return Math.max(1, this.viewportHeight - popupRows);
  }

  followCursor(): void {
    this.editor.adjustScrollToCursor(this.textViewportHeight());
  }

  // Autocompletion

  updateCompletions(): void {
    const { line, column } = this.editor.cursor;
    const match = this.autocomplete.checkForCompletions(this.editor.content, line, column);
    if (match) {
      this.completion.activate(match.suggestions, match.triggerStart);
    } else {
      this.completion.deactivate();
    }
  }

  applyCompletion(): boolean {
    const suggestion = this.completion.selected();
    if (!this.completion.active || !suggestion) {
      return false;
    }

    const applied = applySuggestion(this.editor.content, this.editor.cursor, this.completion.triggerStart, suggestion);
    this.editor.replaceContent(applied.content);
    this.editor.setCursor(applied.cursor);
    this.completion.deactivate();
    this.markModified();
    this.followCursor();
    return true;
  }

  // Move and delete

  startMove(): void {
    const item = this.selectedItem();
    if (!item) {
      this.feedback.setMessage("Nothing selected to move");
      return;
    }
    this.pendingMove = { id: item.id, type: item.type, name: item.name };
    this.mode = "move";
    this.feedback.setMessage(`Moving ${item.type} '${item.name}' - select destination folder or press Esc to cancel`);
  }

  cancelMove(): void {
    this.pendingMove = null;
    this.mode = "normal";
    this.feedback.setMessage("Move cancelled");
  }

  executeMove(): void {
    const pending = this.pendingMove;
    const target = this.selectedItem();
    this.pendingMove = null;
    this.mode = "normal";
    if (!pending) {
      return;
    }
    if (!target) {
      this.feedback.error("No destination selected");
      return;
    }

    const destinationId = this.folderContext(target);
    try {
      if (pending.type === "note") {
        const moved = this.notebook.moveNote(pending.id, destinationId, this.now());
        if (this.currentNote?.id === moved.id) {
          this.currentNote = moved;
        }
      } else {
        this.notebook.moveFolder(pending.id, destinationId);
      }
    } catch (error) {
      this.feedback.error(errorMessage(error, "Move failed"));
      return;
    }

    this.refreshTree();
    this.selectItem(pending.id);
    const destinationName =
      destinationId === null ? "Root" : (this.notebook.folders.get(destinationId)?.name ?? "Unknown");
    this.feedback.success(`Item moved to '${destinationName}'!`, "📁");
  }

  startDelete(): void {
    const item = this.selectedItem();
    if (!item) {
      this.feedback.setMessage("Nothing to delete");
      return;
    }
    this.pendingDelete = { id: item.id, type: item.type, name: item.name };
    this.mode = "delete-confirm";
  }

  cancelDelete(): void {
    this.pendingDelete = null;
    this.mode = "normal";
    this.feedback.setMessage("Deletion cancelled");
  }

  confirmDelete(): void {
    const pending = this.pendingDelete;
    this.pendingDelete = null;
    this.mode = "normal";
    if (!pending) {
      return;
    }

    if (pending.type === "note") {
      this.notebook.removeNote(pending.id);
      if (this.currentNote?.id === pending.id) {
        this.closeNote();
      }
      this.feedback.setMessage(`Note '${pending.name}' deleted`);
    } else {
      try {
        this.notebook.removeFolder(pending.id);
      } catch (error) {
        this.feedback.error(errorMessage(error, "Delete failed"));
        return;
      }
      this.feedback.setMessage(`Folder '${pending.name}' deleted`);
    }
    this.refreshTree();
  }

  // Search and replace

  runSearch(query: SearchQuery): void {
    let results: SearchResult<Note>[];
    try {
      results = this.search.search(this.notebook, query);
    } catch (error) {
      this.searchResults = [];
      this.feedback.error(`Search error: ${errorMessage(error, "invalid query")}`);
      return;
    }

    this.searchResults = results;
    const [first] = results;
    if (!first) {
      this.feedback.setMessage(`No matches found for '${query.text}'`);
      return;
    }

    const total = results.reduce((sum, result) => sum + result.matches.length, 0);
    this.openNote(first.note.id);
    this.revealNote(first.note.id);
    this.feedback.setMessage(
      `Found ${results.length} notes with ${total} matches for '${query.text}' - Opened first result: '${first.note.title}'`
    );
  }

  quickSearch(text: string): void {
    this.legacyResults = this.notebook.searchNotes(text);
    this.runSearch(createSearchQuery(text));
  }

  advancedSearch(input: string): void {
    const parsed = parseAdvancedQuery(input);
    if (!parsed.pattern) {
      this.feedback.setMessage("Nothing to search for");
      return;
    }

    let folderId: string | undefined;
    if (parsed.folderName !== undefined) {
      const folder = this.findFolderByName(parsed.folderName);
      if (!folder) {
        this.feedback.error(`Folder not found: ${parsed.folderName}`);
        return;
      }
      folderId = folder.id;
    }

    this.runSearch(
      createSearchQuery(parsed.pattern, { isRegex: parsed.isRegex, caseSensitive: parsed.caseSensitive, folderId })
    );
  }

  startAdvancedSearch(): void {
    this.inputBuffer = "";
    this.historyCursor = -1;
    this.mode = "search-advanced";
  }

  historyBack(): void {
    const entries = this.search.history.entries();
    if (entries.length === 0) {
      return;
    }
    this.historyCursor = Math.min(this.historyCursor + 1, entries.length - 1);
    this.inputBuffer = entries[this.historyCursor];
  }

  historyForward(): void {
    if (this.historyCursor <= 0) {
      this.historyCursor = -1;
      this.inputBuffer = "";
      return;
    }
    this.historyCursor -= 1;
    this.inputBuffer = this.search.history.entries()[this.historyCursor] ?? "";
  }

  startReplace(): void {
    if (!this.currentNote) {
      this.feedback.setMessage("No note selected for replace");
      return;
    }
    this.inputBuffer = "";
    this.replaceOptions = { isRegex: false, caseSensitive: false };
    this.mode = "search-replace";
  }

  toggleReplaceRegex(): void {
    this.replaceOptions = { ...this.replaceOptions, isRegex: !this.replaceOptions.isRegex };
    this.feedback.setMessage(`Regex ${this.replaceOptions.isRegex ? "on" : "off"}`);
  }

  toggleReplaceCase(): void {
    this.replaceOptions = { ...this.replaceOptions, caseSensitive: !this.replaceOptions.caseSensitive };
    this.feedback.setMessage(`Case sensitive ${this.replaceOptions.caseSensitive ? "on" : "off"}`);
  }

  /** Applies `find|replace` to the open note. */
  replaceInCurrentNote(input: string): void {
    const separator = input.indexOf("|");
    if (separator === -1) {
      this.feedback.setMessage("Format: find_text|replace_text");
      return;
    }
    const note = this.commitWorkingCopy();
    if (!note) {
      this.feedback.setMessage("No note selected");
      return;
    }

    const find = input.slice(0, separator);
    const replacement = input.slice(separator + 1);
    let replaced: ReplaceResult<Note>;
    try {
      replaced = this.search.replaceInNote(note, find, replacement, this.replaceOptions, new Date(this.clock()));
    } catch (error) {
      this.feedback.error(`Replace error: ${errorMessage(error, "invalid pattern")}`);
      return;
    }

    if (replaced.count === 0) {
      this.feedback.setMessage("No matches found to replace");
      return;
    }
    this.notebook.putNote(replaced.note);
    this.currentNote = replaced.note;
    this.editor.replaceContent(replaced.note.content);
    this.refreshTree();
    this.feedback.success(`Replaced ${replaced.count} occurrences`);
  }

  clearSearchHistory(): void {
    this.search.clearHistory();
    this.feedback.setMessage("Search history cleared");
  }

  // External editor

  openInExternalEditor(): void {
    if (!this.currentNote) {
      this.feedback.error("No note selected");
      return;
    }
    if (!this.externalEditor.command) {
      this.feedback.error("No external editor configured");
      return;
    }

    let edited: string;
    try {
      edited = this.externalEditor.edit(this.currentNote.title, this.editor.content);
    } catch (error) {
      this.feedback.error(`External editor failed: ${errorMessage(error, "unknown error")}`);
      return;
    }

    this.editor.replaceContent(edited);
    this.commitWorkingCopy();
    this.feedback.success("Note updated from external editor");
  }

  // Files and backups

  exportToDirectory(directory = this.exportDir): void {
    try {
      const written = exportNotes(this.notebook, directory);
      this.feedback.success(`Exported ${written.length} notes to '${directory}'`, "📦");
    } catch (error) {
      this.feedback.error(`Export failed: ${errorMessage(error, "unknown error")}`, "🚨");
    }
  }

  importFromDirectory(directory: string): void {
    let report: ImportReport;
    try {
      report = importNotes(this.notebook, directory);
    } catch (error) {
      this.feedback.error(`Import failed: ${errorMessage(error, "unknown error")}`, "🚨");
      return;
    }

    this.refreshTree();
    for (const failure of report.failures) {
      this.feedback.setMessage(`Skipped ${failure.file}: ${failure.reason}`);
    }
    const summary = `Imported ${report.imported.length} notes from '${directory}'`;
    if (report.failures.length === 0) {
      this.feedback.success(summary, "📦");
    } else {
      this.feedback.info(`${summary}, ${report.failures.length} skipped`);
    }
  }

  createBackup(): void {
    if (!this.persist()) {
      return;
    }
    try {
      const path = this.storage.backup();
      this.feedback.success(`Backup created: ${basename(path)}`, "💾");
    } catch (error) {
      this.feedback.error(`Backup failed: ${errorMessage(error, "unknown error")}`, "🚨");
    }
  }

  showBackups(): void {
    try {
      const backups = this.storage.listBackups();
      const [newest] = backups;
      if (!newest) {
        this.feedback.info("No backups yet");
        return;
      }
      this.feedback.info(`${backups.length} backups, newest: ${basename(newest)}`);
    } catch (error) {
      this.feedback.error(`Listing backups failed: ${errorMessage(error, "unknown error")}`);
    }
  }

  /** Restores the named backup, or the newest one. */
  restoreBackup(backupFile?: string): void {
    try {
      const target = backupFile || this.storage.listBackups()[0];
      if (!target) {
        this.feedback.error("No backups to restore");
        return;
      }
      this.notebook = this.storage.restore(target);
      this.closeNote();
      this.selectedIndex = 0;
      this.focusedPane = "folders";
      this.refreshTree();
      this.feedback.success(`Restored ${basename(target)}`, "♻️");
    } catch (error) {
      this.feedback.error(`Restore failed: ${errorMessage(error, "unknown error")}`, "🚨");
    }
  }

  // Tags and renaming

  tagCurrentNote(rawTag: string): void {
    const tag = rawTag.trim().replace(/^#/, "");
    if (!tag) {
      this.feedback.error("Usage: tag <name>");
      return;
    }
    const note = this.commitWorkingCopy();
    if (!note) {
      this.feedback.error("No note selected");
      return;
    }
    if (note.tags.includes(tag)) {
      this.feedback.info(`Note already tagged #${tag}`);
      return;
    }

    const tagged = withTag(note, tag, this.now());
    this.notebook.putNote(tagged);
    this.currentNote = tagged;
    this.feedback.success(`Tagged '${note.title}' with #${tag}`, "🏷️");
  }

  untagCurrentNote(rawTag: string): void {
    const tag = rawTag.trim().replace(/^#/, "");
    if (!tag) {
      this.feedback.error("Usage: untag <name>");
      return;
    }
    const note = this.commitWorkingCopy();
    if (!note) {
      this.feedback.error("No note selected");
      return;
    }
    if (!note.tags.includes(tag)) {
      this.feedback.info(`Note is not tagged #${tag}`);
      return;
    }

    const untagged = withoutTag(note, tag, this.now());
    this.notebook.putNote(untagged);
    this.currentNote = untagged;
    this.feedback.success(`Removed #${tag} from '${note.title}'`, "🏷️");
  }

  renameSelected(rawName: string): void {
    const name = rawName.trim();
    const item = this.selectedItem();
    if (!name) {
      this.feedback.error("Usage: rename <name>");
      return;
    }
    if (!item) {
      this.feedback.error("Nothing selected to rename");
      return;
    }

    try {
      if (item.type === "folder") {
        this.notebook.renameFolder(item.id, name);
      } else {
        this.renameNote(item.id, name);
      }
    } catch (error) {
      this.feedback.error(errorMessage(error, "Rename failed"));
      return;
    }
    this.refreshTree();
    this.feedback.success(`Renamed '${item.name}' to '${name}'`);
  }

  private renameNote(noteId: string, title: string): void {
    const note = this.currentNote?.id === noteId ? this.commitWorkingCopy() : this.notebook.notes.get(noteId);
    if (!note) {
      throw new NotebookError("not-found", "Note not found");
    }
    const renamed = withTitle(note, title, this.now());
    this.notebook.putNote(renamed);
    if (this.currentNote?.id === noteId) {
      this.currentNote = renamed;
    }
  }

  quit(): void {
    this.shouldQuit = true;
  }

  /** Called from the view's timer; true when the visible feedback changed. */
  tick(now = this.clock()): boolean {
    return this.feedback.tick(now);
  }
}
