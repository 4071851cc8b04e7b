import { describe, expect, it } from "vitest";
import { Notebook, createFolder, createNote, withContent } from "@inkwell/vault-core";
import { charKey, ctrlKey, namedKey } from "./modes";
import { FakeEditor, TEST_TIME, createTestState, press, typeText } from "./testing";

function notebookWithNote(title: string, content = "") {
  const notebook = new Notebook();
  const note = withContent(createNote(title, undefined, TEST_TIME), content, TEST_TIME);
  notebook.addNote(note);
  return { notebook, note };
}

function notebookWithFiledNote() {
  const notebook = new Notebook();
  const work = createFolder("Work", undefined, TEST_TIME);
  const note = createNote("Plan", work.id, TEST_TIME);
  notebook.addFolder(work);
  notebook.addNote(note);
  return { notebook, work, note };
}

describe("normal mode", () => {
  it("enters insert mode only with an open note", () => {
    const { state } = createTestState();

    press(state, charKey("i"));

    expect(state.mode).toBe("normal");
    expect(state.feedback.message).toBe("No note selected");
  });

  it("cycles panes and toggles the preview", () => {
    const { state } = createTestState();

    press(state, namedKey("tab"));
    expect(state.focusedPane).toBe("editor");
    press(state, namedKey("tab"));
    expect(state.focusedPane).toBe("folders");

    press(state, charKey("p"));
    expect(state.previewEnabled).toBe(true);
    expect(state.focusedPane).toBe("editor");
    expect(state.feedback.message).toBe("Preview enabled - showing markdown preview");

    press(state, namedKey("tab"));
    expect(state.focusedPane).toBe("preview");
    press(state, namedKey("tab"));
    expect(state.focusedPane).toBe("folders");
  });

  it("scrolls the open note instead of the tree while reading", () => {
    const { notebook } = notebookWithNote("Long", Array.from({ length: 30 }, (_, index) => `line ${index}`).join("\n"));
    const { state } = createTestState(notebook);
    press(state, namedKey("enter"));

    press(state, charKey("j"));
    expect(state.editor.scroll).toBe(1);
    press(state, charKey("G"));
    expect(state.editor.scroll).toBe(29);
    press(state, ctrlKey("u"));
    expect(state.editor.scroll).toBe(19);
    press(state, charKey("g"));
    expect(state.editor.scroll).toBe(0);
    expect(state.selectedIndex).toBe(0);
  });

  it("opens help and leaves it without quitting", () => {
    const { state } = createTestState();

    press(state, charKey("?"));
    expect(state.mode).toBe("help");
    press(state, charKey("q"));

    expect(state.mode).toBe("normal");
    expect(state.shouldQuit).toBe(false);
  });

  it("quits on q", () => {
    const { state } = createTestState();

    press(state, charKey("q"));

    expect(state.shouldQuit).toBe(true);
  });
});

describe("creating notes and folders", () => {
  it("creates a note from the prompt and starts editing it", () => {
    const { state } = createTestState();

    press(state, charKey("n"));
    expect(state.mode).toBe("input-note");
    typeText(state, "Plan");
    press(state, namedKey("enter"));

    expect(state.mode).toBe("insert");
    expect(state.currentNote?.title).toBe("Plan");
    expect(state.selectedItem()?.name).toBe("Plan");
    expect(state.feedback.message).toBe("New note created");
  });

  it("uses default names for blank input", () => {
    const { state } = createTestState();

    press(state, charKey("n"), namedKey("enter"), namedKey("escape"));
    press(state, charKey("f"), namedKey("enter"));

    expect([...state.notebook.notes.values()].map((note) => note.title)).toEqual(["Untitled Note"]);
    expect([...state.notebook.folders.values()].map((folder) => folder.name)).toEqual(["New Folder"]);
    expect(state.mode).toBe("normal");
  });

  it("files a new note in the selected folder", () => {
    const notebook = new Notebook();
    const work = createFolder("Work", undefined, TEST_TIME);
    notebook.addFolder(work);
    const { state } = createTestState(notebook);

    press(state, charKey("n"));
    typeText(state, "Idea");
    press(state, namedKey("enter"));

    expect(state.currentNote?.folderId).toBe(work.id);
  });

  it("creates a subfolder beside the selected note", () => {
    const { notebook, work } = notebookWithFiledNote();
    const { state } = createTestState(notebook);

    press(state, charKey("j"), charKey("F"));
    typeText(state, "Sub");
    press(state, namedKey("enter"));

    const sub = [...state.notebook.folders.values()].find((folder) => folder.name === "Sub");
    expect(sub?.parentId).toBe(work.id);
  });

  it("discards the prompt on Esc", () => {
    const { state } = createTestState();

    press(state, charKey("n"));
    typeText(state, "Nope");
    press(state, namedKey("escape"));

    expect(state.mode).toBe("normal");
    expect(state.notebook.notes.size).toBe(0);
    expect(state.inputBuffer).toBe("");
  });
});

describe("insert mode", () => {
  it("edits at the cursor and commits on Esc without saving to disk", () => {
    const { notebook, note } = notebookWithNote("Draft", "world");
    const { state, storage } = createTestState(notebook);

    press(state, namedKey("enter"), charKey("i"));
    typeText(state, "hello ");
    expect(state.feedback.saveStatus).toBe("modified");
    press(state, namedKey("escape"));

    expect(state.mode).toBe("normal");
    expect(state.notebook.notes.get(note.id)?.content).toBe("hello world");
    expect(state.feedback.message).toBe("Note saved successfully");
    expect(storage.saves).toHaveLength(0);

    press(state, ctrlKey("s"));
    expect(storage.saves).toHaveLength(1);
  });

  it("offers checkbox completions and applies the selected one", () => {
    const { notebook } = notebookWithNote("Todo");
    const { state } = createTestState(notebook);
    press(state, namedKey("enter"), charKey("i"));

    typeText(state, "- [");
    expect(state.completion.active).toBe(true);
    expect(state.completion.triggerStart).toBe(0);
    expect(state.completion.suggestions.map((suggestion) => suggestion.completion)).toEqual(["- [ ] ", "- [x] "]);

    press(state, namedKey("down"), namedKey("tab"));

    expect(state.editor.content).toBe("- [x] ");
    expect(state.editor.cursor).toEqual({ line: 0, column: 6 });
    expect(state.completion.active).toBe(false);
  });

  it("keeps the cursor line above the suggestion popup", () => {
    const { notebook } = notebookWithNote("Lines", "1\n2\n3\n4\n5");
    const { state } = createTestState(notebook);
    state.viewportHeight = 5;
    press(state, namedKey("enter"), charKey("i"));
    press(state, namedKey("down"), namedKey("down"), namedKey("down"), namedKey("down"));
    expect(state.editor.scroll).toBe(0);

    typeText(state, "#");

    expect(state.completion.suggestions).toHaveLength(1);
    expect(state.textViewportHeight()).toBe(4);
    expect(state.editor.scroll).toBe(1);
  });

  it("dismisses suggestions before leaving insert mode", () => {
    const { notebook } = notebookWithNote("Heading");
    const { state } = createTestState(notebook);
    press(state, namedKey("enter"), charKey("i"));

    typeText(state, "#");
    expect(state.completion.active).toBe(true);

    press(state, namedKey("escape"));
    expect(state.completion.active).toBe(false);
    expect(state.mode).toBe("insert");

    press(state, namedKey("escape"));
    expect(state.mode).toBe("normal");
  });

  it("indents with Tab when no suggestion is shown", () => {
    const { notebook } = notebookWithNote("Code", "x");
    const { state } = createTestState(notebook);
    press(state, namedKey("enter"), charKey("i"), namedKey("tab"));

    expect(state.editor.content).toBe("    x");
  });
});

describe("delete confirmation", () => {
  it("deletes the selected note and closes it", () => {
    const { notebook, note } = notebookWithNote("Draft");
    const { state } = createTestState(notebook);
    press(state, namedKey("enter"), charKey("d"));
    expect(state.mode).toBe("delete-confirm");

    press(state, charKey("y"));

    expect(state.notebook.notes.has(note.id)).toBe(false);
    expect(state.currentNote).toBeNull();
    expect(state.treeItems).toEqual([]);
    expect(state.feedback.message).toBe("Note 'Draft' deleted");
  });

  it("cancels on any other key", () => {
    const { notebook, note } = notebookWithNote("Draft");
    const { state } = createTestState(notebook);

    press(state, charKey("d"), charKey("x"));

    expect(state.mode).toBe("normal");
    expect(state.notebook.notes.has(note.id)).toBe(true);
    expect(state.feedback.message).toBe("Deletion cancelled");
  });

  it("refuses to delete a folder that still holds notes", () => {
    const { notebook, work } = notebookWithFiledNote();
    const { state } = createTestState(notebook);

    press(state, charKey("d"), namedKey("enter"));

    expect(state.mode).toBe("normal");
    expect(state.pendingDelete).toBeNull();
    expect(state.feedback.result?.kind).toBe("error");
    expect(state.feedback.message).toBe("Cannot delete folder with notes");
    expect(state.notebook.folders.has(work.id)).toBe(true);
  });
});

describe("move mode", () => {
  it("moves a note into the highlighted folder", () => {
    const notebook = new Notebook();
    const work = createFolder("Work", undefined, TEST_TIME);
    const inbox = createNote("Inbox", undefined, TEST_TIME);
    notebook.addFolder(work);
    notebook.addNote(inbox);
    const { state } = createTestState(notebook);

    press(state, charKey("m"));
    expect(state.mode).toBe("move");
    expect(state.feedback.message).toBe("Moving note 'Inbox' - select destination folder or press Esc to cancel");

    press(state, charKey("j"), namedKey("enter"));

    expect(state.mode).toBe("normal");
    expect(state.notebook.notes.get(inbox.id)?.folderId).toBe(work.id);
    expect(state.feedback.message).toBe("Item moved to 'Work'!");
    expect(state.selectedItem()?.name).toBe("Inbox");
  });

  it("rejects moving a folder into its own subfolder", () => {
    const notebook = new Notebook();
    const work = createFolder("Work", undefined, TEST_TIME);
    const clients = createFolder("Clients", work.id, TEST_TIME);
    notebook.addFolder(work);
    notebook.addFolder(clients);
    const { state } = createTestState(notebook);

    press(state, charKey("m"), charKey("j"), namedKey("enter"));

    expect(state.mode).toBe("normal");
    expect(state.pendingMove).toBeNull();
    expect(state.feedback.message).toBe("Cannot move folder into its own subfolder");
    expect(state.notebook.folders.get(work.id)?.parentId).toBeUndefined();
    expect(state.notebook.rootFolderIds).toEqual([work.id]);
  });

  it("reports a move to the current location", () => {
    const { notebook } = notebookWithFiledNote();
    const { state } = createTestState(notebook);

    press(state, charKey("j"), charKey("m"), charKey("k"), namedKey("enter"));

    expect(state.feedback.message).toBe("Note is already in this location");
  });

  it("cancels on Esc", () => {
    const { notebook } = notebookWithNote("Draft");
    const { state } = createTestState(notebook);

    press(state, charKey("m"), namedKey("escape"));

    expect(state.mode).toBe("normal");
    expect(state.feedback.message).toBe("Move cancelled");
  });
});

describe("search", () => {
  function searchable() {
    const notebook = new Notebook();
    const archive = { ...createFolder("Archive", undefined, TEST_TIME), expanded: false };
    notebook.addNote(withContent(createNote("Alpha", undefined, TEST_TIME), "nothing", TEST_TIME));
    notebook.addFolder(archive);
    notebook.addNote(withContent(createNote("Beta", archive.id, TEST_TIME), "needle here", TEST_TIME));
    return { notebook, archive };
  }

  it("opens the best match and reveals it in the tree", () => {
    const { notebook, archive } = searchable();
    const { state } = createTestState(notebook);

    press(state, charKey("/"));
    typeText(state, "needle");
    press(state, namedKey("enter"));

    expect(state.mode).toBe("normal");
    expect(state.currentNote?.title).toBe("Beta");
    expect(state.notebook.folders.get(archive.id)?.expanded).toBe(true);
    expect(state.selectedItem()?.name).toBe("Beta");
    expect(state.focusedPane).toBe("editor");
    expect(state.legacyResults.map((note) => note.title)).toEqual(["Beta"]);
    expect(state.feedback.message).toBe("Found 1 notes with 1 matches for 'needle' - Opened first result: 'Beta'");
  });

  it("reports when nothing matches", () => {
    const { notebook } = searchable();
    const { state } = createTestState(notebook);

    press(state, charKey("/"));
    typeText(state, "zzz");
    press(state, namedKey("enter"));

    expect(state.currentNote).toBeNull();
    expect(state.feedback.message).toBe("No matches found for 'zzz'");
  });

  it("scopes advanced searches to a folder", () => {
    const notebook = new Notebook();
    const work = createFolder("Work", undefined, TEST_TIME);
    notebook.addFolder(work);
    notebook.addNote(withContent(createNote("Home plan", undefined, TEST_TIME), "todo", TEST_TIME));
    notebook.addNote(withContent(createNote("Work plan", work.id, TEST_TIME), "todo", TEST_TIME));
    const { state } = createTestState(notebook);

    press(state, ctrlKey("f"));
    expect(state.mode).toBe("search-advanced");
    typeText(state, "folder:Work todo");
    press(state, namedKey("enter"));

    expect(state.searchResults.map((result) => result.note.title)).toEqual(["Work plan"]);

    press(state, ctrlKey("f"));
    typeText(state, "folder:Nope todo");
    press(state, namedKey("enter"));
    expect(state.feedback.message).toBe("Folder not found: Nope");
  });

  it("walks the search history with Up and Down", () => {
    const { notebook } = searchable();
    const { state } = createTestState(notebook);
    press(state, charKey("/"));
    typeText(state, "plan");
    press(state, namedKey("enter"), ctrlKey("f"));
    typeText(state, "regex:^need");
    press(state, namedKey("enter"), ctrlKey("f"));

    press(state, namedKey("up"));
    expect(state.inputBuffer).toBe("^need");
    press(state, namedKey("up"), namedKey("up"));
    expect(state.inputBuffer).toBe("plan");
    press(state, namedKey("down"));
    expect(state.inputBuffer).toBe("^need");
    press(state, namedKey("down"));
    expect(state.inputBuffer).toBe("");
  });

  it("reports invalid patterns", () => {
    const { notebook } = searchable();
    const { state } = createTestState(notebook);

    press(state, ctrlKey("f"));
    typeText(state, "regex:(");
    press(state, namedKey("enter"));

    expect(state.feedback.result?.kind).toBe("error");
    expect(state.feedback.message).toMatch(/^Search error: Invalid regex: /);
  });
});

describe("find and replace", () => {
  it("replaces regex matches in the open note", () => {
    const { notebook, note } = notebookWithNote("Letters", "aaa bb aaaa");
    const { state } = createTestState(notebook);
    press(state, namedKey("enter"), ctrlKey("r"));
    expect(state.mode).toBe("search-replace");

    press(state, ctrlKey("r"));
    typeText(state, "a+|b");
    press(state, namedKey("enter"));

    expect(state.mode).toBe("normal");
    expect(state.editor.content).toBe("b bb b");
    expect(state.notebook.notes.get(note.id)?.content).toBe("b bb b");
    expect(state.feedback.message).toBe("Replaced 2 occurrences");
  });

  it("explains the input format", () => {
    const { notebook } = notebookWithNote("Letters", "abc");
    const { state } = createTestState(notebook);
    press(state, namedKey("enter"), ctrlKey("r"));

    typeText(state, "abc");
    press(state, namedKey("enter"));

    expect(state.feedback.message).toBe("Format: find_text|replace_text");
  });

  it("needs an open note", () => {
    const { state } = createTestState();

    press(state, ctrlKey("r"));

    expect(state.mode).toBe("normal");
    expect(state.feedback.message).toBe("No note selected for replace");
  });
});

describe("external editor", () => {
  it("replaces the note with the edited text", () => {
    const { notebook, note } = notebookWithNote("Draft", "old");
    const editor = new FakeEditor("fake-editor", () => "new text");
    const { state } = createTestState(notebook, editor);

    press(state, namedKey("enter"), charKey("e"));

    expect(editor.edits).toEqual([{ title: "Draft", content: "old" }]);
    expect(state.notebook.notes.get(note.id)?.content).toBe("new text");
    expect(state.feedback.message).toBe("Note updated from external editor");
  });

  it("reports a missing editor", () => {
    const { notebook } = notebookWithNote("Draft");
    const { state } = createTestState(notebook, new FakeEditor(null));

    press(state, namedKey("enter"), charKey("e"));

    expect(state.feedback.message).toBe("No external editor configured");
  });
});

describe("feedback expiry", () => {
  it("clears the operation result after three seconds", () => {
    const { state, advance } = createTestState();
    state.feedback.success("Done");

    advance(2_999);
    expect(state.tick()).toBe(false);
    advance(1);
    expect(state.tick()).toBe(true);
    expect(state.feedback.result).toBeNull();
  });
});
