import { describe, expect, it } from "vitest";
import { createFolder, createNote } from "./note";
import { Notebook } from "./notebook";
import { flattenTree } from "./tree";

describe("flattenTree", () => {
  function build() {
    const notebook = new Notebook();
    const work = createFolder("Work");
    const clients = createFolder("Clients", work.id);
    const home = createFolder("Home");
    notebook.addFolder(work);
    notebook.addFolder(clients);
    notebook.addFolder(home);
    notebook.addNote(createNote("Plan", work.id));
    notebook.addNote(createNote("Acme brief", clients.id));
    notebook.addNote(createNote("Inbox"));
    return { notebook, work, clients };
  }

  it("lists unfiled notes first and walks expanded folders depth-first", () => {
    const { notebook } = build();

    expect(flattenTree(notebook).map((item) => [item.type, item.name, item.depth])).toEqual([
      ["note", "Inbox", 0],
      ["folder", "Work", 0],
      ["note", "Plan", 1],
      ["folder", "Clients", 1],
      ["note", "Acme brief", 2],
      ["folder", "Home", 0]
    ]);
  });

  it("hides the children of collapsed folders", () => {
    const { notebook, work } = build();
    notebook.toggleExpanded(work.id);

    const items = flattenTree(notebook);
    expect(items.map((item) => item.name)).toEqual(["Inbox", "Work", "Home"]);
    expect(items[1].expanded).toBe(false);
  });

  it("emits notes with a missing folder once, at the root", () => {
    const { notebook } = build();
    notebook.addNote(createNote("Orphan", "missing-folder"));

    const items = flattenTree(notebook);
    const ids = items.map((item) => item.id);
    expect(new Set(ids).size).toBe(ids.length);
    expect(items.slice(0, 2).map((item) => item.name)).toEqual(["Inbox", "Orphan"]);
  });
});
