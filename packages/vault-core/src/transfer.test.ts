import { mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createNote, withContent } from "./note";
import { Notebook } from "./notebook";
import { exportNotes, importNotes } from "./transfer";

describe("export and import", () => {
  let directory: string;

  beforeEach(() => {
    directory = mkdtempSync(join(tmpdir(), "inkwell-transfer-"));
  });

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  it("writes one sanitized file per note", () => {
    const notebook = new Notebook();
    notebook.addNote({ ...withContent(createNote("Q1/Q2 plan"), "body"), tags: ["work"] });
    notebook.addNote(createNote("Q1/Q2 plan"));

    exportNotes(notebook, directory);

    expect(readdirSync(directory).sort()).toEqual(["Q1_Q2 plan (2).md", "Q1_Q2 plan.md"]);
    const text = readFileSync(join(directory, "Q1_Q2 plan.md"), "utf8");
    expect(text.startsWith("# Q1/Q2 plan\n\nCreated: ")).toBe(true);
    expect(text.endsWith("Tags: work\n\n---\n\nbody")).toBe(true);
  });

  it("reconstructs exported notes without re-ingesting the header", () => {
    const source = new Notebook();
    source.addNote({ ...withContent(createNote("Groceries"), "- milk\n- eggs\n"), tags: ["home", "errands"] });
    source.addNote(withContent(createNote("Ideas"), "# Not a title\nsecond line"));
    exportNotes(source, directory);

    const target = new Notebook();
    const report = importNotes(target, directory);

    expect(report.failures).toEqual([]);
    const imported = [...target.notes.values()].map((note) => ({
      title: note.title,
      content: note.content,
      tags: note.tags
    }));
    expect(imported).toEqual([
      { title: "Groceries", content: "- milk\n- eggs\n", tags: ["home", "errands"] },
      { title: "Ideas", content: "# Not a title\nsecond line", tags: [] }
    ]);
  });

  it("skips title collisions and keeps importing", () => {
    writeFileSync(join(directory, "a.md"), "# Existing\n\nnew body");
    writeFileSync(join(directory, "b.md"), "plain body");
    writeFileSync(join(directory, "notes.txt"), "ignored");
    const notebook = new Notebook();
    notebook.addNote(createNote("Existing"));

    const report = importNotes(notebook, directory);

    expect(report.failures).toEqual([{ file: "a.md", reason: "Note with title 'Existing' already exists" }]);
    expect(report.imported.map((note) => [note.title, note.content])).toEqual([["b", "plain body"]]);
    expect(notebook.notes.size).toBe(2);
  });

  it("reports a missing import directory", () => {
    expect(() => importNotes(new Notebook(), join(directory, "nope"))).toThrowError("Import directory does not exist");
  });
});
