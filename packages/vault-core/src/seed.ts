import { createFolder, createNote, withContent } from "./note";
import { Notebook } from "./notebook";

const WELCOME_CONTENT = [
  "# Welcome to Inkwell",
  "",
  "- Press `?` for the key bindings",
  "- `n` creates a note, `f` a folder, `i` starts editing",
  "- `/` searches every note, `:w` saves the notebook",
  ""
].join("\n");

export function createSeedNotebook(): Notebook {
  const notebook = new Notebook();
  notebook.addFolder(createFolder("General"));
  notebook.addFolder(createFolder("Projects"));
  notebook.addFolder(createFolder("Daily Notes"));
  notebook.addNote(withContent(createNote("Welcome to Inkwell"), WELCOME_CONTENT));
  return notebook;
}
