export interface HelpSection {
  title: string;
  bindings: Array<[keys: string, description: string]>;
}

export const HELP_SECTIONS: readonly HelpSection[] = [
  {
    title: "Navigation",
    bindings: [
      ["j / k, ↓ / ↑", "Move through the tree, or scroll the focused editor"],
      ["g / G", "Jump to the top or bottom"],
      ["Ctrl+U / Ctrl+D", "Scroll half a page"],
      ["PgUp / PgDn", "Scroll a full page"],
      ["Tab", "Cycle focus between panes"],
      ["Enter", "Open a note or expand a folder"]
    ]
  },
  {
    title: "Notes and folders",
    bindings: [
      ["n", "New note in the selected folder"],
      ["f / F", "New root folder / new subfolder"],
      ["m", "Move the selected item"],
      ["d", "Delete the selected item"],
      ["i", "Edit the open note"],
      ["e", "Edit the open note in $EDITOR"]
    ]
  },
  {
    title: "Editing",
    bindings: [
      ["Esc", "Back to normal mode, keeping the changes"],
      ["Ctrl+S", "Save the notebook"],
      ["Tab", "Accept a suggestion, or indent"],
      ["↑ / ↓, Ctrl+N / Ctrl+P", "Choose a suggestion"],
      ["p / Ctrl+T", "Toggle the live preview"]
    ]
  },
  {
    title: "Search",
    bindings: [
      ["/", "Search titles, content and tags"],
      ["Ctrl+F", "Advanced search: regex: case: folder:<name>"],
      ["Ctrl+R", "Find and replace in the open note (find|replace)"]
    ]
  },
  {
    title: "Commands",
    bindings: [
      [":w  :q  :wq", "Save, quit, save and quit"],
      [":export [dir]  :import <dir>", "Markdown export and import"],
      [":backup  :backups  :restore [file]", "Notebook backups"],
      [":tag <t>  :untag <t>", "Tag the open note"],
      [":rename <name>", "Rename the selected item"],
      [":clearhistory", "Forget past searches"]
    ]
  }
];
