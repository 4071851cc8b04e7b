import type { Notebook } from "./notebook";
import type { FolderTreeNode, TreeItem } from "./types";

function appendNode(items: TreeItem[], node: FolderTreeNode): void {
  items.push({
    id: node.folder.id,
    name: node.folder.name,
    type: "folder",
    depth: node.depth,
    expanded: node.folder.expanded
  });

  if (!node.folder.expanded) {
    return;
  }

  for (const note of node.notes) {
    items.push({ id: note.id, name: note.title, type: "note", depth: node.depth + 1, expanded: false });
  }
  for (const child of node.children) {
    appendNode(items, child);
  }
}

/** Display rows: unfiled notes first, then folders depth-first. */
export function flattenTree(notebook: Notebook): TreeItem[] {
  const items: TreeItem[] = [];

  for (const note of notebook.notes.values()) {
    if (note.folderId === undefined || !notebook.folders.has(note.folderId)) {
      items.push({ id: note.id, name: note.title, type: "note", depth: 0, expanded: false });
    }
  }

  for (const node of notebook.buildFolderTree()) {
    appendNode(items, node);
  }
  return items;
}
