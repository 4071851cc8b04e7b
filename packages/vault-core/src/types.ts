export interface Note {
  id: string;
  title: string;
  content: string;
  folderId?: string;
  createdAt: string;
  modifiedAt: string;
  tags: string[];
  filePath?: string;
}

export interface Folder {
  id: string;
  name: string;
  parentId?: string;
  createdAt: string;
  expanded: boolean;
}

export interface FolderTreeNode {
  folder: Folder;
  children: FolderTreeNode[];
  notes: Note[];
  depth: number;
}

export type TreeItemType = "folder" | "note";

export interface TreeItem {
  id: string;
  name: string;
  type: TreeItemType;
  depth: number;
  expanded: boolean;
}

export interface NotebookData {
  folders: Record<string, Folder>;
  notes: Record<string, Note>;
  rootFolderIds: string[];
}
