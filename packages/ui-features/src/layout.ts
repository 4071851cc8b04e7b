export interface LayoutState {
  treeWidth: number;
  editorWidth: number;
  previewWidth: number;
  /** Rows between the breadcrumb and the status bar. */
  bodyHeight: number;
}

const MIN_COLUMNS = 40;
const MIN_ROWS = 10;
const BREADCRUMB_HEIGHT = 1;
const STATUS_HEIGHT = 2;
const PANE_BORDER = 2;

export const MIN_TREE_WIDTH = 20;
export const MAX_TREE_WIDTH = 48;
/** Suggestion rows the editor pane shows below the text. */
export const MAX_SUGGESTION_ROWS = 6;

export function normalizeTreeWidth(width: number): number {
  return Math.max(MIN_TREE_WIDTH, Math.min(width, MAX_TREE_WIDTH));
}

export function computeLayout(columns: number, rows: number, previewEnabled: boolean): LayoutState {
  const safeColumns = Math.max(columns, MIN_COLUMNS);
  const safeRows = Math.max(rows, MIN_ROWS);

  const treeWidth = normalizeTreeWidth(Math.floor(safeColumns * 0.3));
  const remaining = safeColumns - treeWidth;
  const editorWidth = previewEnabled ? Math.ceil(remaining / 2) : remaining;

  return {
    treeWidth,
    editorWidth,
    previewWidth: remaining - editorWidth,
    bodyHeight: safeRows - BREADCRUMB_HEIGHT - STATUS_HEIGHT
  };
}

/** Text rows visible inside a bordered pane. */
export function paneViewportHeight(layout: LayoutState): number {
  return Math.max(1, layout.bodyHeight - PANE_BORDER);
}
