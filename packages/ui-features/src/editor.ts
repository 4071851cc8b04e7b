import { lineCount, offsetToPosition, positionToOffset, splitLines, type TextPosition } from "@inkwell/doc-engine";

export const HALF_PAGE_LINES = 10;
export const PAGE_LINES = 20;
export const TAB_TEXT = "    ";

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/** True when `column` falls between the two halves of a surrogate pair. */
function splitsPair(text: string, column: number): boolean {
  return column > 0 && isHighSurrogate(text.charCodeAt(column - 1)) && isLowSurrogate(text.charCodeAt(column));
}

/** Markdown source being edited, with a cursor and a vertical scroll offset. */
export class EditorBuffer {
  content = "";
  cursor: TextPosition = { line: 0, column: 0 };
  scroll = 0;

  constructor(content = "") {
    this.load(content);
  }

  load(content: string): void {
    this.content = content;
    this.cursor = { line: 0, column: 0 };
    this.scroll = 0;
  }

  /** Swaps the content while keeping the cursor and scroll as close as the new text allows. */
  replaceContent(content: string): void {
    this.content = content;
    this.setCursor(this.cursor);
    this.scroll = Math.min(this.scroll, this.maxScroll());
  }

  lines(): string[] {
    return splitLines(this.content);
  }

  lineCount(): number {
    return lineCount(this.content);
  }

  currentLine(): string {
    return this.lines()[this.cursor.line] ?? "";
  }

  offset(): number {
    return positionToOffset(this.content, this.cursor);
  }

  setCursor(position: TextPosition): void {
    const lines = this.lines();
    const line = Math.max(0, Math.min(position.line, lines.length - 1));
    const text = lines[line];
    const column = Math.max(0, Math.min(position.column, text.length));
    this.cursor = { line, column: splitsPair(text, column) ? column - 1 : column };
  }

  private moveToOffset(offset: number): void {
    this.cursor = offsetToPosition(this.content, offset);
  }

  insert(text: string): void {
    const offset = this.offset();
    this.content = this.content.slice(0, offset) + text + this.content.slice(offset);
    this.moveToOffset(offset + text.length);
  }

  newline(): void {
    this.insert("\n");
  }

  tab(): void {
    this.insert(TAB_TEXT);
  }

  /** Removes the character before the cursor, joining lines at column 0. */
  backspace(): boolean {
    const offset = this.offset();
    if (offset === 0) {
      return false;
    }

    const width =
      offset >= 2 &&
      isLowSurrogate(this.content.charCodeAt(offset - 1)) &&
      isHighSurrogate(this.content.charCodeAt(offset - 2))
        ? 2
        : 1;
    this.content = this.content.slice(0, offset - width) + this.content.slice(offset);
    this.moveToOffset(offset - width);
    return true;
  }

  deleteForward(): boolean {
    const offset = this.offset();
    if (offset >= this.content.length) {
      return false;
    }

    const width =
      isHighSurrogate(this.content.charCodeAt(offset)) && isLowSurrogate(this.content.charCodeAt(offset + 1)) ? 2 : 1;
    this.content = this.content.slice(0, offset) + this.content.slice(offset + width);
    return true;
  }

  moveLeft(): void {
    const { column } = this.cursor;
    if (column > 0) {
      const step = splitsPair(this.currentLine(), column - 1) ? 2 : 1;
      this.cursor = { ...this.cursor, column: column - step };
    }
  }

  moveRight(): void {
    const line = this.currentLine();
    const { column } = this.cursor;
    if (column < line.length) {
      const step = splitsPair(line, column + 1) ? 2 : 1;
      this.cursor = { ...this.cursor, column: column + step };
    }
  }

  moveUp(): void {
    if (this.cursor.line > 0) {
      this.setCursor({ line: this.cursor.line - 1, column: this.cursor.column });
    }
  }

  moveDown(): void {
    if (this.cursor.line < this.lineCount() - 1) {
      this.setCursor({ line: this.cursor.line + 1, column: this.cursor.column });
    }
  }

  private maxScroll(): number {
    return Math.max(0, this.lineCount() - 1);
  }

  scrollBy(delta: number): void {
    this.scroll = Math.max(0, Math.min(this.scroll + delta, this.maxScroll()));
  }

  scrollToTop(): void {
    this.scroll = 0;
  }

  scrollToBottom(): void {
    this.scroll = this.maxScroll();
  }

  adjustScrollToCursor(visibleHeight: number): void {
    const height = Math.max(1, visibleHeight);
    if (this.cursor.line < this.scroll) {
      this.scroll = this.cursor.line;
    } else if (this.cursor.line >= this.scroll + height) {
      this.scroll = this.cursor.line - height + 1;
    }
  }
}
