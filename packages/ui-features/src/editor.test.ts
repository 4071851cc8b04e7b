import { describe, expect, it } from "vitest";
import { EditorBuffer } from "./editor";

describe("EditorBuffer", () => {
  it("inserts at the cursor and splits lines on newline", () => {
    const editor = new EditorBuffer("hello world");
    editor.setCursor({ line: 0, column: 5 });

    editor.insert(",");
    editor.newline();

    expect(editor.content).toBe("hello,\n world");
    expect(editor.cursor).toEqual({ line: 1, column: 0 });
  });

  it("joins lines when backspacing at column zero", () => {
    const editor = new EditorBuffer("ab\ncd");
    editor.setCursor({ line: 1, column: 0 });

    expect(editor.backspace()).toBe(true);
    expect(editor.content).toBe("abcd");
    expect(editor.cursor).toEqual({ line: 0, column: 2 });
  });

  it("does nothing when backspacing at the start", () => {
    const editor = new EditorBuffer("ab");

    expect(editor.backspace()).toBe(false);
    expect(editor.content).toBe("ab");
  });

  it("removes a surrogate pair as one character", () => {
    const editor = new EditorBuffer("a😀");
    editor.setCursor({ line: 0, column: 3 });

    editor.backspace();

    expect(editor.content).toBe("a");
    expect(editor.cursor).toEqual({ line: 0, column: 1 });
  });

  it("moves over a surrogate pair as one character", () => {
    const editor = new EditorBuffer("a\u{1F600}b");
    editor.setCursor({ line: 0, column: 3 });

    editor.moveLeft();
    expect(editor.cursor).toEqual({ line: 0, column: 1 });
    editor.insert("x");
    expect(editor.content).toBe("ax\u{1F600}b");

    editor.moveRight();
    expect(editor.cursor).toEqual({ line: 0, column: 4 });
  });

  it("never places the cursor inside a surrogate pair", () => {
    const editor = new EditorBuffer("ab\n\u{1F600}");
    editor.setCursor({ line: 1, column: 1 });
    expect(editor.cursor).toEqual({ line: 1, column: 0 });

    editor.setCursor({ line: 0, column: 1 });
    editor.moveDown();
    expect(editor.cursor).toEqual({ line: 1, column: 0 });
  });

  it("indents with four spaces", () => {
    const editor = new EditorBuffer("x");

    editor.tab();

    expect(editor.content).toBe("    x");
    expect(editor.cursor.column).toBe(4);
  });

  it("keeps horizontal movement within the line", () => {
    const editor = new EditorBuffer("ab\ncdef");
    editor.moveLeft();
    expect(editor.cursor).toEqual({ line: 0, column: 0 });

    editor.moveRight();
    editor.moveRight();
    editor.moveRight();
    expect(editor.cursor).toEqual({ line: 0, column: 2 });
  });

  it("clamps the column when moving vertically", () => {
    const editor = new EditorBuffer("abcdef\nxy\nlast");
    editor.setCursor({ line: 0, column: 5 });

    editor.moveDown();
    expect(editor.cursor).toEqual({ line: 1, column: 2 });

    editor.moveDown();
    editor.moveDown();
    expect(editor.cursor).toEqual({ line: 2, column: 2 });
  });

  it("clamps scrolling to the line count", () => {
    const editor = new EditorBuffer(Array.from({ length: 30 }, (_, index) => `line ${index}`).join("\n"));

    editor.scrollBy(20);
    editor.scrollBy(20);
    expect(editor.scroll).toBe(29);

    editor.scrollBy(-100);
    expect(editor.scroll).toBe(0);

    editor.scrollToBottom();
    expect(editor.scroll).toBe(29);
  });

  it("scrolls just enough to keep the cursor visible", () => {
    const editor = new EditorBuffer(Array.from({ length: 50 }, () => "x").join("\n"));
    editor.setCursor({ line: 30, column: 0 });

    editor.adjustScrollToCursor(20);
    expect(editor.scroll).toBe(11);

    editor.setCursor({ line: 5, column: 0 });
    editor.adjustScrollToCursor(20);
    expect(editor.scroll).toBe(5);
  });

  it("keeps the cursor inside replaced content", () => {
    const editor = new EditorBuffer("first line\nsecond line");
    editor.setCursor({ line: 1, column: 8 });

    editor.replaceContent("short");

    expect(editor.cursor).toEqual({ line: 0, column: 5 });
  });
});
