export interface TextPosition {
  line: number;
  column: number;
}

/** Lines of a document; a trailing newline opens an empty last line. */
export function splitLines(content: string): string[] {
  return content.split("\n");
}

export function lineCount(content: string): number {
  return splitLines(content).length;
}

export function lineStartOffset(content: string, line: number): number {
  const lines = splitLines(content);
  let offset = 0;
  for (let index = 0; index < Math.min(line, lines.length); index += 1) {
    offset += lines[index].length + 1;
  }
  return offset;
}

export function positionToOffset(content: string, position: TextPosition): number {
  return lineStartOffset(content, position.line) + position.column;
}

export function offsetToPosition(content: string, offset: number): TextPosition {
  const lines = splitLines(content);
  let lineStart = 0;

  for (let line = 0; line < lines.length; line += 1) {
    if (lineStart + lines[line].length >= offset) {
      return { line, column: Math.max(0, offset - lineStart) };
    }
    lineStart += lines[line].length + 1;
  }

  const last = lines.length - 1;
  return { line: last, column: lines[last].length };
}
