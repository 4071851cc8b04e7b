import { Box, Text } from "ink";
import { MAX_SUGGESTION_ROWS, type AppState } from "@inkwell/ui-features";

interface EditorPaneProps {
  state: AppState;
  width: number;
  height: number;
  focused: boolean;
}

function firstLine(text: string): string {
  const newline = text.indexOf("\n");
  return newline === -1 ? text : `${text.slice(0, newline)}…`;
}

/** Splits a line around the cursor so the cell under it can be drawn inverted. */
function splitAtCursor(line: string, column: number): [before: string, cell: string, after: string] {
  const tail = line.slice(column);
  const point = tail.codePointAt(0);
  if (point === undefined) {
    return [line.slice(0, column), " ", ""];
  }
  const cell = String.fromCodePoint(point);
  return [line.slice(0, column), cell, tail.slice(cell.length)];
}

export function EditorPane({ state, width, height, focused }: EditorPaneProps) {
  const { editor, completion, currentNote } = state;
  const inserting = state.mode === "insert";
  const border = focused ? (inserting ? "green" : "cyan") : "gray";

  if (!currentNote) {
    return (
      <Box flexDirection="column" width={width} height={height} borderStyle="round" borderColor={border}>
        <Text dimColor wrap="truncate">
          Select a note and press Enter to open it.
        </Text>
      </Box>
    );
  }

  const suggestions = inserting && completion.active ? completion.suggestions.slice(0, MAX_SUGGESTION_ROWS) : [];
  const visible = Math.max(1, height - 2 - suggestions.length);
  const gutter = String(editor.lineCount()).length;
  const lines = editor.lines().slice(editor.scroll, editor.scroll + visible);

  return (
    <Box flexDirection="column" width={width} height={height} borderStyle="round" borderColor={border}>
      {lines.map((line, offset) => {
        const lineIndex = editor.scroll + offset;
        const number = <Text dimColor>{`${String(lineIndex + 1).padStart(gutter)} `}</Text>;
        if (inserting && lineIndex === editor.cursor.line) {
          const [before, cell, after] = splitAtCursor(line, editor.cursor.column);
          return (
            <Text key={lineIndex} wrap="truncate">
              {number}
              {before}
              <Text inverse>{cell}</Text>
              {after}
            </Text>
          );
        }
        return (
          <Text key={lineIndex} wrap="truncate">
            {number}
            {line || " "}
          </Text>
        );
      })}
      {suggestions.length > 0 && (
        <Box flexDirection="column" marginTop={Math.max(0, visible - lines.length)}>
          {suggestions.map((suggestion, index) => (
            <Text
              key={`${suggestion.trigger}:${suggestion.description}`}
              wrap="truncate"
              color="cyan"
              inverse={index === completion.selectedIndex}
            >
              {` ${firstLine(suggestion.completion)}  ${suggestion.description} `}
            </Text>
          ))}
        </Box>
      )}
    </Box>
  );
}
