import { Box, Text } from "ink";
import {
  MODE_LABELS,
  PANE_LABELS,
  type AppState,
  type OperationKind,
  type SaveStatus
} from "@inkwell/ui-features";

const SAVE_LABELS: Record<SaveStatus, { text: string; color: string }> = {
  saved: { text: "✓ saved", color: "green" },
  modified: { text: "● modified", color: "yellow" },
  saving: { text: "… saving", color: "blue" },
  error: { text: "✗ save failed", color: "red" }
};

const RESULT_COLORS: Record<OperationKind, string> = {
  success: "green",
  error: "red",
  info: "blue"
};

function onOff(value: boolean): string {
  return value ? "on" : "off";
}

/** Label and buffer for the modes that read a line of text. */
export function promptFor(state: AppState): { label: string; value: string } | null {
  switch (state.mode) {
    case "search":
      return { label: "/", value: state.inputBuffer };
    case "search-advanced":
      return { label: "Search (regex: case: folder:<name>) ", value: state.inputBuffer };
    case "search-replace": {
      const { isRegex, caseSensitive } = state.replaceOptions;
      return {
        label: `Replace [regex ${onOff(isRegex)}, case ${onOff(caseSensitive)}] find|replace: `,
        value: state.inputBuffer
      };
    }
    case "command":
      return { label: ":", value: state.commandBuffer };
    case "input-note":
      return { label: "New note title: ", value: state.inputBuffer };
    case "input-folder":
      return { label: "New folder name: ", value: state.inputBuffer };
    default:
      return null;
  }
}

export function StatusBar({ state }: { state: AppState }) {
  const { feedback } = state;
  const save = SAVE_LABELS[feedback.saveStatus];
  const prompt = promptFor(state);
  const pending = state.pendingDelete;

  return (
    <Box flexDirection="column">
      <Box>
        <Text inverse bold>{` ${MODE_LABELS[state.mode]} `}</Text>
        <Text>{` ${PANE_LABELS[state.focusedPane]} `}</Text>
        <Text color={save.color}>{save.text}</Text>
        {feedback.result && (
          <Text color={RESULT_COLORS[feedback.result.kind]} wrap="truncate">
            {`  ${feedback.result.icon} ${feedback.result.message}`}
          </Text>
        )}
      </Box>
      {prompt ? (
        <Text wrap="truncate">
          {prompt.label}
          {prompt.value}
          <Text inverse> </Text>
        </Text>
      ) : state.mode === "delete-confirm" && pending ? (
        <Text color="red" wrap="truncate">
          {`Delete ${pending.type} '${pending.name}'? y/Enter confirms, any other key cancels`}
        </Text>
      ) : (
        <Text wrap="truncate">{feedback.message || " "}</Text>
      )}
    </Box>
  );
}
