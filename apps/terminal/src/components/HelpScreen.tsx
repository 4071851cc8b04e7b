import { Box, Text } from "ink";
import { HELP_SECTIONS, type AppState } from "@inkwell/ui-features";

const RECENT_MESSAGES = 5;
const KEY_COLUMN = 38;

export function HelpScreen({ state, height }: { state: AppState; height: number }) {
  const recent = state.feedback.history.slice(0, RECENT_MESSAGES);

  return (
    <Box flexDirection="column" height={height} borderStyle="round" borderColor="cyan" paddingX={1}>
      <Text bold>Keyboard shortcuts (Esc, ? or q to close)</Text>
      {HELP_SECTIONS.map((section) => (
        <Box key={section.title} flexDirection="column" marginTop={1}>
          <Text bold color="cyan">
            {section.title}
          </Text>
          {section.bindings.map(([keys, description]) => (
            <Text key={keys} wrap="truncate">
              <Text color="yellow">{keys.padEnd(KEY_COLUMN)}</Text>
              {description}
            </Text>
          ))}
        </Box>
      ))}
      {recent.length > 0 && (
        <Box flexDirection="column" marginTop={1}>
          <Text bold color="cyan">
            Recent messages
          </Text>
          {recent.map((message, index) => (
            <Text key={index} dimColor wrap="truncate">
              {message}
            </Text>
          ))}
        </Box>
      )}
    </Box>
  );
}
