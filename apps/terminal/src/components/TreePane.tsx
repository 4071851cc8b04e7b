import { Box, Text } from "ink";
import type { AppState } from "@inkwell/ui-features";

interface TreePaneProps {
  state: AppState;
  width: number;
  height: number;
  focused: boolean;
}

/** First visible row, keeping the selection near the middle of the pane. */
export function windowStart(selected: number, total: number, visible: number): number {
  if (total <= visible) {
    return 0;
  }
  return Math.max(0, Math.min(selected - Math.floor(visible / 2), total - visible));
}

export function TreePane({ state, width, height, focused }: TreePaneProps) {
  const visible = Math.max(1, height - 2);
  const start = windowStart(state.selectedIndex, state.treeItems.length, visible);
  const rows = state.treeItems.slice(start, start + visible);

  return (
    <Box
      flexDirection="column"
      width={width}
      height={height}
      borderStyle="round"
      borderColor={focused ? "cyan" : "gray"}
    >
      {rows.length === 0 ? (
        <Text dimColor wrap="truncate">
          No notes yet. Press n to create one.
        </Text>
      ) : (
        rows.map((item, offset) => {
          const selected = start + offset === state.selectedIndex;
          const moving = state.pendingMove?.id === item.id;
          const open = state.currentNote?.id === item.id;
          const icon = item.type === "folder" ? (item.expanded ? "📂" : "📁") : "📄";
          return (
            <Text
              key={item.id}
              wrap="truncate"
              inverse={selected}
              bold={item.type === "folder"}
              color={moving ? "yellow" : open ? "green" : undefined}
            >
              {`${"  ".repeat(item.depth)}${icon} ${item.name}`}
            </Text>
          );
        })
      )}
    </Box>
  );
}
