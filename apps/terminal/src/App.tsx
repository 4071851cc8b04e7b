import { useEffect, useState } from "react";
import { Box, Text, useApp, useInput, useStdout } from "ink";
import { computeLayout, handleKey, paneViewportHeight, type AppState } from "@inkwell/ui-features";
import { EditorPane } from "./components/EditorPane";
import { HelpScreen } from "./components/HelpScreen";
import { PreviewPane } from "./components/PreviewPane";
import { StatusBar } from "./components/StatusBar";
import { TreePane } from "./components/TreePane";
import { DEFAULT_TICK_MS } from "./config";
import { toKeyEvents } from "./keys";

export interface AppProps {
  state: AppState;
  tickMs?: number;
}

interface TerminalSize {
  columns: number;
  rows: number;
}

const FALLBACK_SIZE: TerminalSize = { columns: 80, rows: 24 };

/** Folder chain of the open note, root first. */
export function breadcrumb(state: AppState): string {
  const note = state.currentNote;
  if (!note) {
    return "Inkwell";
  }

  const names: string[] = [];
  const visited = new Set<string>();
  let folderId = note.folderId;
  while (folderId && !visited.has(folderId)) {
    visited.add(folderId);
    const folder = state.notebook.folders.get(folderId);
    if (!folder) {
      break;
    }
    names.unshift(folder.name);
    folderId = folder.parentId;
  }
  return ["Inkwell", ...names, note.title].join(" › ");
}

export default function App({ state, tickMs = DEFAULT_TICK_MS }: AppProps) {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const [, setVersion] = useState(0);
  const [size, setSize] = useState<TerminalSize>(() => ({
    columns: stdout.columns || FALLBACK_SIZE.columns,
    rows: stdout.rows || FALLBACK_SIZE.rows
  }));

  const refresh = () => setVersion((version) => version + 1);
  const layout = computeLayout(size.columns, size.rows, state.previewEnabled);

  useEffect(() => {
    const handleResize = () => {
      setSize({
        columns: stdout.columns || FALLBACK_SIZE.columns,
        rows: stdout.rows || FALLBACK_SIZE.rows
      });
    };
    stdout.on("resize", handleResize);
    return () => {
      stdout.off("resize", handleResize);
    };
  }, [stdout]);

  useEffect(() => {
    state.viewportHeight = paneViewportHeight(layout);
  }, [state, layout.bodyHeight]);

  useEffect(() => {
    const timer = setInterval(() => {
      if (state.tick()) {
        setVersion((version) => version + 1);
      }
    }, tickMs);
    return () => {
      clearInterval(timer);
    };
  }, [state, tickMs]);

  useInput((input, key) => {
    for (const event of toKeyEvents(input, key)) {
      handleKey(state, event);
      if (state.shouldQuit) {
        break;
      }
    }
    refresh();
    if (state.shouldQuit) {
      exit();
    }
  });

  return (
    <Box flexDirection="column">
      <Text color="gray" wrap="truncate">
        {breadcrumb(state)}
      </Text>
      {state.mode === "help" ? (
        <HelpScreen state={state} height={layout.bodyHeight} />
      ) : (
        <Box flexDirection="row" height={layout.bodyHeight}>
          <TreePane
            state={state}
            width={layout.treeWidth}
            height={layout.bodyHeight}
            focused={state.focusedPane === "folders"}
          />
          <EditorPane
            state={state}
            width={layout.editorWidth}
            height={layout.bodyHeight}
            focused={state.focusedPane === "editor"}
          />
          {state.previewEnabled && (
            <PreviewPane
              state={state}
              width={layout.previewWidth}
              height={layout.bodyHeight}
              focused={state.focusedPane === "preview"}
            />
          )}
        </Box>
      )}
      <StatusBar state={state} />
    </Box>
  );
}
