import { Box, Text } from "ink";
import { renderMarkdownPreview, type PreviewStyle } from "@inkwell/doc-engine";
import type { AppState } from "@inkwell/ui-features";

interface PreviewPaneProps {
  state: AppState;
  width: number;
  height: number;
  focused: boolean;
}

interface SegmentStyle {
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
  dimColor?: boolean;
  color?: string;
}

const PREVIEW_STYLES: Record<PreviewStyle, SegmentStyle> = {
  plain: {},
  heading: { bold: true, color: "cyan" },
  strong: { bold: true },
  emphasis: { italic: true },
  "strong-emphasis": { bold: true, italic: true },
  code: { color: "yellow" },
  "code-block": { color: "yellow" },
  quote: { color: "gray" },
  bullet: { color: "magenta" },
  link: { underline: true, color: "blue" },
  rule: { dimColor: true },
  html: { dimColor: true },
  muted: { dimColor: true }
};

export function PreviewPane({ state, width, height, focused }: PreviewPaneProps) {
  const lines = renderMarkdownPreview(state.editor.content);
  const visible = Math.max(1, height - 2);
  const start = Math.min(state.editor.scroll, Math.max(0, lines.length - visible));

  return (
    <Box
      flexDirection="column"
      width={width}
      height={height}
      borderStyle="round"
      borderColor={focused ? "cyan" : "gray"}
    >
      {lines.slice(start, start + visible).map((line, offset) => (
        <Text key={start + offset} wrap="truncate">
          {line.length === 0
            ? " "
            : line.map((segment, index) => (
                <Text key={index} {...PREVIEW_STYLES[segment.style]}>
                  {segment.text}
                </Text>
              ))}
        </Text>
      ))}
    </Box>
  );
}
