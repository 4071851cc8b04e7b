import { offsetToPosition, positionToOffset, splitLines, type TextPosition } from "./text";

export interface AutocompleteSuggestion {
  trigger: string;
  completion: string;
  description: string;
  /** Negative values count back from the end of the inserted completion. */
  cursorOffset: number;
}

export interface CompletionMatch {
  suggestions: AutocompleteSuggestion[];
  /** Column where the trigger text starts on the cursor line. */
  triggerStart: number;
}

export interface AppliedCompletion {
  content: string;
  cursor: TextPosition;
}

const TABLE_SKELETON = [
  "| Header 1 | Header 2 |",
  "|----------|----------|",
  "| Cell 1   | Cell 2   |"
].join("\n");

const SUGGESTION_CATALOG: readonly AutocompleteSuggestion[] = [
  { trigger: "#", completion: "# ", description: "Heading 1", cursorOffset: 0 },
  { trigger: "##", completion: "## ", description: "Heading 2", cursorOffset: 0 },
  { trigger: "###", completion: "### ", description: "Heading 3", cursorOffset: 0 },
  { trigger: "-", completion: "- ", description: "Bullet list item", cursorOffset: 0 },
  { trigger: "*", completion: "* ", description: "Bullet list item (alt)", cursorOffset: 0 },
  { trigger: "*", completion: "**", description: "Italic text", cursorOffset: -1 },
  { trigger: "1.", completion: "1. ", description: "Numbered list item", cursorOffset: 0 },
  { trigger: "- [", completion: "- [ ] ", description: "Todo checkbox (unchecked)", cursorOffset: 0 },
  { trigger: "- [", completion: "- [x] ", description: "Todo checkbox (checked)", cursorOffset: 0 },
  { trigger: "- [x", completion: "- [x] ", description: "Todo checkbox (checked)", cursorOffset: 0 },
  { trigger: "```", completion: "```\n\n```", description: "Code block", cursorOffset: -4 },
  { trigger: "`", completion: "``", description: "Inline code", cursorOffset: -1 },
  { trigger: "**", completion: "****", description: "Bold text", cursorOffset: -2 },
  { trigger: "[", completion: "[](url)", description: "Link", cursorOffset: -6 },
  { trigger: "![", completion: "![alt text](image.png)", description: "Image", cursorOffset: -20 },
  { trigger: ">", completion: "> ", description: "Blockquote", cursorOffset: 0 },
  { trigger: "|", completion: TABLE_SKELETON, description: "Table", cursorOffset: -69 },
  { trigger: "---", completion: "---", description: "Horizontal rule", cursorOffset: 0 }
];

function isTokenBoundary(text: string): boolean {
  return text.length === 0 || text.trim().length === 0 || text.endsWith(" ");
}

export class MarkdownAutocomplete {
  private readonly suggestions = new Map<string, AutocompleteSuggestion[]>();

  constructor(catalog: readonly AutocompleteSuggestion[] = SUGGESTION_CATALOG) {
    for (const suggestion of catalog) {
      const bucket = this.suggestions.get(suggestion.trigger) ?? [];
      bucket.push(suggestion);
      this.suggestions.set(suggestion.trigger, bucket);
    }
  }

  checkForCompletions(content: string, line: number, column: number): CompletionMatch | null {
    const lines = splitLines(content);
    if (line < 0 || line >= lines.length) {
      return null;
    }

    const currentLine = lines[line];
    if (column < 0 || column > currentLine.length) {
      return null;
    }

    const head = currentLine.slice(0, column);
    let best: { trigger: string; start: number } | null = null;

    for (const trigger of this.suggestions.keys()) {
      if (!head.endsWith(trigger)) {
        continue;
      }
      const start = head.length - trigger.length;
      if (!isTokenBoundary(head.slice(0, start))) {
        continue;
      }
      if (!best || start < best.start) {
        best = { trigger, start };
      }
    }

    if (!best) {
      return null;
    }

    return {
      suggestions: [...(this.suggestions.get(best.trigger) ?? [])],
      triggerStart: best.start
    };
  }
}

export function applySuggestion(
  content: string,
  cursor: TextPosition,
  triggerStart: number,
  suggestion: AutocompleteSuggestion
): AppliedCompletion {
  const triggerOffset = positionToOffset(content, { line: cursor.line, column: triggerStart });
  const cursorOffset = positionToOffset(content, cursor);

  const next = content.slice(0, triggerOffset) + suggestion.completion + content.slice(cursorOffset);
  const insertionEnd = triggerOffset + suggestion.completion.length;
  const target =
    suggestion.cursorOffset >= 0
      ? insertionEnd + suggestion.cursorOffset
      : Math.max(0, insertionEnd + suggestion.cursorOffset);

  return { content: next, cursor: offsetToPosition(next, Math.min(target, next.length)) };
}

export class AutocompleteState {
  active = false;
  suggestions: AutocompleteSuggestion[] = [];
  selectedIndex = 0;
  triggerStart = 0;

  activate(suggestions: AutocompleteSuggestion[], triggerStart: number): void {
    this.active = true;
    this.suggestions = suggestions;
    this.selectedIndex = 0;
    this.triggerStart = triggerStart;
  }

  deactivate(): void {
    this.active = false;
    this.suggestions = [];
    this.selectedIndex = 0;
  }

  next(): void {
    if (this.suggestions.length > 0) {
      this.selectedIndex = (this.selectedIndex + 1) % this.suggestions.length;
    }
  }

  previous(): void {
    if (this.suggestions.length > 0) {
      this.selectedIndex = (this.selectedIndex - 1 + this.suggestions.length) % this.suggestions.length;
    }
  }

  selected(): AutocompleteSuggestion | undefined {
    return this.suggestions[this.selectedIndex];
  }
}
