import MarkdownIt from "markdown-it";

type Token = ReturnType<MarkdownIt["parse"]>[number];

export type PreviewStyle =
  | "plain"
  | "heading"
  | "strong"
  | "emphasis"
  | "strong-emphasis"
  | "code"
  | "code-block"
  | "quote"
  | "bullet"
  | "link"
  | "rule"
  | "html"
  | "muted";

export interface PreviewSegment {
  text: string;
  style: PreviewStyle;
}

export type PreviewLine = PreviewSegment[];

interface ListFrame {
  ordered: boolean;
  next: number;
}

const markdownParser = new MarkdownIt({
  html: true,
  linkify: true,
  breaks: true
});

const RULE_WIDTH = 40;
const TASK_PATTERN = /^\[([ xX])\]\s+/;

export const EMPTY_PREVIEW: readonly PreviewLine[] = [
  [{ text: "Live Preview", style: "heading" }],
  [],
  [{ text: "Start typing in the editor to see the preview here...", style: "muted" }]
];

class PreviewBuilder {
  readonly lines: PreviewLine[] = [];
  private current: PreviewLine = [];
  private readonly lists: ListFrame[] = [];
  private quoteDepth = 0;
  private headingLevel = 0;
  private strong = false;
  private emphasis = false;
  private link = false;
  private taskPending = false;

  push(text: string, style: PreviewStyle): void {
    if (!text) {
      return;
    }
    if (this.current.length === 0 && this.quoteDepth > 0) {
      this.current.push({ text: "▌ ".repeat(this.quoteDepth), style: "quote" });
    }
    this.current.push({ text, style });
  }

  flush(): void {
    if (this.current.length > 0) {
      this.lines.push(this.current);
      this.current = [];
    }
  }

  blank(): void {
    this.flush();
    if (this.lines.length > 0 && this.lines[this.lines.length - 1].length > 0) {
      this.lines.push([]);
    }
  }

  block(token: Token): void {
    switch (token.type) {
      case "heading_open":
        this.blank();
        this.headingLevel = Number(token.tag.slice(1)) || 1;
        this.push(`${"#".repeat(this.headingLevel)} `, "heading");
        break;
      case "heading_close":
        this.headingLevel = 0;
        this.blank();
        break;
      case "paragraph_close":
        if (this.lists.length === 0) {
          this.blank();
        } else {
          this.flush();
        }
        break;
      case "bullet_list_open":
      case "ordered_list_open":
        this.flush();
        this.lists.push({ ordered: token.type === "ordered_list_open", next: Number(token.attrGet("start") ?? 1) });
        break;
      case "bullet_list_close":
      case "ordered_list_close":
        this.lists.pop();
        if (this.lists.length === 0) {
          this.blank();
        }
        break;
      case "list_item_open": {
        this.flush();
        const frame = this.lists[this.lists.length - 1];
        const indent = "  ".repeat(Math.max(0, this.lists.length - 1));
        const marker = frame?.ordered ? `${frame.next++}. ` : "• ";
        this.push(indent + marker, "bullet");
        this.taskPending = !frame?.ordered;
        break;
      }
      case "list_item_close":
        this.flush();
        break;
      case "blockquote_open":
        this.flush();
        this.quoteDepth += 1;
        break;
      case "blockquote_close":
        this.quoteDepth = Math.max(0, this.quoteDepth - 1);
        this.blank();
        break;
      case "fence":
      case "code_block":
        this.flush();
        for (const line of token.content.replace(/\n$/, "").split("\n")) {
          this.push(`  ${line}`, "code-block");
          this.flush();
        }
        this.blank();
        break;
      case "hr":
        this.flush();
        this.push("─".repeat(RULE_WIDTH), "rule");
        this.blank();
        break;
      case "html_block":
        this.flush();
        for (const line of token.content.replace(/\n$/, "").split("\n")) {
          this.push(line, "html");
          this.flush();
        }
        break;
      case "tr_close":
        this.flush();
        break;
      case "thead_close":
        this.push("─".repeat(RULE_WIDTH), "rule");
        this.flush();
        break;
      case "table_close":
        this.blank();
        break;
      case "th_open":
      case "td_open":
        if (this.current.length > 0) {
          this.push(" │ ", "muted");
        }
        this.strong = token.type === "th_open";
        break;
      case "th_close":
        this.strong = false;
        break;
      case "inline":
        this.inline(token.children ?? []);
        break;
      default:
        break;
    }
  }

  private inlineStyle(): PreviewStyle {
    if (this.headingLevel > 0) {
      return "heading";
    }
    if (this.link) {
      return "link";
    }
    if (this.strong && this.emphasis) {
      return "strong-emphasis";
    }
    if (this.strong) {
      return "strong";
    }
    return this.emphasis ? "emphasis" : "plain";
  }

  private inline(children: Token[]): void {
    for (const child of children) {
      switch (child.type) {
        case "text": {
          let text = child.content;
          if (this.taskPending) {
            this.taskPending = false;
            const task = text.match(TASK_PATTERN);
            if (task) {
              this.push(task[1] === " " ? "☐ " : "☑ ", "bullet");
              text = text.slice(task[0].length);
            }
          }
          this.push(text, this.inlineStyle());
          break;
        }
        case "code_inline":
          this.push(` ${child.content} `, "code");
          break;
        case "strong_open":
          this.strong = true;
          break;
        case "strong_close":
          this.strong = false;
          break;
        case "em_open":
          this.emphasis = true;
          break;
        case "em_close":
          this.emphasis = false;
          break;
        case "link_open":
          this.link = true;
          break;
        case "link_close":
          this.link = false;
          break;
        case "image":
          this.push(`[image: ${child.content || child.attrGet("src") || ""}]`, "link");
          break;
        case "html_inline":
          this.push(child.content, "html");
          break;
        case "softbreak":
        case "hardbreak":
          this.flush();
          break;
        default:
          break;
      }
      this.taskPending = false;
    }
  }

  finish(): PreviewLine[] {
    this.flush();
    while (this.lines.length > 0 && this.lines[this.lines.length - 1].length === 0) {
      this.lines.pop();
    }
    return this.lines;
  }
}

export function renderMarkdownPreview(markdown: string): PreviewLine[] {
  if (!markdown.trim()) {
    return EMPTY_PREVIEW.map((line) => [...line]);
  }

  const builder = new PreviewBuilder();
  for (const token of markdownParser.parse(markdown, {})) {
    builder.block(token);
  }
  return builder.finish();
}

export function previewLineText(line: PreviewLine): string {
  return line.map((segment) => segment.text).join("");
}
