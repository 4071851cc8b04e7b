const TAG_PATTERN = /(^|\s)#([a-zA-Z0-9/_-]+)/g;
const EXPORT_PATTERN = /^# (.*)\n\nCreated: (.*)\nModified: (.*)\nTags: (.*)\n\n---\n\n([\s\S]*)$/;
const FILE_NAME_RESERVED = /[\/\\:*?"<>|\u0000-\u001f\u007f]/g;

export interface ExportableNote {
  title: string;
  content: string;
  tags: string[];
  createdAt: string;
  modifiedAt: string;
}

export interface ParsedMarkdownNote {
  title: string;
  content: string;
  tags: string[];
  createdAt?: string;
  modifiedAt?: string;
}

export function extractTags(markdown: string): string[] {
  const tags = new Set<string>();
  for (const match of markdown.matchAll(TAG_PATTERN)) {
    tags.add(match[2].toLowerCase());
  }
  return [...tags.values()];
}

export function sanitizeFileName(title: string): string {
  return title.replace(FILE_NAME_RESERVED, "_").trim() || "Untitled";
}

/** `2024-03-09T08:05:01.000Z` becomes `2024-03-09 08:05:01`. */
export function formatTimestamp(iso: string): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) {
    return iso;
  }
  return date.toISOString().slice(0, 19).replace("T", " ");
}

export function parseTimestamp(value: string): string | undefined {
  const date = new Date(`${value.trim().replace(" ", "T")}Z`);
  return Number.isNaN(date.getTime()) ? undefined : date.toISOString();
}

export function formatNoteForExport(note: ExportableNote): string {
  return [
    `# ${note.title}`,
    "",
    `Created: ${formatTimestamp(note.createdAt)}`,
    `Modified: ${formatTimestamp(note.modifiedAt)}`,
    `Tags: ${note.tags.join(", ")}`,
    "",
    "---",
    "",
    note.content
  ].join("\n");
}

export function parseMarkdownNote(markdown: string, fallbackTitle: string): ParsedMarkdownNote {
  const text = markdown.replace(/\r\n/g, "\n");

  const exported = text.match(EXPORT_PATTERN);
  if (exported) {
    return {
      title: exported[1],
      createdAt: parseTimestamp(exported[2]),
      modifiedAt: parseTimestamp(exported[3]),
      tags: exported[4]
        .split(",")
        .map((tag) => tag.trim())
        .filter(Boolean),
      content: exported[5]
    };
  }

  if (text.startsWith("# ")) {
    const newline = text.indexOf("\n");
    const heading = newline === -1 ? text : text.slice(0, newline);
    const rest = newline === -1 ? "" : text.slice(newline + 1);
    const content = rest.startsWith("\n") ? rest.slice(1) : rest;
    return {
      title: heading.slice(2).trim() || fallbackTitle,
      content,
      tags: extractTags(content)
    };
  }

  return { title: fallbackTitle, content: text, tags: extractTags(text) };
}
