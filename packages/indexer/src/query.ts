export interface SearchQuery {
  text: string;
  isRegex: boolean;
  caseSensitive: boolean;
  /** Restricts the candidates to notes filed directly in this folder. */
  folderId?: string;
}

export function createSearchQuery(text: string, options: Partial<Omit<SearchQuery, "text">> = {}): SearchQuery {
  return {
    text,
    isRegex: options.isRegex ?? false,
    caseSensitive: options.caseSensitive ?? false,
    ...(options.folderId !== undefined ? { folderId: options.folderId } : {})
  };
}

export interface AdvancedQuery {
  pattern: string;
  isRegex: boolean;
  caseSensitive: boolean;
  folderName?: string;
}

const FOLDER_PREFIX = /^folder:(?:"([^"]*)"|(\S+))\s*/;

/**
 * Reads leading `regex:`, `case:` and `folder:<name>` modifiers in any
 * order. Folder names with spaces are written in double quotes.
 */
export function parseAdvancedQuery(input: string): AdvancedQuery {
  const parsed: AdvancedQuery = { pattern: "", isRegex: false, caseSensitive: false };
  let rest = input.trimStart();

  for (;;) {
    if (rest.startsWith("regex:")) {
      parsed.isRegex = true;
      rest = rest.slice("regex:".length).trimStart();
      continue;
    }
    if (rest.startsWith("case:")) {
      parsed.caseSensitive = true;
      rest = rest.slice("case:".length).trimStart();
      continue;
    }
    const folder = rest.match(FOLDER_PREFIX);
    if (folder) {
      parsed.folderName = folder[1] ?? folder[2];
      rest = rest.slice(folder[0].length);
      continue;
    }
    break;
  }

  parsed.pattern = rest.trim();
  return parsed;
}
