import { SearchHistory } from "./history";
import { compilePattern, findSpans, replaceAll, type MatchOptions } from "./matcher";
import type { SearchQuery } from "./query";

export interface SearchableNote {
  id: string;
  title: string;
  content: string;
  tags: string[];
  folderId?: string;
  createdAt: string;
  modifiedAt: string;
}

export interface SearchableNotebook<T extends SearchableNote> {
  notes: ReadonlyMap<string, T>;
}

export type MatchField = "title" | "content" | "tag";

export interface SearchMatch {
  /** Zero-based content line; 0 for title and tag matches. */
  lineNumber: number;
  lineText: string;
  start: number;
  end: number;
  field: MatchField;
}

export interface SearchResult<T extends SearchableNote> {
  note: T;
  matches: SearchMatch[];
}

export interface ReplaceResult<T extends SearchableNote> {
  note: T;
  count: number;
}

function matchesIn(pattern: RegExp | null, text: string, field: MatchField, lineNumber = 0): SearchMatch[] {
  return findSpans(pattern, text).map(({ start, end }) => ({ lineNumber, lineText: text, start, end, field }));
}

function titleMatchCount(result: SearchResult<SearchableNote>): number {
  return result.matches.filter((match) => match.field === "title").length;
}

function compareTitles(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

export class SearchEngine {
  readonly history: SearchHistory;

  constructor(history = new SearchHistory()) {
    this.history = history;
  }

  search<T extends SearchableNote>(notebook: SearchableNotebook<T>, query: SearchQuery): SearchResult<T>[] {
    this.history.add(query.text);
    const pattern = compilePattern(query.text, query);

    const results: SearchResult<T>[] = [];
    for (const note of notebook.notes.values()) {
      if (query.folderId !== undefined && note.folderId !== query.folderId) {
        continue;
      }

      const matches = [
        ...matchesIn(pattern, note.title, "title"),
        ...note.content.split("\n").flatMap((line, lineNumber) => matchesIn(pattern, line, "content", lineNumber)),
        ...note.tags.flatMap((tag) => matchesIn(pattern, tag, "tag"))
      ];
      if (matches.length > 0) {
        results.push({ note, matches });
      }
    }

    return results.sort(
      (left, right) =>
        titleMatchCount(right) - titleMatchCount(left) ||
        right.matches.length - left.matches.length ||
        compareTitles(left.note.title, right.note.title)
    );
  }

  /** Replaces in title and content; tags are left alone and the input is not mutated. */
  replaceInNote<T extends SearchableNote>(
    note: T,
    find: string,
    replacement: string,
    options: MatchOptions,
    now = new Date()
  ): ReplaceResult<T> {
    const pattern = compilePattern(find, options);
    const title = replaceAll(pattern, note.title, replacement, options.isRegex);
    const content = replaceAll(pattern, note.content, replacement, options.isRegex);
    const count = title.count + content.count;

    if (count === 0) {
      return { note, count };
    }
    const stamp = now.toISOString();
    return {
      note: {
        ...note,
        title: title.text,
        content: content.text,
        modifiedAt: stamp < note.createdAt ? note.createdAt : stamp
      },
      count
    };
  }

  clearHistory(): void {
    this.history.clear();
  }
}
