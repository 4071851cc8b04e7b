import { SearchError } from "./errors";

export interface MatchOptions {
  isRegex: boolean;
  caseSensitive: boolean;
}

export interface MatchSpan {
  start: number;
  end: number;
}

export interface Replacement {
  text: string;
  count: number;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Compiles a query into a global pattern. Literal text is escaped, so both
 * kinds scan left to right and resume at the end of the previous match.
 * Returns `null` for an empty pattern, which matches nothing.
 */
export function compilePattern(pattern: string, options: MatchOptions): RegExp | null {
  if (!pattern) {
    return null;
  }

  const source = options.isRegex ? pattern : escapeRegExp(pattern);
  const flags = options.caseSensitive ? "g" : "gi";
  try {
    return new RegExp(source, flags);
  } catch (error) {
    const reason = error instanceof Error ? error.message : "unparseable pattern";
    throw new SearchError("invalid-pattern", `Invalid regex: ${reason}`, { cause: error });
  }
}

export function findSpans(pattern: RegExp | null, text: string): MatchSpan[] {
  if (!pattern) {
    return [];
  }

  const spans: MatchSpan[] = [];
  for (const match of text.matchAll(pattern)) {
    const start = match.index ?? 0;
    spans.push({ start, end: start + match[0].length });
  }
  return spans;
}

/** Regex replacements may reference groups (`$1`); literal replacements are inserted as-is. */
export function replaceAll(pattern: RegExp | null, text: string, replacement: string, isRegex: boolean): Replacement {
  if (!pattern) {
    return { text, count: 0 };
  }

  const count = findSpans(pattern, text).length;
  if (count === 0) {
    return { text, count };
  }
  return {
    text: isRegex ? text.replace(pattern, replacement) : text.replace(pattern, () => replacement),
    count
  };
}
