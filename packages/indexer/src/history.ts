export const DEFAULT_HISTORY_SIZE = 50;

/** Most recent query first; re-running a query moves it to the front. */
export class SearchHistory {
  private queries: string[] = [];

  constructor(readonly maxSize = DEFAULT_HISTORY_SIZE) {}

  add(query: string): void {
    if (!query.trim()) {
      return;
    }

    this.queries = [query, ...this.queries.filter((entry) => entry !== query)].slice(0, this.maxSize);
  }

  entries(): readonly string[] {
    return this.queries;
  }

  get size(): number {
    return this.queries.length;
  }

  clear(): void {
    this.queries = [];
  }
}
