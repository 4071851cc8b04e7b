export type NotebookErrorCode =
  | "not-found"
  | "has-children"
  | "has-notes"
  | "same-location"
  | "cyclic-move"
  | "duplicate-title";

export class NotebookError extends Error {
  readonly code: NotebookErrorCode;

  constructor(code: NotebookErrorCode, message: string) {
    super(message);
    this.name = "NotebookError";
    this.code = code;
  }
}

export type StorageErrorCode = "read-failed" | "write-failed" | "invalid-data" | "backup-failed";

export class StorageError extends Error {
  readonly code: StorageErrorCode;

  constructor(code: StorageErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageError";
    this.code = code;
  }
}

export function errorMessage(error: unknown, fallback: string): string {
  return error instanceof Error ? error.message : fallback;
}
