export type OperationKind = "success" | "error" | "info";

export type SaveStatus = "saved" | "modified" | "saving" | "error";

export interface OperationResult {
  kind: OperationKind;
  message: string;
  icon: string;
  /** Milliseconds since the epoch, from the injected clock. */
  at: number;
}

export const DEFAULT_ICONS: Record<OperationKind, string> = {
  success: "✅",
  error: "❌",
  info: "ℹ️"
};

export const STATUS_HISTORY_LIMIT = 50;
export const FEEDBACK_TTL_MS = 3000;

export interface FeedbackOptions {
  clock?: () => number;
  ttlMs?: number;
  historyLimit?: number;
}

/** Status line, its capped history (newest first) and the transient operation banner. */
export class StatusFeedback {
  message = "";
  history: string[] = [];
  result: OperationResult | null = null;
  saveStatus: SaveStatus = "saved";

  private readonly clock: () => number;
  private readonly ttlMs: number;
  private readonly historyLimit: number;

  constructor(options: FeedbackOptions = {}) {
    this.clock = options.clock ?? Date.now;
    this.ttlMs = options.ttlMs ?? FEEDBACK_TTL_MS;
    this.historyLimit = options.historyLimit ?? STATUS_HISTORY_LIMIT;
  }

  setMessage(message: string): void {
    this.message = message;
    this.history.unshift(message);
    if (this.history.length > this.historyLimit) {
      this.history.length = this.historyLimit;
    }
  }

  setOperationResult(kind: OperationKind, message: string, icon = DEFAULT_ICONS[kind]): void {
    this.result = { kind, message, icon, at: this.clock() };
    this.setMessage(message);
  }

  success(message: string, icon?: string): void {
    this.setOperationResult("success", message, icon);
  }

  error(message: string, icon?: string): void {
    this.setOperationResult("error", message, icon);
  }

  info(message: string, icon?: string): void {
    this.setOperationResult("info", message, icon);
  }

  /** Drops the operation banner once it has been visible for the TTL. Returns true when it changed. */
  tick(now = this.clock()): boolean {
    if (this.result && now - this.result.at >= this.ttlMs) {
      this.result = null;
      return true;
    }
    return false;
  }
}
