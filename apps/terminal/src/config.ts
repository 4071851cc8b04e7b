import { homedir } from "node:os";
import { join } from "node:path";
import { FEEDBACK_TTL_MS } from "@inkwell/ui-features";

export interface TerminalConfig {
  dataDir: string;
  exportDir: string;
  /** `$EDITOR` as given; probing for a fallback happens when the editor is built. */
  editor: string | null;
  tickMs: number;
  feedbackTtlMs: number;
}

export const DEFAULT_TICK_MS = 250;

function positiveInteger(value: string | undefined): number | undefined {
  if (!value || !/^\d+$/.test(value.trim())) {
    return undefined;
  }
  const parsed = Number(value.trim());
  return parsed > 0 ? parsed : undefined;
}

function resolveDataDir(env: NodeJS.ProcessEnv, home: string): string {
  const explicit = env.INKWELL_DATA_DIR?.trim();
  if (explicit) {
    return explicit;
  }
  const xdg = env.XDG_DATA_HOME?.trim();
  if (xdg) {
    return join(xdg, "inkwell");
  }
  return join(home, ".local", "share", "inkwell");
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, home = homedir()): TerminalConfig {
  const dataDir = resolveDataDir(env, home);
  return {
    dataDir,
    exportDir: join(dataDir, "export"),
    editor: env.EDITOR?.trim() || null,
    tickMs: positiveInteger(env.INKWELL_TICK_MS) ?? DEFAULT_TICK_MS,
    feedbackTtlMs: FEEDBACK_TTL_MS
  };
}
