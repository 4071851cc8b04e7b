import { spawnSync } from "node:child_process";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { sanitizeFileName } from "@inkwell/doc-engine";
import type { ExternalEditor } from "@inkwell/ui-features";

export const FALLBACK_EDITORS = ["hx", "helix", "nvim", "vim", "nano", "emacs"] as const;

export type ExternalEditorErrorCode = "launch-failed" | "exit-status";

export class ExternalEditorError extends Error {
  readonly code: ExternalEditorErrorCode;

  constructor(code: ExternalEditorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExternalEditorError";
    this.code = code;
  }
}

/** Runs the program with the terminal attached and returns its exit status. */
export type EditorRunner = (program: string, args: string[]) => number;

export interface RawModeInput {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
}

export interface TerminalEditorOptions {
  /** `$EDITOR`; probing is skipped when set. */
  configured?: string | null;
  commandExists?: (name: string) => boolean;
  run?: EditorRunner;
  stdin?: RawModeInput;
}

export function commandExists(name: string): boolean {
  const probe = spawnSync("which", [name], { stdio: "ignore" });
  return probe.status === 0;
}

export function resolveEditorCommand(
  configured: string | null | undefined,
  exists: (name: string) => boolean = commandExists
): string | null {
  const explicit = configured?.trim();
  if (explicit) {
    return explicit;
  }
  return FALLBACK_EDITORS.find((candidate) => exists(candidate)) ?? null;
}

const runInTerminal: EditorRunner = (program, args) => {
  const child = spawnSync(program, args, { stdio: "inherit" });
  if (child.error) {
    throw new ExternalEditorError("launch-failed", `Could not start ${program}: ${child.error.message}`, {
      cause: child.error
    });
  }
  return child.status ?? 1;
};

/** Edits note text in the user's editor through a temporary markdown file. */
export class TerminalEditor implements ExternalEditor {
  readonly command: string | null;
  private readonly run: EditorRunner;
  private readonly stdin: RawModeInput;

  constructor(options: TerminalEditorOptions = {}) {
    this.command = resolveEditorCommand(options.configured, options.commandExists);
    this.run = options.run ?? runInTerminal;
    this.stdin = options.stdin ?? process.stdin;
  }

  edit(title: string, content: string): string {
    if (!this.command) {
      throw new ExternalEditorError("launch-failed", "No external editor configured");
    }

    const [program, ...args] = this.command.split(/\s+/);
    const directory = mkdtempSync(join(tmpdir(), "inkwell-edit-"));
    const file = join(directory, `${sanitizeFileName(title)}.md`);
    const raw = this.stdin.isTTY === true;

    try {
      writeFileSync(file, content, "utf8");
      if (raw) {
        this.stdin.setRawMode?.(false);
      }
      let status: number;
      try {
        status = this.run(program, [...args, file]);
      } finally {
        if (raw) {
          this.stdin.setRawMode?.(true);
        }
      }
      if (status !== 0) {
        throw new ExternalEditorError("exit-status", `${program} exited with status ${status}`);
      }
      return readFileSync(file, "utf8");
    } finally {
      rmSync(directory, { recursive: true, force: true });
    }
  }
}
