import { basename } from "node:path";
import { render } from "ink";
import { AppState } from "@inkwell/ui-features";
import { FileNotebookStorage, Notebook, createSeedNotebook, errorMessage } from "@inkwell/vault-core";
import App from "./App";
import { loadConfig } from "./config";
import { TerminalEditor } from "./externalEditor";

const config = loadConfig();
const storage = new FileNotebookStorage(config.dataDir);

let notebook: Notebook;
let loadFailure: string | null = null;
if (!storage.exists()) {
  notebook = createSeedNotebook();
} else {
  try {
    notebook = storage.load();
  } catch (error) {
    notebook = new Notebook();
    loadFailure = `Failed to load notebook: ${errorMessage(error, "unknown error")} - starting empty`;
    try {
      loadFailure += ` (unreadable file kept as ${basename(storage.backup())})`;
    } catch (backupError) {
      loadFailure += ` (backup failed: ${errorMessage(backupError, "unknown error")})`;
    }
  }
}

const state = new AppState({
  notebook,
  storage,
  externalEditor: new TerminalEditor({ configured: config.editor }),
  exportDir: config.exportDir,
  feedbackTtlMs: config.feedbackTtlMs
});
if (loadFailure) {
  state.feedback.error(loadFailure);
} else {
  state.feedback.setMessage("Press ? for help");
}

const app = render(<App state={state} tickMs={config.tickMs} />, { exitOnCtrlC: false });
await app.waitUntilExit();

try {
  storage.save(state.notebook);
} catch (error) {
  console.error(`Failed to save notebook: ${errorMessage(error, "unknown error")}`);
  process.exitCode = 1;
}
