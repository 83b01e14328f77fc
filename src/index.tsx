/**
 * treenav entry point.
 *
 * Resolves the root, loads state and theme, runs the Ink app on the
 * controlling terminal, then saves state and prints the chosen directory
 * (if any) to stdout for the shell wrapper to `cd` into.
 */

import { render } from "ink";

import { USAGE, VERSION, parseArgs } from "./cli/args";
import { resolveRoot } from "./cli/root";
import { openTerminal } from "./cli/terminal";
import { App } from "./components";
import { resolveConfigFile, resolveStateFile } from "./config/paths";
import { loadTheme } from "./config/theme";
import { TreenavError, errorMessage } from "./shared/errors";
import { getLogger } from "./shared/logger";
import { SizeWorker } from "./size/sizeWorker";
import { loadState, saveState } from "./state/stateFile";
import { createNavigationStore } from "./stores/navigationStore";

const log = getLogger("main");

async function run(target: string): Promise<string | null> {
  const root = await resolveRoot(target);
  const stateFile = resolveStateFile();
  const persistent = await loadState(stateFile);
  const theme = loadTheme(resolveConfigFile());

  const worker = new SizeWorker();
  const store = createNavigationStore({ root, persistent, sizeService: worker });
  const terminal = openTerminal();

  try {
    const app = render(<App store={store} theme={theme} />, {
      stdin: terminal.stdin,
      stdout: terminal.stdout,
      exitOnCtrlC: false,
      patchConsole: false,
    });
    await app.waitUntilExit();
  } finally {
    terminal.close();
    worker.close();
  }

  const { persistent: finalState, selectedDir } = store.getState();
  await saveState(finalState, stateFile);
  log.info("session ended", { root, selectedDir });
  return selectedDir;
}

export async function main(argv: readonly string[]): Promise<number> {
  const command = parseArgs(argv);
  switch (command.kind) {
    case "help":
      process.stdout.write(USAGE);
      return 0;
    case "version":
      process.stdout.write(`${VERSION}\n`);
      return 0;
    case "error":
      process.stderr.write(`treenav: ${command.message}\n\n${USAGE}`);
      return 2;
    case "run":
      break;
  }

  try {
    const selectedDir = await run(command.path);
    if (selectedDir !== null) {
      process.stdout.write(`${selectedDir}\n`);
    }
    return 0;
  } catch (err) {
    if (err instanceof TreenavError) {
      log.error("fatal", { code: err.code, reason: err.message });
      process.stderr.write(`treenav: ${err.message}\n`);
      return 1;
    }
    throw err;
  }
}

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (err: unknown) => {
    process.stderr.write(`treenav: ${errorMessage(err)}\n`);
    process.exit(1);
  },
);
