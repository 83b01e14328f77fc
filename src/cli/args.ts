/**
 * Command-line arguments: `treenav [--help | --version] [path]`.
 */

export const VERSION = "0.1.0";

export const USAGE = `treenav ${VERSION} - terminal directory navigator

Usage: treenav [options] [path]

Browse the tree under <path> (default: current directory). On Enter the
selected directory is printed to stdout; use the shell integration to cd
into it:

  source shell/treenav.zsh   # defines \`tn\`

Options:
  -h, --help       Show this help
  -V, --version    Show the version

Environment:
  TREENAV_STATE_FILE   State file (default: <data dir>/treenav/state.json)
  TREENAV_DATA_DIR     Data directory
  TREENAV_CONFIG_DIR   Config directory (theme in treenav/config.json)
  TREENAV_LOG_FILE     Append log lines to this file
  TREENAV_LOG_LEVEL    debug | info | warn | error (default: warn)
`;

export type CliCommand =
  | { kind: "run"; path: string }
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "error"; message: string };

export function parseArgs(argv: readonly string[]): CliCommand {
  let target: string | undefined;
  let positionalOnly = false;

  for (const arg of argv) {
    if (!positionalOnly && arg.startsWith("-") && arg !== "-") {
      switch (arg) {
        case "-h":
        case "--help":
          return { kind: "help" };
        case "-V":
        case "--version":
          return { kind: "version" };
        case "--":
          positionalOnly = true;
          continue;
        default:
          return { kind: "error", message: `Unknown option: ${arg}` };
      }
    }

    if (target !== undefined) {
      return { kind: "error", message: `Unexpected argument: ${arg}` };
    }
    target = arg;
  }

  return { kind: "run", path: target ?? "." };
}
