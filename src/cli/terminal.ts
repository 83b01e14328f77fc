/**
 * The terminal the UI draws on.
 *
 * stdout is reserved for the chosen directory (it is usually captured by
 * `$(treenav)`), so the UI opens the controlling terminal directly and
 * switches it to the alternate screen for the session.
 */

import * as fs from "fs";
import * as tty from "tty";
import { ErrorCodes, FatalError, errorMessage } from "../shared/errors";
import { getLogger } from "../shared/logger";

const log = getLogger("terminal");

const CONTROLLING_TERMINAL = "/dev/tty";
const ENTER_ALT_SCREEN = "\x1b[?1049h";
const LEAVE_ALT_SCREEN = "\x1b[?1049l";

export interface Terminal {
  readonly stdin: NodeJS.ReadStream;
  readonly stdout: NodeJS.WriteStream;
  /** Leave the alternate screen and release the streams. Idempotent. */
  close(): void;
}

function openControllingTerminal(): { stdin: tty.ReadStream; stdout: tty.WriteStream } {
  const inFd = fs.openSync(CONTROLLING_TERMINAL, "r");
  let outFd: number;
  try {
    outFd = fs.openSync(CONTROLLING_TERMINAL, "w");
  } catch (err) {
    fs.closeSync(inFd);
    throw err;
  }
  return { stdin: new tty.ReadStream(inFd), stdout: new tty.WriteStream(outFd) };
}

/**
 * Open the controlling terminal, falling back to the process streams when
 * both are terminals. Throws FatalError when neither works.
 */
export function openTerminal(): Terminal {
  let stdin: NodeJS.ReadStream;
  let stdout: NodeJS.WriteStream;
  let owned: boolean;

  try {
    ({ stdin, stdout } = openControllingTerminal());
    owned = true;
  } catch (err) {
    if (!process.stdin.isTTY || !process.stdout.isTTY) {
      throw new FatalError(ErrorCodes.TERMINAL_UNAVAILABLE, `Cannot open terminal: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    log.info("no controlling terminal, drawing on stdout", { reason: errorMessage(err) });
    stdin = process.stdin;
    stdout = process.stdout;
    owned = false;
  }

  stdout.write(ENTER_ALT_SCREEN);

  let closed = false;
  return {
    stdin,
    stdout,
    close(): void {
      if (closed) return;
      closed = true;
      stdout.write(LEAVE_ALT_SCREEN);
      if (owned) {
        stdin.destroy();
        stdout.end();
      }
    },
  };
}
