import * as fs from "fs/promises";
import { ErrorCodes, FatalError, categorizeError, errorMessage } from "../shared/errors";

/** Canonical absolute path of an existing directory; FatalError otherwise. */
export async function resolveRoot(target: string): Promise<string> {
  let resolved: string;
  try {
    resolved = await fs.realpath(target);
  } catch (err) {
    const code = categorizeError(err) === "not-found" ? ErrorCodes.ROOT_NOT_FOUND : ErrorCodes.READ_FAILED;
    throw new FatalError(code, `Cannot resolve ${target}: ${errorMessage(err)}`, { cause: err });
  }

  const stats = await fs.stat(resolved);
  if (!stats.isDirectory()) {
    throw new FatalError(ErrorCodes.NOT_A_DIRECTORY, `Not a directory: ${resolved}`);
  }
  return resolved;
}
