/**
 * Recursive directory size.
 *
 * Sums regular files below a directory without following symlinks. Any
 * entry that fails (vanished, unreadable) contributes 0; the walk never
 * aborts.
 */

import type { Dirent } from "fs";
import * as fs from "fs/promises";
import * as path from "path";
import { errorMessage } from "../shared/errors";
import { getLogger } from "../shared/logger";

const log = getLogger("size");

export async function computeDirSize(dirPath: string): Promise<number> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch (err) {
    log.debug("skipping unreadable directory", { path: dirPath, reason: errorMessage(err) });
    return 0;
  }

  let total = 0;
  for (const entry of entries) {
    const fullPath = path.join(dirPath, entry.name);
    if (entry.isDirectory()) {
      total += await computeDirSize(fullPath);
    } else if (entry.isFile()) {
      try {
        total += (await fs.lstat(fullPath)).size;
      } catch (err) {
        log.debug("skipping unreadable file", { path: fullPath, reason: errorMessage(err) });
      }
    }
  }
  return total;
}
