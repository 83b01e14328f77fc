/**
 * Synchronous filesystem access used by the tree builders.
 *
 * Injected so tests can observe exactly which directories a build reads.
 */

import * as fs from "fs";
import * as path from "path";

export interface DirEntry {
  readonly name: string;
  readonly path: string;
  /** True for directories and for symlinks that resolve to one. */
  readonly isDirectory: boolean;
}

export interface FsProbe {
  /** List a directory; throws the underlying error when it cannot be read. */
  readDir(dirPath: string): DirEntry[];
  isDirectory(target: string): boolean;
  /** Regular file (after following links); FIFOs, sockets and devices are not. */
  isFile(target: string): boolean;
  exists(target: string): boolean;
}

function statIsDirectory(target: string): boolean {
  try {
    return fs.statSync(target).isDirectory();
  } catch {
    // Dangling link or no permission to stat: not navigable
    return false;
  }
}

export const nodeFsProbe: FsProbe = {
  readDir(dirPath: string): DirEntry[] {
    return fs.readdirSync(dirPath, { withFileTypes: true }).map((entry) => {
      const fullPath = path.join(dirPath, entry.name);
      return {
        name: entry.name,
        path: fullPath,
        isDirectory: entry.isDirectory() || (entry.isSymbolicLink() && statIsDirectory(fullPath)),
      };
    });
  },

  isDirectory: statIsDirectory,

  isFile(target: string): boolean {
    try {
      return fs.statSync(target).isFile();
    } catch {
      return false;
    }
  },

  exists(target: string): boolean {
    return fs.existsSync(target);
  },
};
