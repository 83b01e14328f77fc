/**
 * Preview pane contents for the selected path.
 *
 * Directories list their entries (directories first, `/`-suffixed); files
 * show their first lines. Only the head of a file is read.
 */

import * as fs from "fs";
import * as path from "path";
import { errorMessage } from "../shared/errors";
import { getLogger } from "../shared/logger";
import { isHidden, sortEntries } from "../tree/buildTree";
import type { FsProbe } from "../tree/fsProbe";
import { nodeFsProbe } from "../tree/fsProbe";

const log = getLogger("preview");

export const PREVIEW_MAX_LINES = 100;
export const PREVIEW_MAX_BYTES = 64 * 1024;
export const PREVIEW_PLACEHOLDER = "Select a file or directory";
export const UNREADABLE_FILE = "[Unable to read file]";

export interface Preview {
  title: string;
  lines: string[];
}

function readHead(file: string, maxBytes: number): string {
  const fd = fs.openSync(file, "r");
  try {
    const buffer = Buffer.alloc(maxBytes);
    const bytesRead = fs.readSync(fd, buffer, 0, maxBytes, 0);
    return buffer.subarray(0, bytesRead).toString("utf-8");
  } finally {
    fs.closeSync(fd);
  }
}

function previewDirectory(dirPath: string, showHidden: boolean, probe: FsProbe): string[] {
  try {
    const entries = probe.readDir(dirPath).filter((e) => showHidden || !isHidden(e.name));
    return sortEntries(entries).map((e) => (e.isDirectory ? `${e.name}/` : e.name));
  } catch (err) {
    log.debug("cannot list directory for preview", { path: dirPath, reason: errorMessage(err) });
    return [];
  }
}

function previewFile(file: string): string[] {
  let head: string;
  try {
    head = readHead(file, PREVIEW_MAX_BYTES);
  } catch (err) {
    log.debug("cannot read file for preview", { path: file, reason: errorMessage(err) });
    return [UNREADABLE_FILE];
  }
  const lines = head.split(/\r?\n/);
  // A trailing newline does not start another line
  if (lines.length > 1 && lines[lines.length - 1] === "") lines.pop();
  return lines.slice(0, PREVIEW_MAX_LINES);
}

function emptyPreview(): Preview {
  return { title: "Preview", lines: [PREVIEW_PLACEHOLDER] };
}

export function readPreview(target: string | null, showHidden: boolean, probe: FsProbe = nodeFsProbe): Preview {
  if (target === null || !probe.exists(target)) {
    return emptyPreview();
  }

  const title = path.basename(target);
  if (probe.isDirectory(target)) {
    return { title, lines: previewDirectory(target, showHidden, probe) };
  }
  // Opening a FIFO or a device would block until a writer shows up
  if (!probe.isFile(target)) {
    return emptyPreview();
  }
  return { title, lines: previewFile(target) };
}
