/**
 * State file persistence.
 *
 * JSON record with snake_case fields:
 *   expanded_dirs, starred_dirs, show_hidden, bookmarks, recent_dirs
 *
 * Loading never fails (missing, unreadable or malformed files resolve to
 * defaults) and saving never throws. A crash between the two loses the
 * session's changes.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { z } from "zod";
import type { PersistentState } from "../types";
import { errorMessage } from "../shared/errors";
import { getLogger } from "../shared/logger";
import { MAX_RECENT, defaultState } from "./persistentState";

const log = getLogger("state");

// ─── Schema ─────────────────────────────────────────────────────────────────

const bookmarkSchema = z.object({
  path: z.string(),
  label: z.string().optional().default(""),
  created_at: z.number().int().nonnegative().optional().default(0),
});

const stateFileSchema = z.object({
  expanded_dirs: z.array(z.string()).optional().default([]),
  starred_dirs: z.array(z.string()).optional().default([]),
  show_hidden: z.boolean().optional().default(false),
  bookmarks: z.array(bookmarkSchema).optional().default([]),
  recent_dirs: z.array(z.string()).optional().default([]),
});

export type StateFileRecord = z.infer<typeof stateFileSchema>;

// ─── Conversion ─────────────────────────────────────────────────────────────

export function toRecord(state: PersistentState): StateFileRecord {
  return {
    expanded_dirs: [...state.expandedDirs],
    starred_dirs: [...state.starredDirs],
    show_hidden: state.showHidden,
    bookmarks: state.bookmarks.map((b) => ({ path: b.path, label: b.label, created_at: b.createdAt })),
    recent_dirs: [...state.recentDirs],
  };
}

export function fromRecord(record: StateFileRecord): PersistentState {
  return {
    expandedDirs: new Set(record.expanded_dirs),
    starredDirs: new Set(record.starred_dirs),
    showHidden: record.show_hidden,
    bookmarks: record.bookmarks.map((b) => ({ path: b.path, label: b.label, createdAt: b.created_at })),
    recentDirs: record.recent_dirs.slice(0, MAX_RECENT),
  };
}

/** Parse state file contents; null when they are not a valid record */
export function parseState(contents: string): PersistentState | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch {
    return null;
  }
  const result = stateFileSchema.safeParse(parsed);
  return result.success ? fromRecord(result.data) : null;
}

// ─── Load / Save ────────────────────────────────────────────────────────────

export async function loadState(stateFile: string): Promise<PersistentState> {
  let contents: string;
  try {
    contents = await fs.readFile(stateFile, "utf-8");
  } catch (err) {
    log.debug("state file not readable, starting fresh", { stateFile, reason: errorMessage(err) });
    return defaultState();
  }

  const state = parseState(contents);
  if (state === null) {
    log.warn("state file is malformed, starting fresh", { stateFile });
    return defaultState();
  }
  return state;
}

/** Write the full state; resolves false instead of rejecting on failure */
export async function saveState(state: PersistentState, stateFile: string): Promise<boolean> {
  try {
    await fs.mkdir(path.dirname(stateFile), { recursive: true });
    await fs.writeFile(stateFile, JSON.stringify(toRecord(state), null, 2), "utf-8");
    return true;
  } catch (err) {
    log.warn("failed to save state", { stateFile, reason: errorMessage(err) });
    return false;
  }
}
