/**
 * Maps (root, state, size cache) to an ordered forest.
 *
 * Recursion stops at every directory that is not in `expanded`: collapsed
 * directories are never read, so I/O stays bounded by what the user chose
 * to see. A directory that fails to list becomes an error-annotated node;
 * its siblings are unaffected.
 */

import * as path from "path";
import type { DisplayNode, SizeCache } from "../types";
import { TreeBuildError, categorizeError, errorMessage } from "../shared/errors";
import { getLogger } from "../shared/logger";
import type { DirEntry, FsProbe } from "./fsProbe";
import { nodeFsProbe } from "./fsProbe";
import { formatEntryLabel, withErrorLabel } from "./labels";

const log = getLogger("tree");

// ─── Types ──────────────────────────────────────────────────────────────────

export interface BuildOptions {
  expanded: ReadonlySet<string>;
  starred: ReadonlySet<string>;
  showHidden: boolean;
  sizeCache?: SizeCache;
  probe?: FsProbe;
}

interface BuildContext {
  expanded: ReadonlySet<string>;
  starred: ReadonlySet<string>;
  showHidden: boolean;
  sizeCache: SizeCache;
  probe: FsProbe;
}

// ─── Ordering / Filtering ───────────────────────────────────────────────────

export function isHidden(name: string): boolean {
  return name.startsWith(".");
}

function compareNames(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  return left < right ? -1 : left > right ? 1 : 0;
}

/** Directories first, then case-insensitive by name */
export function sortEntries(entries: readonly DirEntry[]): DirEntry[] {
  return [...entries].sort((a, b) => {
    if (a.isDirectory !== b.isDirectory) {
      return a.isDirectory ? -1 : 1;
    }
    return compareNames(a.name, b.name);
  });
}

// ─── Implementation ─────────────────────────────────────────────────────────

function buildChildren(entries: readonly DirEntry[], ctx: BuildContext): DisplayNode[] {
  const visible = ctx.showHidden ? entries : entries.filter((e) => !isHidden(e.name));
  return sortEntries(visible).map((entry) => buildNode(entry, ctx));
}

function buildNode(entry: DirEntry, ctx: BuildContext): DisplayNode {
  const isExpanded = entry.isDirectory && ctx.expanded.has(entry.path);
  const label = formatEntryLabel({
    name: entry.name,
    isDirectory: entry.isDirectory,
    isExpanded,
    isStarred: ctx.starred.has(entry.path),
    size: ctx.sizeCache.get(entry.path),
  });

  if (!isExpanded) {
    return { kind: "leaf", path: entry.path, label, isDirectory: entry.isDirectory };
  }

  let entries: DirEntry[];
  try {
    entries = ctx.probe.readDir(entry.path);
  } catch (err) {
    const category = categorizeError(err);
    log.debug("cannot list directory", { path: entry.path, category, reason: errorMessage(err) });
    return {
      kind: "directory",
      path: entry.path,
      label: withErrorLabel(label, category),
      children: [],
      error: category,
    };
  }

  return {
    kind: "directory",
    path: entry.path,
    label,
    children: buildChildren(entries, ctx),
  };
}

/**
 * Build the forest under `root` (the root itself is not a node).
 * Throws TreeBuildError when the root cannot be listed.
 */
export function buildTree(root: string, options: BuildOptions): DisplayNode[] {
  const ctx: BuildContext = {
    expanded: options.expanded,
    starred: options.starred,
    showHidden: options.showHidden,
    sizeCache: options.sizeCache ?? new Map(),
    probe: options.probe ?? nodeFsProbe,
  };

  let entries: DirEntry[];
  try {
    entries = ctx.probe.readDir(root);
  } catch (err) {
    throw new TreeBuildError(`Cannot read ${path.resolve(root)}: ${errorMessage(err)}`, { cause: err });
  }

  return buildChildren(entries, ctx);
}
