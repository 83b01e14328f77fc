/**
 * Flat views built straight from PersistentState collections.
 *
 * They reuse the display node type but never recurse: every entry is a
 * leaf, and paths that no longer exist are dropped.
 */

import * as path from "path";
import type { Bookmark, LeafNode } from "../types";
import type { FsProbe } from "./fsProbe";
import { nodeFsProbe } from "./fsProbe";
import { STAR_MARKER } from "./labels";

function leaf(p: string, label: string): LeafNode {
  return { kind: "leaf", path: p, label, isDirectory: true };
}

function lowerBase(p: string): string {
  return path.basename(p).toLowerCase();
}

/** Starred directories, ordered by name */
export function buildStarredList(starred: ReadonlySet<string>, probe: FsProbe = nodeFsProbe): LeafNode[] {
  return [...starred]
    .sort((a, b) => {
      const left = lowerBase(a);
      const right = lowerBase(b);
      return left < right ? -1 : left > right ? 1 : 0;
    })
    .filter((p) => probe.exists(p))
    .map((p) => leaf(p, `${STAR_MARKER} ${p}`));
}

/** Bookmarks in stored order */
export function buildBookmarksList(bookmarks: readonly Bookmark[], probe: FsProbe = nodeFsProbe): LeafNode[] {
  return bookmarks
    .filter((b) => probe.exists(b.path))
    .map((b) =>
      leaf(b.path, b.label.length === 0 ? `📌 ${b.path}` : `📌 ${b.label} (${path.basename(b.path)})`),
    );
}

/** Recent directories, most recent first */
export function buildRecentList(recent: readonly string[], probe: FsProbe = nodeFsProbe): LeafNode[] {
  return recent.filter((p) => probe.exists(p)).map((p) => leaf(p, `⏱ ${p}`));
}
