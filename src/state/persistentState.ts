/**
 * Pure updates on PersistentState.
 *
 * Every helper returns a new state object (and new collections where they
 * changed); the input is never mutated.
 */

import type { Bookmark, PersistentState } from "../types";

export const MAX_RECENT = 50;

export function defaultState(): PersistentState {
  return {
    expandedDirs: new Set<string>(),
    starredDirs: new Set<string>(),
    bookmarks: [],
    recentDirs: [],
    showHidden: false,
  };
}

// ─── Expanded / Starred ─────────────────────────────────────────────────────

function withMember(set: ReadonlySet<string>, path: string, member: boolean): ReadonlySet<string> {
  if (set.has(path) === member) return set;
  const next = new Set(set);
  if (member) {
    next.add(path);
  } else {
    next.delete(path);
  }
  return next;
}

export function setExpanded(state: PersistentState, path: string, expanded: boolean): PersistentState {
  const expandedDirs = withMember(state.expandedDirs, path, expanded);
  return expandedDirs === state.expandedDirs ? state : { ...state, expandedDirs };
}

export function toggleExpanded(state: PersistentState, path: string): PersistentState {
  return setExpanded(state, path, !state.expandedDirs.has(path));
}

export function setStarred(state: PersistentState, path: string, starred: boolean): PersistentState {
  const starredDirs = withMember(state.starredDirs, path, starred);
  return starredDirs === state.starredDirs ? state : { ...state, starredDirs };
}

export function toggleStarred(state: PersistentState, path: string): PersistentState {
  return setStarred(state, path, !state.starredDirs.has(path));
}

export function toggleHidden(state: PersistentState): PersistentState {
  return { ...state, showHidden: !state.showHidden };
}

// ─── Bookmarks ──────────────────────────────────────────────────────────────

/** Add a bookmark, replacing any existing one for the same path */
export function addBookmark(
  state: PersistentState,
  path: string,
  label: string,
  now: number = Date.now(),
): PersistentState {
  const bookmark: Bookmark = { path, label, createdAt: Math.floor(now / 1000) };
  return {
    ...state,
    bookmarks: [...state.bookmarks.filter((b) => b.path !== path), bookmark],
  };
}

export function getBookmark(state: PersistentState, path: string): Bookmark | undefined {
  return state.bookmarks.find((b) => b.path === path);
}

// ─── Recent ─────────────────────────────────────────────────────────────────

/** Move `path` to the front of the recent list, evicting the oldest beyond MAX_RECENT */
export function addRecent(state: PersistentState, path: string): PersistentState {
  const recentDirs = [path, ...state.recentDirs.filter((p) => p !== path)].slice(0, MAX_RECENT);
  return { ...state, recentDirs };
}
