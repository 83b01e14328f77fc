/**
 * Persisted session state.
 *
 * Loaded once at start, mutated through the pure helpers in
 * `state/persistentState`, saved once at clean exit.
 */

/** An explicitly labeled, saved directory. */
export interface Bookmark {
  readonly path: string;
  /** May be empty; the bookmarks view then shows the full path. */
  readonly label: string;
  /** Epoch seconds. */
  readonly createdAt: number;
}

export interface PersistentState {
  /** Directories whose children are materialized in the tree. */
  readonly expandedDirs: ReadonlySet<string>;
  /** User-flagged directories surfaced in the starred view. */
  readonly starredDirs: ReadonlySet<string>;
  /** Unique by path, insertion order. */
  readonly bookmarks: readonly Bookmark[];
  /** Most-recent-first, at most 50 entries. */
  readonly recentDirs: readonly string[];
  readonly showHidden: boolean;
}
