/**
 * Navigation controller, held in a zustand store.
 *
 * Owns the view mode, the input mode, the cursor and the session state,
 * and mediates between the tree builders, the search index and the size
 * worker. Every mutating action rebuilds the active view from the current
 * PersistentState and SizeCache; nodes are never patched in place.
 *
 * Snapshots (forest + cursor) live inside the mode that captured them: an
 * alternate view carries the Tree snapshot it will restore, search carries
 * the forest it will restore on cancel. Only one of each can exist at a
 * time, and the type says so.
 */

import * as path from "path";
import { createStore } from "zustand/vanilla";
import type { StoreApi } from "zustand/vanilla";

import type { AlternateView, NavAction } from "../input/actions";
import type { SearchCandidate, SearchMatch } from "../search/fuzzy";
import { searchPaths } from "../search/fuzzy";
import type { SizeService } from "../size/sizeWorker";
import { addBookmark, addRecent, getBookmark, setExpanded, toggleHidden, toggleStarred } from "../state/persistentState";
import { buildTree } from "../tree/buildTree";
import { findRowIndex, flattenForest } from "../tree/forest";
import type { FsProbe } from "../tree/fsProbe";
import { nodeFsProbe } from "../tree/fsProbe";
import { formatMatchLabel } from "../tree/labels";
import { buildBookmarksList, buildRecentList, buildStarredList } from "../tree/views";
import { errorMessage } from "../shared/errors";
import { getLogger } from "../shared/logger";
import type { DisplayNode, PersistentState, SizeCache, SizeEntry, VisibleRow } from "../types";
import { ancestorChain } from "../utils/pathUtils";

const log = getLogger("navigation");

export const DOUBLE_CLICK_MS = 400;
export const SCROLL_STEP = 3;
export const DEFAULT_VIEWPORT_HEIGHT = 20;

// ─── Types ──────────────────────────────────────────────────────────────────

/** Forest and cursor captured on entering a mode, restored on leaving it. */
export interface Snapshot {
  readonly forest: readonly DisplayNode[];
  readonly selectedPath: string | null;
}

export type ViewState =
  | { readonly mode: "tree" }
  | { readonly mode: AlternateView; readonly saved: Snapshot };

export interface SearchInput {
  readonly mode: "search";
  readonly saved: Snapshot;
  /** Paths of the forest rendered when search began. */
  readonly candidates: readonly SearchCandidate[];
  readonly query: string;
  readonly matches: readonly SearchMatch[];
  readonly matchIndex: number;
}

export interface BookmarkLabelInput {
  readonly mode: "bookmark-label";
  readonly path: string;
  readonly value: string;
}

export type InputState = { readonly mode: "normal" } | SearchInput | BookmarkLabelInput;

/** State shape for the navigator. */
interface NavigationState {
  /** Absolute root of the Tree view. */
  root: string;
  /** Session state, persisted at clean exit. */
  persistent: PersistentState;
  /** Directory sizes known this session. */
  sizeCache: SizeCache;
  /** Forest of the active view (or search results). */
  forest: readonly DisplayNode[];
  /** Pre-order rows of `forest`. */
  rows: readonly VisibleRow[];
  /** Cursor, by path identity. */
  selectedPath: string | null;
  view: ViewState;
  input: InputState;
  showHelp: boolean;
  showPreview: boolean;
  /** Rows the front end can show; drives paging. */
  viewportHeight: number;
  /** Directory chosen on exit, if any. */
  selectedDir: string | null;
  shouldQuit: boolean;
  lastClick: { readonly index: number; readonly at: number } | null;
}

/** Actions for the navigator. */
interface NavigationActions {
  /** Apply one front-end action. */
  dispatch: (action: NavAction) => void;
  /** Drain finished size computations; returns how many arrived. */
  tick: () => number;
  /** Request a size for `dirPath` unless one is cached or pending. */
  requestSize: (dirPath: string) => void;
  setViewportHeight: (height: number) => void;
}

export type NavigationStore = NavigationState & NavigationActions;

export interface NavigationStoreOptions {
  root: string;
  persistent: PersistentState;
  sizeService: SizeService;
  probe?: FsProbe;
  now?: () => number;
  viewportHeight?: number;
}

type CursorTarget = { kind: "first" } | { kind: "keep" } | { kind: "restore"; path: string | null };

// ─── Selectors ──────────────────────────────────────────────────────────────

export function getSelectedRow(state: Pick<NavigationState, "rows" | "selectedPath">): VisibleRow | undefined {
  const index = findRowIndex(state.rows, state.selectedPath);
  return index >= 0 ? state.rows[index] : undefined;
}

/** Place a new forest, choosing the cursor according to `target`. */
function placeForest(
  prev: Pick<NavigationState, "rows" | "selectedPath">,
  forest: readonly DisplayNode[],
  target: CursorTarget,
): Pick<NavigationState, "forest" | "rows" | "selectedPath"> {
  const rows = flattenForest(forest);
  if (rows.length === 0) {
    return { forest, rows, selectedPath: null };
  }

  if (target.kind === "first") {
    return { forest, rows, selectedPath: rows[0].path };
  }

  const wanted = target.kind === "keep" ? prev.selectedPath : target.path;
  if (findRowIndex(rows, wanted) >= 0) {
    return { forest, rows, selectedPath: wanted };
  }

  if (target.kind === "keep") {
    // The selected path vanished: stay on the same row position
    const previousIndex = Math.max(findRowIndex(prev.rows, prev.selectedPath), 0);
    return { forest, rows, selectedPath: rows[Math.min(previousIndex, rows.length - 1)].path };
  }
  return { forest, rows, selectedPath: rows[0].path };
}

function matchesToForest(matches: readonly SearchMatch[]): DisplayNode[] {
  return matches.map((match) => ({
    kind: "leaf",
    path: match.path,
    label: formatMatchLabel(path.basename(match.path), match.isDirectory),
    isDirectory: match.isDirectory,
  }));
}

function dropLastChar(value: string): string {
  return Array.from(value).slice(0, -1).join("");
}

// ─── Store ──────────────────────────────────────────────────────────────────

/**
 * Create the navigator for `root`.
 * Throws TreeBuildError when the root cannot be listed.
 */
export function createNavigationStore(options: NavigationStoreOptions): StoreApi<NavigationStore> {
  const { root, sizeService } = options;
  const probe = options.probe ?? nodeFsProbe;
  const now = options.now ?? Date.now;

  const initialForest = buildTree(root, {
    expanded: options.persistent.expandedDirs,
    starred: options.persistent.starredDirs,
    showHidden: options.persistent.showHidden,
    probe,
  });
  const initialRows = flattenForest(initialForest);

  return createStore<NavigationStore>()((set, get) => {
    // ─── Rebuilding ───────────────────────────────────────────────────────

    function buildView(
      mode: ViewState["mode"],
      persistent: PersistentState,
      sizeCache: SizeCache,
    ): readonly DisplayNode[] | null {
      switch (mode) {
        case "tree":
          try {
            return buildTree(root, {
              expanded: persistent.expandedDirs,
              starred: persistent.starredDirs,
              showHidden: persistent.showHidden,
              sizeCache,
              probe,
            });
          } catch (err) {
            log.warn("tree rebuild failed, keeping previous forest", { root, reason: errorMessage(err) });
            return null;
          }
        case "starred":
          return buildStarredList(persistent.starredDirs, probe);
        case "bookmarks":
          return buildBookmarksList(persistent.bookmarks, probe);
        case "recent":
          return buildRecentList(persistent.recentDirs, probe);
      }
    }

    /**
     * Apply `patch` and rebuild the active view from the resulting state.
     * When the root cannot be read, `fallback` (or the current forest) stays.
     */
    function rebuild(
      patch: Partial<NavigationState>,
      target: CursorTarget,
      fallback?: readonly DisplayNode[],
    ): void {
      const current = get();
      const next = { ...current, ...patch };
      const forest = buildView(next.view.mode, next.persistent, next.sizeCache) ?? fallback;
      if (forest === undefined) {
        set(patch);
        return;
      }
      set({ ...patch, ...placeForest(current, forest, target) });
    }

    function snapshot(): Snapshot {
      const { forest, selectedPath } = get();
      return { forest, selectedPath };
    }

    /** Gate on cache absence; a dropped request leaves no entry so it can be retried. */
    function requestSizeInto(cache: Map<string, SizeEntry>, dirPath: string): void {
      if (cache.has(dirPath)) return;
      if (sizeService.request(dirPath)) {
        cache.set(dirPath, { status: "pending" });
      }
    }

    /** Mark directories expanded, requesting sizes for those that just opened. */
    function expandAll(paths: readonly string[]): Pick<NavigationState, "persistent" | "sizeCache"> {
      const state = get();
      let persistent = state.persistent;
      const sizeCache = new Map(state.sizeCache);
      for (const dirPath of paths) {
        if (persistent.expandedDirs.has(dirPath)) continue;
        persistent = setExpanded(persistent, dirPath, true);
        requestSizeInto(sizeCache, dirPath);
      }
      return { persistent, sizeCache };
    }

    // ─── Cursor ───────────────────────────────────────────────────────────

    function moveTo(index: number): void {
      const { rows } = get();
      if (rows.length === 0) return;
      const clamped = Math.max(0, Math.min(rows.length - 1, index));
      set({ selectedPath: rows[clamped].path });
    }

    function moveBy(delta: number): void {
      const { rows, selectedPath } = get();
      const index = findRowIndex(rows, selectedPath);
      moveTo(index < 0 ? 0 : index + delta);
    }

    // ─── Tree Actions ─────────────────────────────────────────────────────

    function expandSelected(): void {
      const state = get();
      const row = getSelectedRow(state);
      if (state.view.mode !== "tree" || !row?.isDirectory) return;
      if (state.persistent.expandedDirs.has(row.path)) return;
      rebuild(expandAll([row.path]), { kind: "keep" });
    }

    function collapseOrParent(): void {
      const state = get();
      const row = getSelectedRow(state);
      if (state.view.mode !== "tree" || !row) return;
      if (row.isDirectory && state.persistent.expandedDirs.has(row.path)) {
        rebuild({ persistent: setExpanded(state.persistent, row.path, false) }, { kind: "keep" });
      } else if (row.parentPath !== null) {
        set({ selectedPath: row.parentPath });
      }
    }

    function toggleSelected(): void {
      const state = get();
      const row = getSelectedRow(state);
      if (state.view.mode !== "tree" || !row?.isDirectory) return;
      if (state.persistent.expandedDirs.has(row.path)) {
        collapseOrParent();
      } else {
        expandSelected();
      }
    }

    function toggleStar(): void {
      const state = get();
      const row = getSelectedRow(state);
      if (!row?.isDirectory) return;
      rebuild({ persistent: toggleStarred(state.persistent, row.path) }, { kind: "keep" });
    }

    function selectAndQuit(): void {
      const state = get();
      const row = getSelectedRow(state);
      if (!row?.isDirectory) return;
      set({
        persistent: addRecent(state.persistent, row.path),
        selectedDir: row.path,
        shouldQuit: true,
      });
    }

    function click(index: number): void {
      const state = get();
      if (index < 0 || index >= state.rows.length) return;
      const at = now();
      const isDoubleClick =
        state.lastClick !== null && state.lastClick.index === index && at - state.lastClick.at < DOUBLE_CLICK_MS;
      set({ selectedPath: state.rows[index].path, lastClick: { index, at } });
      if (isDoubleClick && state.view.mode === "tree") {
        toggleSelected();
      }
    }

    // ─── View Modes ───────────────────────────────────────────────────────

    function switchView(target: AlternateView): void {
      const { view } = get();

      // Toggling the active view, or the starred toggle from any alternate view, goes home
      if (view.mode !== "tree" && (view.mode === target || target === "starred")) {
        rebuild({ view: { mode: "tree" } }, { kind: "restore", path: view.saved.selectedPath }, view.saved.forest);
        return;
      }

      const saved = view.mode === "tree" ? snapshot() : view.saved;
      rebuild({ view: { mode: target, saved } }, { kind: "first" });
    }

    // ─── Search ───────────────────────────────────────────────────────────

    function beginSearch(): void {
      const { rows } = get();
      set({
        input: {
          mode: "search",
          saved: snapshot(),
          candidates: rows.map((row) => ({ path: row.path, isDirectory: row.isDirectory })),
          query: "",
          matches: [],
          matchIndex: 0,
        },
      });
    }

    function updateQuery(input: SearchInput, query: string): void {
      const state = get();
      if (query.length === 0) {
        set({
          input: { ...input, query, matches: [], matchIndex: 0 },
          ...placeForest(state, input.saved.forest, { kind: "first" }),
        });
        return;
      }

      const matches = searchPaths(input.candidates, query);
      set({
        input: { ...input, query, matches, matchIndex: 0 },
        ...placeForest(state, matchesToForest(matches), { kind: "first" }),
      });
    }

    function cycleMatch(input: SearchInput, step: 1 | -1): void {
      const count = input.matches.length;
      if (count === 0) return;
      const matchIndex = (input.matchIndex + step + count) % count;
      set({ input: { ...input, matchIndex }, selectedPath: input.matches[matchIndex].path });
    }

    function cancelSearch(input: SearchInput): void {
      rebuild(
        { input: { mode: "normal" } },
        { kind: "restore", path: input.saved.selectedPath },
        input.saved.forest,
      );
    }

    /**
     * Expand every ancestor of the match and land the cursor on it in the Tree
     * view. A match outside the root has no place in the tree, so the cursor
     * lands on it in the current view instead.
     */
    function jumpToMatch(input: SearchInput): void {
      if (input.matches.length === 0) {
        cancelSearch(input);
        return;
      }

      const target = input.matches[input.matchIndex].path;
      const chain = ancestorChain(root, target);
      if (chain.length === 0) {
        rebuild({ input: { mode: "normal" } }, { kind: "restore", path: target }, input.saved.forest);
        return;
      }

      const ancestors = chain.slice(0, -1);
      rebuild(
        { ...expandAll(ancestors), view: { mode: "tree" }, input: { mode: "normal" } },
        { kind: "restore", path: target },
        input.saved.forest,
      );
    }

    function handleSearch(input: SearchInput, action: NavAction): void {
      switch (action.type) {
        case "text":
          updateQuery(input, input.query + action.text);
          return;
        case "backspace":
          updateQuery(input, dropLastChar(input.query));
          return;
        case "next-match":
          cycleMatch(input, 1);
          return;
        case "previous-match":
          cycleMatch(input, -1);
          return;
        case "confirm":
          jumpToMatch(input);
          return;
        case "cancel":
          cancelSearch(input);
          return;
        case "quit":
          set({ shouldQuit: true });
          return;
        default:
          return;
      }
    }

    // ─── Bookmark Label ───────────────────────────────────────────────────

    function beginBookmark(): void {
      const state = get();
      const row = getSelectedRow(state);
      if (!row?.isDirectory) return;
      set({
        input: {
          mode: "bookmark-label",
          path: row.path,
          value: getBookmark(state.persistent, row.path)?.label ?? "",
        },
      });
    }

    function handleBookmarkLabel(input: BookmarkLabelInput, action: NavAction): void {
      switch (action.type) {
        case "text":
          set({ input: { ...input, value: input.value + action.text } });
          return;
        case "backspace":
          set({ input: { ...input, value: dropLastChar(input.value) } });
          return;
        case "confirm":
          rebuild(
            {
              persistent: addBookmark(get().persistent, input.path, input.value, now()),
              input: { mode: "normal" },
            },
            { kind: "keep" },
          );
          return;
        case "cancel":
          set({ input: { mode: "normal" } });
          return;
        case "quit":
          set({ shouldQuit: true });
          return;
        default:
          return;
      }
    }

    // ─── Normal Mode ──────────────────────────────────────────────────────

    function handleNormal(action: NavAction): void {
      const state = get();
      switch (action.type) {
        case "move":
          moveBy(action.delta);
          return;
        case "page": {
          const step = action.amount === "full" ? state.viewportHeight : Math.floor(state.viewportHeight / 2);
          if (step > 0) moveBy(action.direction === "up" ? -step : step);
          return;
        }
        case "first":
          moveTo(0);
          return;
        case "last":
          moveTo(state.rows.length - 1);
          return;
        case "scroll":
          moveBy(action.direction === "up" ? -SCROLL_STEP : SCROLL_STEP);
          return;
        case "click":
          click(action.index);
          return;
        case "expand":
          expandSelected();
          return;
        case "collapse":
          collapseOrParent();
          return;
        case "toggle":
          toggleSelected();
          return;
        case "toggle-star":
          toggleStar();
          return;
        case "toggle-hidden":
          rebuild({ persistent: toggleHidden(state.persistent) }, { kind: "keep" });
          return;
        case "toggle-preview":
          set({ showPreview: !state.showPreview });
          return;
        case "toggle-help":
          set({ showHelp: true });
          return;
        case "switch-view":
          switchView(action.view);
          return;
        case "begin-bookmark":
          beginBookmark();
          return;
        case "begin-search":
          beginSearch();
          return;
        case "select-and-quit":
          selectAndQuit();
          return;
        case "quit":
          set({ shouldQuit: true });
          return;
        default:
          return;
      }
    }

    // ─── Initial state / public actions ───────────────────────────────────

    return {
      root,
      persistent: options.persistent,
      sizeCache: new Map<string, SizeEntry>(),
      forest: initialForest,
      rows: initialRows,
      selectedPath: initialRows.length > 0 ? initialRows[0].path : null,
      view: { mode: "tree" },
      input: { mode: "normal" },
      showHelp: false,
      showPreview: false,
      viewportHeight: options.viewportHeight ?? DEFAULT_VIEWPORT_HEIGHT,
      selectedDir: null,
      shouldQuit: false,
      lastClick: null,

      dispatch: (action: NavAction): void => {
        const state = get();
        if (state.shouldQuit) return;

        // Any action closes the help overlay and does nothing else
        if (state.showHelp) {
          set({ showHelp: false });
          return;
        }

        switch (state.input.mode) {
          case "search":
            handleSearch(state.input, action);
            return;
          case "bookmark-label":
            handleBookmarkLabel(state.input, action);
            return;
          case "normal":
            handleNormal(action);
            return;
        }
      },

      tick: (): number => {
        const sizeCache = new Map(get().sizeCache);
        const arrived = sizeService.drain(sizeCache);
        if (arrived === 0) return 0;

        const state = get();
        if (state.view.mode === "tree" && state.input.mode !== "search") {
          rebuild({ sizeCache }, { kind: "keep" });
        } else {
          set({ sizeCache });
        }
        return arrived;
      },

      requestSize: (dirPath: string): void => {
        const sizeCache = new Map(get().sizeCache);
        requestSizeInto(sizeCache, dirPath);
        if (sizeCache.size !== get().sizeCache.size) {
          set({ sizeCache });
        }
      },

      setViewportHeight: (height: number): void => {
        const next = Math.max(1, Math.floor(height));
        if (next !== get().viewportHeight) {
          set({ viewportHeight: next });
        }
      },
    };
  });
}
