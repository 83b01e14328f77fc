/**
 * App — root Ink component.
 *
 * Subscribes to the navigation store, translates key presses through the
 * keymap and ticks the store so size results land without input. Exits
 * the Ink app once the store asks to quit; the caller reads the outcome
 * from the store afterwards.
 */

import { useEffect, useMemo, useState } from "react";
import { Box, useApp, useInput, useStdout } from "ink";
import { useStore } from "zustand";
import type { StoreApi } from "zustand/vanilla";

import type { Theme } from "../config/theme";
import { mapKey } from "../input/keymap";
import { readPreview } from "../preview/readPreview";
import type { NavigationStore, ViewState } from "../stores/navigationStore";
import { findRowIndex } from "../tree/forest";
import { BookmarkPrompt } from "./BookmarkPrompt";
import { Footer } from "./Footer";
import { HelpOverlay } from "./HelpOverlay";
import { PreviewPane } from "./PreviewPane";
import { SearchBar } from "./SearchBar";
import { TreePane } from "./TreePane";

export const TICK_INTERVAL_MS = 50;

const DEFAULT_ROWS = 24;
/** Pane border (2), pane title (1), footer (1) */
const CHROME_ROWS = 4;

interface AppProps {
  readonly store: StoreApi<NavigationStore>;
  readonly theme: Theme;
}

export function paneTitle(view: ViewState["mode"], root: string): string {
  switch (view) {
    case "tree":
      return root;
    case "starred":
      return "★ Starred";
    case "bookmarks":
      return "📌 Bookmarks";
    case "recent":
      return "⏱ Recent";
  }
}

/** Terminal rows, tracking resizes. */
function useTerminalRows(): number {
  const { stdout } = useStdout();
  const [rows, setRows] = useState(stdout.rows ?? DEFAULT_ROWS);

  useEffect(() => {
    const onResize = (): void => setRows(stdout.rows ?? DEFAULT_ROWS);
    stdout.on("resize", onResize);
    return () => {
      stdout.off("resize", onResize);
    };
  }, [stdout]);

  return rows;
}

export function App({ store, theme }: AppProps) {
  const state = useStore(store);
  const { exit } = useApp();
  const terminalRows = useTerminalRows();
  const paneHeight = Math.max(terminalRows - CHROME_ROWS, 1);

  useInput((input, key) => {
    // Keys can arrive before this handler is replaced after a mode change
    const { input: current, dispatch } = store.getState();
    const action = mapKey(input, key, current.mode);
    if (action !== null) {
      dispatch(action);
    }
  });

  useEffect(() => {
    const timer = setInterval(() => {
      store.getState().tick();
    }, TICK_INTERVAL_MS);
    return () => clearInterval(timer);
  }, [store]);

  useEffect(() => {
    store.getState().setViewportHeight(paneHeight);
  }, [store, paneHeight]);

  useEffect(() => {
    if (state.shouldQuit) {
      exit();
    }
  }, [state.shouldQuit, exit]);

  const { selectedPath, showPreview } = state;
  const { showHidden } = state.persistent;
  const preview = useMemo(
    () => (showPreview ? readPreview(selectedPath, showHidden) : null),
    [showPreview, selectedPath, showHidden],
  );

  const view = state.view.mode;
  const accent = view === "tree" ? theme.border : theme.starred;

  return (
    <Box flexDirection="column" height={terminalRows}>
      {state.showHelp ? (
        <HelpOverlay theme={theme} />
      ) : (
        <Box flexDirection="row" flexGrow={1}>
          <TreePane
            title={paneTitle(view, state.root)}
            rows={state.rows}
            selectedIndex={findRowIndex(state.rows, selectedPath)}
            height={paneHeight}
            accent={accent}
            theme={theme}
            width={preview === null ? "100%" : "50%"}
          />
          {preview !== null && <PreviewPane preview={preview} height={paneHeight} theme={theme} />}
        </Box>
      )}
      {state.input.mode === "search" ? (
        <SearchBar
          query={state.input.query}
          matchIndex={state.input.matchIndex}
          matchCount={state.input.matches.length}
          theme={theme}
        />
      ) : state.input.mode === "bookmark-label" ? (
        <BookmarkPrompt target={state.input.path} value={state.input.value} theme={theme} />
      ) : (
        <Footer view={view} showHidden={showHidden} theme={theme} />
      )}
    </Box>
  );
}
