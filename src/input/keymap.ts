/**
 * Key bindings: (input, key, mode) → NavAction.
 *
 * `KeyInfo` is the subset of Ink's `Key` the bindings read, so the map can
 * be exercised without a terminal.
 */

import type { NavAction } from "./actions";

export interface KeyInfo {
  upArrow: boolean;
  downArrow: boolean;
  leftArrow: boolean;
  rightArrow: boolean;
  pageUp: boolean;
  pageDown: boolean;
  return: boolean;
  escape: boolean;
  ctrl: boolean;
  shift: boolean;
  meta: boolean;
  tab: boolean;
  backspace: boolean;
  delete: boolean;
}

export type KeymapMode = "normal" | "search" | "bookmark-label";

export const NO_KEY: KeyInfo = {
  upArrow: false,
  downArrow: false,
  leftArrow: false,
  rightArrow: false,
  pageUp: false,
  pageDown: false,
  return: false,
  escape: false,
  ctrl: false,
  shift: false,
  meta: false,
  tab: false,
  backspace: false,
  delete: false,
};

export interface HelpSection {
  readonly title: string;
  readonly bindings: ReadonlyArray<readonly [keys: string, description: string]>;
}

/** Bindings listed by the help overlay */
export const HELP_SECTIONS: readonly HelpSection[] = [
  {
    title: "NAVIGATION",
    bindings: [
      ["↑ / k", "Move up"],
      ["↓ / j", "Move down"],
      ["← / h", "Collapse directory / go to parent"],
      ["→ / l", "Expand directory"],
      ["Space", "Toggle expand/collapse"],
      ["g", "Go to first item"],
      ["G", "Go to last item"],
      ["PgUp/PgDn", "Page up/down"],
      ["Ctrl+u/d", "Half page up/down"],
    ],
  },
  {
    title: "ACTIONS",
    bindings: [
      ["Enter", "cd to selected directory and exit"],
      ["s", "Toggle star on directory"],
      ["S", "Switch to/from starred view"],
      ["/", "Fuzzy search files and folders"],
      ["p", "Toggle preview pane"],
      [".", "Toggle hidden files"],
      ["b", "Add/edit bookmark with label"],
      ["B", "Open/close bookmarks view"],
      ["r", "Open/close recent directories"],
      ["q / Ctrl+c", "Quit without changing directory"],
      ["?", "Toggle this help"],
    ],
  },
];

function isPrintable(input: string, key: KeyInfo): boolean {
  return input.length > 0 && !key.ctrl && !key.meta && !/[\u0000-\u001f\u007f]/.test(input);
}

function isBackspace(key: KeyInfo): boolean {
  // Most terminals send DEL for the backspace key, which Ink reports as `delete`
  return key.backspace || key.delete;
}

function mapNormal(input: string, key: KeyInfo): NavAction | null {
  if (key.ctrl) {
    switch (input) {
      case "c":
        return { type: "quit" };
      case "u":
        return { type: "page", direction: "up", amount: "half" };
      case "d":
        return { type: "page", direction: "down", amount: "half" };
      default:
        return null;
    }
  }

  if (key.escape) return { type: "quit" };
  if (key.return) return { type: "select-and-quit" };
  if (key.upArrow) return { type: "move", delta: -1 };
  if (key.downArrow) return { type: "move", delta: 1 };
  if (key.leftArrow) return { type: "collapse" };
  if (key.rightArrow) return { type: "expand" };
  if (key.pageUp) return { type: "page", direction: "up", amount: "full" };
  if (key.pageDown) return { type: "page", direction: "down", amount: "full" };

  switch (input) {
    case "q":
      return { type: "quit" };
    case "k":
      return { type: "move", delta: -1 };
    case "j":
      return { type: "move", delta: 1 };
    case "h":
      return { type: "collapse" };
    case "l":
      return { type: "expand" };
    case " ":
      return { type: "toggle" };
    case "g":
      return { type: "first" };
    case "G":
      return { type: "last" };
    case "s":
      return { type: "toggle-star" };
    case "S":
      return { type: "switch-view", view: "starred" };
    case "b":
      return { type: "begin-bookmark" };
    case "B":
      return { type: "switch-view", view: "bookmarks" };
    case "r":
      return { type: "switch-view", view: "recent" };
    case ".":
      return { type: "toggle-hidden" };
    case "p":
      return { type: "toggle-preview" };
    case "?":
      return { type: "toggle-help" };
    case "/":
      return { type: "begin-search" };
    default:
      return null;
  }
}

function mapSearch(input: string, key: KeyInfo): NavAction | null {
  if (key.ctrl && input === "c") return { type: "quit" };
  if (key.escape) return { type: "cancel" };
  if (key.return) return { type: "confirm" };
  if (key.tab) return key.shift ? { type: "previous-match" } : { type: "next-match" };
  if (key.downArrow) return { type: "next-match" };
  if (key.upArrow) return { type: "previous-match" };
  if (isBackspace(key)) return { type: "backspace" };
  if (isPrintable(input, key)) return { type: "text", text: input };
  return null;
}

function mapLabel(input: string, key: KeyInfo): NavAction | null {
  if (key.ctrl && input === "c") return { type: "quit" };
  if (key.escape) return { type: "cancel" };
  if (key.return) return { type: "confirm" };
  if (isBackspace(key)) return { type: "backspace" };
  if (isPrintable(input, key)) return { type: "text", text: input };
  return null;
}

/** Translate one key press; null when the key is unbound in `mode` */
export function mapKey(input: string, key: KeyInfo, mode: KeymapMode): NavAction | null {
  switch (mode) {
    case "normal":
      return mapNormal(input, key);
    case "search":
      return mapSearch(input, key);
    case "bookmark-label":
      return mapLabel(input, key);
  }
}
