/**
 * Abstract actions the front end hands to the navigation controller.
 *
 * The controller never sees raw keys or mouse events; `keymap` (or any
 * other front end) translates them into these.
 */

export type AlternateView = "starred" | "bookmarks" | "recent";

export type NavAction =
  | { type: "move"; delta: number }
  | { type: "page"; direction: "up" | "down"; amount: "full" | "half" }
  | { type: "first" }
  | { type: "last" }
  | { type: "expand" }
  | { type: "collapse" }
  | { type: "toggle" }
  | { type: "toggle-star" }
  | { type: "toggle-hidden" }
  | { type: "toggle-preview" }
  | { type: "toggle-help" }
  | { type: "switch-view"; view: AlternateView }
  | { type: "begin-bookmark" }
  | { type: "begin-search" }
  | { type: "text"; text: string }
  | { type: "backspace" }
  | { type: "next-match" }
  | { type: "previous-match" }
  | { type: "confirm" }
  | { type: "cancel" }
  | { type: "select-and-quit" }
  | { type: "quit" }
  | { type: "scroll"; direction: "up" | "down" }
  | { type: "click"; index: number };
