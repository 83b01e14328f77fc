/**
 * Footer — key hints for the active view.
 */

import { Box, Text } from "ink";
import type { Theme } from "../config/theme";
import type { ViewState } from "../stores/navigationStore";

type Hint = readonly [key: string, description: string];

const HINTS: Record<ViewState["mode"], readonly Hint[]> = {
  tree: [
    ["↑↓/jk", "nav"],
    ["←→/hl", "tree"],
    ["Space", "toggle"],
    ["Enter", "cd"],
    ["s", "star"],
    ["b", "mark"],
    ["/", "search"],
    ["p", "preview"],
    [".", "hidden"],
    ["B", "marks"],
    ["r", "recent"],
    ["?", "help"],
    ["q", "quit"],
  ],
  starred: [
    ["↑↓/jk", "navigate"],
    ["Enter", "cd"],
    ["s", "unstar"],
    ["S", "back"],
    ["?", "help"],
    ["q", "quit"],
  ],
  bookmarks: [
    ["↑↓/jk", "navigate"],
    ["Enter", "cd"],
    ["B", "back"],
    ["?", "help"],
    ["q", "quit"],
  ],
  recent: [
    ["↑↓/jk", "navigate"],
    ["Enter", "cd"],
    ["r", "back"],
    ["?", "help"],
    ["q", "quit"],
  ],
};

export function footerHints(view: ViewState["mode"], showHidden: boolean): readonly Hint[] {
  const hints = HINTS[view];
  return showHidden && view === "tree" ? [["●", "hidden"], ...hints] : hints;
}

interface FooterProps {
  readonly view: ViewState["mode"];
  readonly showHidden: boolean;
  readonly theme: Theme;
}

export function Footer({ view, showHidden, theme }: FooterProps) {
  const hints = footerHints(view, showHidden);
  return (
    <Box>
      <Text wrap="truncate-end">
        {hints.map(([key, description], i) => (
          <Text key={key}>
            <Text bold color={theme.border}>
              {key}
            </Text>
            <Text color={theme.dim}>{` ${description} `}</Text>
            {i < hints.length - 1 ? <Text color="gray">{"│ "}</Text> : null}
          </Text>
        ))}
      </Text>
    </Box>
  );
}
