/**
 * TreePane — the bordered list of visible rows for the active view.
 *
 * Keeps its own scroll offset so the window only moves when the cursor
 * leaves it.
 */

import { useRef } from "react";
import { Box, Text } from "ink";
import type { Theme } from "../config/theme";
import type { VisibleRow } from "../types";
import { scrollOffset } from "./viewport";

const INDENT = "  ";
const HIGHLIGHT_SYMBOL = "▸ ";

interface TreePaneProps {
  readonly title: string;
  readonly rows: readonly VisibleRow[];
  readonly selectedIndex: number;
  /** Rows that fit inside the border, below the title */
  readonly height: number;
  /** Border and title color */
  readonly accent: string;
  readonly theme: Theme;
  readonly width?: string | number;
}

export function TreePane({ title, rows, selectedIndex, height, accent, theme, width }: TreePaneProps) {
  const offsetRef = useRef(0);
  const offset = scrollOffset(offsetRef.current, selectedIndex, height, rows.length);
  offsetRef.current = offset;

  const visible = rows.slice(offset, offset + Math.max(height, 0));

  return (
    <Box flexDirection="column" borderStyle="round" borderColor={accent} width={width} flexGrow={1}>
      <Text bold color={accent} wrap="truncate-end">
        {` ${title} `}
      </Text>
      {visible.length === 0 ? (
        <Text color={theme.dim}>{"  (empty)"}</Text>
      ) : (
        visible.map((row, i) => {
          const isSelected = offset + i === selectedIndex;
          const line = `${isSelected ? HIGHLIGHT_SYMBOL : "  "}${INDENT.repeat(row.depth)}${row.label}`;
          return isSelected ? (
            <Text key={row.path} bold color={theme.text} backgroundColor={theme.highlightBg} wrap="truncate-end">
              {line}
            </Text>
          ) : (
            <Text key={row.path} color={theme.text} wrap="truncate-end">
              {line}
            </Text>
          );
        })
      )}
    </Box>
  );
}
