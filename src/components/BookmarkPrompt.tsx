import * as path from "path";
import { Box, Text } from "ink";
import type { Theme } from "../config/theme";

interface BookmarkPromptProps {
  /** Directory being bookmarked */
  readonly target: string;
  readonly value: string;
  readonly theme: Theme;
}

export function BookmarkPrompt({ target, value, theme }: BookmarkPromptProps) {
  return (
    <Box>
      <Text wrap="truncate-start">
        <Text bold color={theme.starred}>{`📌 ${path.basename(target)} label: `}</Text>
        <Text color={theme.text}>{value}</Text>
        <Text color={theme.text}>█</Text>
        <Text color={theme.dim}> (Enter save, Esc cancel)</Text>
      </Text>
    </Box>
  );
}
