import { Box, Text } from "ink";
import type { Theme } from "../config/theme";

/** `[i/n]` while there are matches, `[no match]` otherwise; nothing for an empty query */
export function matchCounter(query: string, matchIndex: number, matchCount: number): string {
  if (query.length === 0) return "";
  return matchCount === 0 ? " [no match]" : ` [${matchIndex + 1}/${matchCount}]`;
}

interface SearchBarProps {
  readonly query: string;
  readonly matchIndex: number;
  readonly matchCount: number;
  readonly theme: Theme;
}

export function SearchBar({ query, matchIndex, matchCount, theme }: SearchBarProps) {
  return (
    <Box>
      <Text wrap="truncate-start">
        <Text bold color={theme.starred}>{`/${query}`}</Text>
        <Text color={theme.text}>█</Text>
        <Text color={theme.dim}>{matchCounter(query, matchIndex, matchCount)}</Text>
      </Text>
    </Box>
  );
}
