/** PreviewPane — directory listing or file head for the selection. */

import { Box, Text } from "ink";
import type { Theme } from "../config/theme";
import type { Preview } from "../preview/readPreview";

interface PreviewPaneProps {
  readonly preview: Preview;
  readonly height: number;
  readonly theme: Theme;
}

export function PreviewPane({ preview, height, theme }: PreviewPaneProps) {
  const lines = preview.lines.slice(0, Math.max(height, 0));
  return (
    <Box flexDirection="column" borderStyle="round" borderColor={theme.border} width="50%">
      <Text bold color={theme.border} wrap="truncate-end">
        {` ${preview.title} `}
      </Text>
      {lines.map((line, i) => (
        // Lines repeat freely, so position is the only stable key
        <Text key={i} color={theme.dim} wrap="truncate-end">
          {line.length > 0 ? line : " "}
        </Text>
      ))}
    </Box>
  );
}
