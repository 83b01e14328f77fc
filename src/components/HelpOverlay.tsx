/**
 * HelpOverlay — key bindings, shown in place of the panes until any key.
 */

import { Box, Text } from "ink";
import type { Theme } from "../config/theme";
import { HELP_SECTIONS } from "../input/keymap";

const KEY_COLUMN = 14;

export function HelpOverlay({ theme }: { readonly theme: Theme }) {
  return (
    <Box flexDirection="column" borderStyle="round" borderColor={theme.border} paddingX={1} flexGrow={1}>
      <Text>
        <Text bold color={theme.border}>
          treenav
        </Text>
        <Text color={theme.dim}> - Terminal Directory Navigator</Text>
      </Text>
      {HELP_SECTIONS.map((section) => (
        <Box key={section.title} flexDirection="column" marginTop={1}>
          <Text bold color={theme.starred}>
            {section.title}
          </Text>
          {section.bindings.map(([keys, description]) => (
            <Text key={keys}>
              <Text color={theme.border}>{`  ${keys.padEnd(KEY_COLUMN)}`}</Text>
              <Text color={theme.text}>{description}</Text>
            </Text>
          ))}
        </Box>
      ))}
      <Box marginTop={1}>
        <Text italic color={theme.dim}>
          Press any key to close
        </Text>
      </Box>
    </Box>
  );
}
