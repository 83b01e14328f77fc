/**
 * Theme configuration.
 *
 * Colors come from `<config dir>/treenav/config.json`:
 *
 *   { "theme": { "border": "#50C8DC", "highlight_bg": "#285064", "starred": "yellow" } }
 *
 * Each field is a 6-digit hex value (with or without '#') or a named
 * terminal color. Invalid fields fall back individually; a missing or
 * malformed file yields the default theme.
 */

import * as fs from "fs";
import { z } from "zod";
import { errorMessage } from "../shared/errors";
import { getLogger } from "../shared/logger";

const log = getLogger("theme");

// ─── Types ──────────────────────────────────────────────────────────────────

/** Colors as Ink understands them: `#rrggbb` or a chalk color name */
export interface Theme {
  border: string;
  highlightBg: string;
  starred: string;
  dim: string;
  text: string;
}

export const DEFAULT_THEME: Theme = {
  border: "#50c8dc",
  highlightBg: "#285064",
  starred: "#fac832",
  dim: "#646464",
  text: "white",
};

// ─── Schema ─────────────────────────────────────────────────────────────────

const configSchema = z.object({
  theme: z
    .object({
      border: z.string(),
      highlight_bg: z.string(),
      highlightBg: z.string(),
      starred: z.string(),
      dim: z.string(),
      text: z.string(),
    })
    .partial()
    .optional(),
});

type ThemeConfig = z.infer<typeof configSchema>;

// ─── Color Parsing ──────────────────────────────────────────────────────────

const NAMED_COLORS: Record<string, string> = {
  black: "black",
  red: "red",
  green: "green",
  yellow: "yellow",
  blue: "blue",
  magenta: "magenta",
  cyan: "cyan",
  gray: "white",
  grey: "white",
  darkgray: "gray",
  darkgrey: "gray",
  lightred: "redBright",
  lightgreen: "greenBright",
  lightyellow: "yellowBright",
  lightblue: "blueBright",
  lightmagenta: "magentaBright",
  lightcyan: "cyanBright",
  white: "whiteBright",
};

/** Parse a configured color; null when it is neither hex nor a known name */
export function parseColor(value: string): string | null {
  const trimmed = value.trim();
  const hex = trimmed.startsWith("#") ? trimmed.slice(1) : trimmed;
  if (/^[0-9a-fA-F]{6}$/.test(hex)) {
    return `#${hex.toLowerCase()}`;
  }
  return NAMED_COLORS[trimmed.toLowerCase()] ?? null;
}

// ─── Loading ────────────────────────────────────────────────────────────────

export function themeFromConfig(config: ThemeConfig): Theme {
  const configured = config.theme ?? {};
  const pick = (raw: string | undefined, key: keyof Theme): string =>
    (raw !== undefined ? parseColor(raw) : null) ?? DEFAULT_THEME[key];
  return {
    border: pick(configured.border, "border"),
    // snake_case like the state file; the camelCase spelling is also read
    highlightBg: pick(configured.highlight_bg ?? configured.highlightBg, "highlightBg"),
    starred: pick(configured.starred, "starred"),
    dim: pick(configured.dim, "dim"),
    text: pick(configured.text, "text"),
  };
}

/** Load the theme; never throws */
export function loadTheme(configFile: string): Theme {
  let raw: string;
  try {
    raw = fs.readFileSync(configFile, "utf-8");
  } catch (err) {
    log.debug("no theme config, using defaults", { configFile, reason: errorMessage(err) });
    return { ...DEFAULT_THEME };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    log.warn("theme config is not valid JSON", { configFile, reason: errorMessage(err) });
    return { ...DEFAULT_THEME };
  }

  const result = configSchema.safeParse(parsed);
  if (!result.success) {
    log.warn("theme config does not match schema", { configFile, reason: result.error.message });
    return { ...DEFAULT_THEME };
  }
  return themeFromConfig(result.data);
}
