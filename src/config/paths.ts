/**
 * Per-user file locations.
 *
 * Every location can be overridden through the environment so tests and
 * wrappers never touch the real home directory.
 */

import * as os from "os";
import * as path from "path";

const APP_DIR = "treenav";

interface PlatformContext {
  env: NodeJS.ProcessEnv;
  platform: NodeJS.Platform;
  home: string;
}

function defaultContext(): PlatformContext {
  return { env: process.env, platform: process.platform, home: os.homedir() };
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.length > 0 ? value : undefined;
}

/** Base directory for application data (state file) */
export function dataDir(ctx: PlatformContext = defaultContext()): string {
  const override = nonEmpty(ctx.env.TREENAV_DATA_DIR) ?? nonEmpty(ctx.env.XDG_DATA_HOME);
  if (override) return override;

  switch (ctx.platform) {
    case "darwin":
      return path.join(ctx.home, "Library", "Application Support");
    case "win32":
      return nonEmpty(ctx.env.APPDATA) ?? path.join(ctx.home, "AppData", "Roaming");
    default:
      return path.join(ctx.home, ".local", "share");
  }
}

/** Base directory for user configuration (theme) */
export function configDir(ctx: PlatformContext = defaultContext()): string {
  const override = nonEmpty(ctx.env.TREENAV_CONFIG_DIR) ?? nonEmpty(ctx.env.XDG_CONFIG_HOME);
  if (override) return override;

  switch (ctx.platform) {
    case "darwin":
      return path.join(ctx.home, "Library", "Application Support");
    case "win32":
      return nonEmpty(ctx.env.APPDATA) ?? path.join(ctx.home, "AppData", "Roaming");
    default:
      return path.join(ctx.home, ".config");
  }
}

export function resolveStateFile(ctx: PlatformContext = defaultContext()): string {
  return nonEmpty(ctx.env.TREENAV_STATE_FILE) ?? path.join(dataDir(ctx), APP_DIR, "state.json");
}

export function resolveConfigFile(ctx: PlatformContext = defaultContext()): string {
  return path.join(configDir(ctx), APP_DIR, "config.json");
}
