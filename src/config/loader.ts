import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { normalizeBool } from "../statusline/options";
import { OPTION_PREFIX } from "../terminal/options";
import type { StatusHost } from "../terminal/base";
import { getCacheDir } from "../utils/paths";
import { errorMessage, logger } from "../utils/logger";
import {
  DEFAULT_CONFIG,
  ElementsSpacingSchema,
  SeparatorStyleSchema,
  StatusKitConfigSchema,
  type StatusKitConfig,
} from "./schema";

/**
 * Config file locations in priority order
 */
export function getConfigPaths(): string[] {
  const home = homedir();
  const paths: string[] = [];
  if (process.env.STATUSKIT_CONFIG) {
    paths.push(process.env.STATUSKIT_CONFIG);
  }
  paths.push(join(home, ".config", "tmux-statuskit", "config.json"));
  paths.push(join(home, ".tmux-statuskit.json"));
  return paths;
}

/**
 * Load configuration from the first readable, valid file.
 * Invalid files are logged and skipped; with none left the defaults apply.
 */
export function loadConfig(paths: string[] = getConfigPaths()): StatusKitConfig {
  for (const configPath of paths) {
    if (!existsSync(configPath)) continue;
    try {
      const parsed: unknown = JSON.parse(readFileSync(configPath, "utf-8"));
      const result = StatusKitConfigSchema.safeParse(parsed);
      if (result.success) {
        return result.data;
      }
      logger.warn("config", `Invalid config at ${configPath}: ${result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
    } catch (error) {
      logger.warn("config", `Failed to parse config at ${configPath}: ${errorMessage(error)}`);
    }
  }
  return DEFAULT_CONFIG;
}

/**
 * Layer the tmux render settings (@statuskit_theme, ...) over a loaded config.
 * Unset or invalid tmux values leave the file value in place.
 */
export function applyHostOverrides(
  config: StatusKitConfig,
  host: Pick<StatusHost, "getGlobalOption">
): StatusKitConfig {
  const read = (name: string): string | undefined => {
    const value = host.getGlobalOption(`${OPTION_PREFIX}${name}`);
    return value === undefined || value === "" ? undefined : value;
  };

  const result: StatusKitConfig = { ...config };

  const theme = read("theme");
  if (theme) result.theme = theme;

  const transparent = normalizeBool(read("transparent") ?? "");
  if (transparent) result.transparent = transparent === "true";

  const separatorStyle = SeparatorStyleSchema.safeParse(read("separator_style"));
  if (separatorStyle.success) result.separatorStyle = separatorStyle.data;

  const rawSpacing = read("elements_spacing");
  if (rawSpacing !== undefined) {
    const spacing = ElementsSpacingSchema.safeParse(rawSpacing);
    if (spacing.success) {
      result.elementsSpacing = spacing.data;
    } else {
      logger.warn("config", `Ignoring ${OPTION_PREFIX}elements_spacing=${rawSpacing}`);
    }
  }

  const statusBackground = read("status_bg");
  if (statusBackground) result.statusBackground = statusBackground;

  const textColor = read("text_color");
  if (textColor) result.textColor = textColor;

  const widgets = read("widgets");
  if (widgets) result.widgets = widgets;

  return result;
}

export function resolveCacheDirectory(config: StatusKitConfig): string {
  return config.cacheDirectory ?? getCacheDir();
}
