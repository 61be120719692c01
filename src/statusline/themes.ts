/**
 * Theme palette loader
 * Palettes live in themes/<family>/<variant>.json at the package root.
 */

import { existsSync, readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { errorMessage, logger } from "../utils/logger";

export const DEFAULT_THEME = "catppuccin/mocha";

export const THEMES_DIR = join(__dirname, "..", "..", "themes");

const HexColorSchema = z.string().regex(/^#[0-9a-fA-F]{6}$/, "expected #rrggbb");

export const ThemeSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  colors: z.record(z.string(), HexColorSchema),
});

export type Theme = z.infer<typeof ThemeSchema>;

const THEME_NAME_PATTERN = /^[a-z0-9-]+\/[a-z0-9_-]+$/;

/**
 * Load a theme by "<family>/<variant>" name.
 * Returns null when the name is malformed, the file is missing, or invalid.
 */
export function loadTheme(name: string, themesDir: string = THEMES_DIR): Theme | null {
  if (!THEME_NAME_PATTERN.test(name)) {
    logger.warn("themes", `Invalid theme name: ${name}`);
    return null;
  }

  const path = join(themesDir, `${name}.json`);
  if (!existsSync(path)) {
    logger.warn("themes", `Theme not found: ${path}`);
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
    return ThemeSchema.parse(parsed);
  } catch (error) {
    logger.error("themes", `Failed to load theme ${name}: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Load a theme, falling back to the default theme, then to an empty palette.
 */
export function loadThemeOrDefault(name: string, themesDir: string = THEMES_DIR): Theme {
  return (
    loadTheme(name, themesDir) ??
    loadTheme(DEFAULT_THEME, themesDir) ?? { name: "empty", colors: {} }
  );
}

/**
 * List available theme names ("family/variant"), sorted.
 */
export function listThemes(themesDir: string = THEMES_DIR): string[] {
  if (!existsSync(themesDir)) return [];

  const names: string[] = [];
  for (const family of readdirSync(themesDir, { withFileTypes: true })) {
    if (!family.isDirectory()) continue;
    for (const file of readdirSync(join(themesDir, family.name))) {
      if (file.endsWith(".json")) {
        names.push(`${family.name}/${file.slice(0, -".json".length)}`);
      }
    }
  }
  return names.sort();
}
