/**
 * Wires configuration, theme, host and caches into a StatusRenderer.
 * One runtime is built per process.
 */

import { FileCacheStore, type CacheStore } from "../cache/store";
import { resolveCacheDirectory } from "../config/loader";
import type { StatusKitConfig } from "../config/schema";
import type { StatusHost } from "../terminal/base";
import { TmuxOptionSource } from "../terminal/options";
import { ColorResolver } from "./colors";
import { FALLBACK_STATUS_BG, type RenderOptions } from "./compositor";
import { ChainedOptionSource, MapOptionSource, OptionRegistry } from "./options";
import { StatusRenderer } from "./renderer";
import { loadThemeOrDefault, type Theme } from "./themes";
import { createDefaultWidgetRegistry, type WidgetRegistry } from "./widgets";

export interface StatusRuntime {
  config: StatusKitConfig;
  theme: Theme;
  colors: ColorResolver;
  options: OptionRegistry;
  widgets: WidgetRegistry;
  cache: CacheStore;
  renderer: StatusRenderer;
}

export interface CreateRuntimeOptions {
  config: StatusKitConfig;
  host: StatusHost;
  theme?: Theme;
  widgets?: WidgetRegistry;
  cache?: CacheStore;
  cwd?: string;
  now?: () => Date;
}

/**
 * Concrete render settings for the compositor. Configured colors may be
 * theme names or literal values.
 */
export function buildRenderOptions(config: StatusKitConfig, colors: ColorResolver): RenderOptions {
  const pick = (name: string | undefined): string => (name ? colors.resolve(name) || name : "");
  return {
    statusBackground: pick(config.statusBackground) || colors.resolve("statusbar-bg") || FALLBACK_STATUS_BG,
    transparent: config.transparent,
    separatorStyle: config.separatorStyle,
    spacing: config.elementsSpacing,
    textColor: pick(config.textColor) || colors.resolve("white"),
    surfaceColor: colors.resolve("surface"),
    backgroundColor: colors.resolve("background"),
  };
}

export function createStatusRuntime(options: CreateRuntimeOptions): StatusRuntime {
  const { config, host } = options;
  const theme = options.theme ?? loadThemeOrDefault(config.theme);
  const colors = new ColorResolver(theme.colors);
  const registry = new OptionRegistry(
    new ChainedOptionSource([new TmuxOptionSource(host), new MapOptionSource(config.options)])
  );
  const widgets = options.widgets ?? createDefaultWidgetRegistry();
  const cache = options.cache ?? new FileCacheStore(resolveCacheDirectory(config));

  const renderer = new StatusRenderer({
    options: registry,
    widgets,
    colors,
    cache,
    host,
    renderOptions: buildRenderOptions(config, colors),
    cwd: options.cwd,
    now: options.now,
  });

  return { config, theme, colors, options: registry, widgets, cache, renderer };
}
