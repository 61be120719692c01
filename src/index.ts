/**
 * tmux-statuskit
 *
 * Widget runtime for tmux status lines: option registry, severity model,
 * segment compositor, widget cache and color resolution.
 */

// Option registry
export {
  ChainedOptionSource,
  FRAMEWORK_STANDARD_OPTIONS,
  MapOptionSource,
  OptionRegistry,
  normalizeBool,
  type FallbackDefault,
  type FallbackDefaults,
  type OptionDescriptor,
  type OptionKind,
  type OptionSource,
} from "./statusline/options";

// Severity
export * from "./statusline/severity";

// Colors and themes
export { ColorResolver, UNIVERSAL_COLORS, darken, generateVariants, lighten, type PaletteListing } from "./statusline/colors";
export { DEFAULT_THEME, ThemeSchema, listThemes, loadTheme, loadThemeOrDefault, type Theme } from "./statusline/themes";

// Compositor and pipeline
export * from "./statusline/compositor";
export * from "./statusline/config-line";
export { StatusRenderer, cleanContent, type StatusRendererDeps } from "./statusline/renderer";
export { conditionPasses, executeContent, externalCacheKey } from "./statusline/external";
export { buildRenderOptions, createStatusRuntime, type CreateRuntimeOptions, type StatusRuntime } from "./statusline/runtime";

// Widgets
export * from "./statusline/widgets";

// Cache
export { FileCacheStore, MemoryCacheStore, type CacheStore, type CacheEntry, type Clock } from "./cache/store";

// Config
export * from "./config";

// Host
export * from "./terminal";
