/**
 * Display-info helpers shared by widgets
 */

import {
  computeSeverity,
  hiddenByOnlyShowWhenExceeded,
  isVisible,
  normalizeSeverity,
  parseThresholdMode,
  severityToColorPair,
  visibilityRuleFromOptions,
  type SeverityLevel,
  type ThresholdMode,
} from "../severity";
import type { DisplayInfo, OptionDeclarer, WidgetOptions } from "./types";

export const HIDDEN: DisplayInfo = { visible: false, accent: "", accentIcon: "", icon: "" };

export const SHOWN: DisplayInfo = { visible: true, accent: "", accentIcon: "", icon: "" };

const DEFAULT_HIDE_VALUES = ["", "N/A"];

// Used when a threshold option resolves to something that is not an integer
const FALLBACK_WARNING = 70;
const FALLBACK_CRITICAL = 90;

/**
 * Show with configured colors unless the content is one of `hideValues`.
 */
export function defaultDisplayInfo(content: string, hideValues: readonly string[] = DEFAULT_HIDE_VALUES): DisplayInfo {
  const normalized = content.trim().toLowerCase();
  return hideValues.some((value) => value.toLowerCase() === normalized) ? HIDDEN : SHOWN;
}

function isBlank(content: string): boolean {
  const normalized = content.trim().toLowerCase();
  return normalized === "" || normalized === "n/a";
}

// "normal" keeps the configured accent pair, so it never reads as an alert
function colored(level: SeverityLevel, options: WidgetOptions): DisplayInfo {
  if (level === "normal") {
    return { ...SHOWN, icon: options.get("icon") };
  }
  const { accent, accentIcon } = severityToColorPair(level);
  return { visible: true, accent, accentIcon, icon: options.get("icon") };
}

function visibleAt(level: SeverityLevel, options: WidgetOptions): boolean {
  const rule = visibilityRuleFromOptions(options.get("display_condition"), options.get("display_threshold"));
  return isVisible(level, rule);
}

/**
 * Display info for widgets that set their severity directly (on/off,
 * connected/disconnected). Unknown state names count as "normal".
 */
export function severityDisplayInfo(content: string, state: SeverityLevel | string, options: WidgetOptions): DisplayInfo {
  if (isBlank(content)) return HIDDEN;
  const level = normalizeSeverity(state);
  if (!visibleAt(level, options)) return HIDDEN;
  return colored(level, options);
}

/**
 * Severity level for a numeric reading, from the widget's threshold options.
 */
export function thresholdSeverity(value: number | undefined, options: WidgetOptions): SeverityLevel {
  return computeSeverity(value, {
    mode: parseThresholdMode(options.get("threshold_mode")),
    warning: options.getNumber("warning_threshold") ?? FALLBACK_WARNING,
    critical: options.getNumber("critical_threshold") ?? FALLBACK_CRITICAL,
  });
}

/**
 * Display info for widgets with a numeric reading. Both the
 * display_condition rule and show_only_warning must pass for the widget to show.
 */
export function thresholdDisplayInfo(content: string, value: number | undefined, options: WidgetOptions): DisplayInfo {
  if (isBlank(content)) return HIDDEN;

  const level = thresholdSeverity(value, options);
  if (!visibleAt(level, options)) return HIDDEN;
  if (hiddenByOnlyShowWhenExceeded(level, options.getBool("show_only_warning"))) return HIDDEN;

  return colored(level, options);
}

/**
 * First integer in a string ("87%" -> 87), or undefined.
 */
export function firstInteger(content: string): number | undefined {
  const match = content.match(/[0-9]+/);
  return match ? Number.parseInt(match[0], 10) : undefined;
}

export interface ThresholdDefaults {
  mode: ThresholdMode;
  warning: number;
  critical: number;
}

/**
 * Declare the threshold option group used by thresholdDisplayInfo.
 */
export function declareThresholdOptions(declare: OptionDeclarer, defaults: ThresholdDefaults): void {
  declare("threshold_mode", "string", defaults.mode, "Threshold mode (none|normal|inverted)");
  declare("warning_threshold", "number", String(defaults.warning), "Warning threshold");
  declare("critical_threshold", "number", String(defaults.critical), "Critical threshold");
  declare("show_only_warning", "bool", "false", "Only show when a threshold is exceeded");
}

/**
 * Declare icon and the default accent pair.
 */
export function declareAppearanceOptions(declare: OptionDeclarer, icon: string): void {
  declare("icon", "icon", icon, "Widget icon");
  declare("accent_color", "color", "secondary", "Background color");
  declare("accent_color_icon", "color", "active", "Icon background color");
}
