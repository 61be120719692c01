/**
 * Severity model for widgets
 *
 * Three independent stages that every threshold-driven widget funnels through:
 * 1. computeSeverity  - numeric value + threshold config -> severity level
 * 2. isVisible        - severity level + visibility rule -> show / hide
 * 3. severityToColorPair - severity level -> semantic accent colors
 */

// Ordered from calmest to most severe
export type SeverityLevel = "inactive" | "normal" | "info" | "warning" | "error";

export const SEVERITY_LEVELS: readonly SeverityLevel[] = [
  "inactive",
  "normal",
  "info",
  "warning",
  "error",
];

const SEVERITY_RANK: Record<SeverityLevel, number> = {
  inactive: 0,
  normal: 1,
  info: 2,
  warning: 3,
  error: 4,
};

export type ThresholdMode = "none" | "normal" | "inverted";

export interface ThresholdConfig {
  mode: ThresholdMode;
  warning: number;
  critical: number;
}

export type DisplayCondition = "always" | "eq" | "lt" | "lte" | "gt" | "gte";

export const DISPLAY_CONDITIONS: readonly DisplayCondition[] = ["always", "eq", "lt", "lte", "gt", "gte"];

export interface VisibilityRule {
  condition: DisplayCondition;
  threshold?: SeverityLevel;
}

export const ALWAYS_VISIBLE: VisibilityRule = { condition: "always" };

// Semantic color names, resolved to concrete values by the ColorResolver
export interface SeverityColors {
  accent: string;
  accentIcon: string;
}

const SEVERITY_COLORS: Record<SeverityLevel, SeverityColors> = {
  inactive: { accent: "disabled", accentIcon: "disabled" },
  normal: { accent: "secondary", accentIcon: "active" },
  info: { accent: "info", accentIcon: "info-subtle" },
  warning: { accent: "warning", accentIcon: "warning-subtle" },
  error: { accent: "error", accentIcon: "error-subtle" },
};

export function severityRank(level: SeverityLevel): number {
  return SEVERITY_RANK[level];
}

/**
 * Compare two levels by rank: negative when `a` is calmer than `b`.
 */
export function compareSeverity(a: SeverityLevel, b: SeverityLevel): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

/**
 * The more severe of two levels.
 */
export function maxSeverity(a: SeverityLevel, b: SeverityLevel): SeverityLevel {
  return compareSeverity(a, b) >= 0 ? a : b;
}

export function isSeverityLevel(value: string): value is SeverityLevel {
  return (SEVERITY_LEVELS as readonly string[]).includes(value);
}

/**
 * Parse a severity name, case-insensitively. Unknown names yield undefined.
 */
export function parseSeverity(value: string | undefined): SeverityLevel | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  return isSeverityLevel(normalized) ? normalized : undefined;
}

/**
 * Parse a severity name, falling back to "normal" for anything unknown.
 */
export function normalizeSeverity(value: string | undefined): SeverityLevel {
  return parseSeverity(value) ?? "normal";
}

export function parseThresholdMode(value: string | undefined): ThresholdMode {
  switch (value?.trim().toLowerCase()) {
    case "normal":
      return "normal";
    case "inverted":
      return "inverted";
    default:
      return "none";
  }
}

/**
 * Map a numeric reading onto a severity level.
 *
 * Only "normal", "warning" and "error" come out of this path; "inactive" and
 * "info" are reachable only through widgets that set their state explicitly.
 */
export function computeSeverity(value: number | undefined, config: ThresholdConfig): SeverityLevel {
  if (config.mode === "none" || value === undefined || !Number.isFinite(value)) {
    return "normal";
  }

  if (config.mode === "inverted") {
    if (value <= config.critical) return "error";
    if (value <= config.warning) return "warning";
    return "normal";
  }

  if (value >= config.critical) return "error";
  if (value >= config.warning) return "warning";
  return "normal";
}

/**
 * Decide whether a widget at `current` severity should be shown.
 */
export function isVisible(current: SeverityLevel, rule: VisibilityRule): boolean {
  if (rule.condition === "always" || rule.threshold === undefined) {
    return true;
  }

  const diff = compareSeverity(current, rule.threshold);
  switch (rule.condition) {
    case "eq":
      return diff === 0;
    case "lt":
      return diff < 0;
    case "lte":
      return diff <= 0;
    case "gt":
      return diff > 0;
    case "gte":
      return diff >= 0;
    default:
      // Unrecognized comparators show the widget rather than hide everything
      return true;
  }
}

/**
 * Build a visibility rule from raw option strings.
 *
 * An unknown condition becomes "always". A threshold name that is not a
 * severity level compares as "normal"; an empty threshold disables the rule.
 */
export function visibilityRuleFromOptions(condition: string, threshold: string): VisibilityRule {
  const normalizedCondition = condition.trim().toLowerCase();
  const known = DISPLAY_CONDITIONS.find((c) => c === normalizedCondition);
  if (!known || known === "always" || !threshold.trim()) {
    return ALWAYS_VISIBLE;
  }
  return { condition: known, threshold: normalizeSeverity(threshold) };
}

/**
 * The single source of truth for severity coloring.
 */
export function severityToColorPair(level: SeverityLevel): SeverityColors {
  return SEVERITY_COLORS[level];
}

/**
 * Legacy `show_only_warning` check: true when the widget should be hidden
 * because nothing exceeds a threshold. Applied in addition to the visibility rule.
 */
export function hiddenByOnlyShowWhenExceeded(level: SeverityLevel, onlyShowWhenExceeded: boolean): boolean {
  return onlyShowWhenExceeded && compareSeverity(level, "normal") <= 0;
}
