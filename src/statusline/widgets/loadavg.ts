/**
 * Load average widget, colored against the number of CPU cores
 */

import { cpus, loadavg } from "node:os";
import { computeSeverity } from "../severity";
import { declareAppearanceOptions } from "./display";
import type { DisplayInfoProvider, Widget } from "./types";

/**
 * Format the 1/5/15 minute averages for the "format" option (1|5|15|all).
 */
export function formatLoadavg(averages: readonly number[], format: string): string {
  const [one = "0.00", five = "0.00", fifteen = "0.00"] = averages.map((value) => value.toFixed(2));
  switch (format) {
    case "1":
      return one;
    case "5":
      return five;
    case "15":
      return fifteen;
    default:
      return `${one} ${five} ${fifteen}`;
  }
}

/**
 * First decimal in the content scaled by 100 ("1.25" -> 125).
 */
export function loadHundredths(content: string): number | undefined {
  const match = content.match(/([0-9]+)(?:\.([0-9]+))?/);
  if (!match?.[1]) return undefined;
  const fraction = (match[2] ?? "").slice(0, 2).padEnd(2, "0");
  return Number.parseInt(match[1], 10) * 100 + Number.parseInt(fraction, 10);
}

export const loadavgWidget: Widget & DisplayInfoProvider = {
  name: "loadavg",

  getType: () => "static",

  declareOptions(declare) {
    declareAppearanceOptions(declare, "\u{f199f}");
    declare("format", "string", "1", "Load average format (1|5|15|all)");
    declare("warning_accent_color", "color", "warning", "Background color for warning state");
    declare("warning_accent_color_icon", "color", "warning-subtle", "Icon background color for warning state");
    declare("critical_accent_color", "color", "error", "Background color for critical state");
    declare("critical_accent_color_icon", "color", "error-subtle", "Icon background color for critical state");
    declare("warning_threshold_multiplier", "number", "2", "Warning threshold (times CPU cores)");
    declare("critical_threshold_multiplier", "number", "4", "Critical threshold (times CPU cores)");
    declare("cache_ttl", "number", "10", "Cache duration in seconds");
  },

  async produce(context) {
    const ttl = context.options.getNumber("cache_ttl") ?? 10;
    return context.cache.getOrCompute("loadavg", ttl, () =>
      formatLoadavg(loadavg(), context.options.get("format"))
    );
  },

  getDisplayInfo(content, context) {
    const { options } = context;
    const cores = Math.max(1, cpus().length);
    const level = computeSeverity(loadHundredths(content), {
      mode: "normal",
      warning: cores * (options.getNumber("warning_threshold_multiplier") ?? 2) * 100,
      critical: cores * (options.getNumber("critical_threshold_multiplier") ?? 4) * 100,
    });

    switch (level) {
      case "error":
        return {
          visible: true,
          accent: options.get("critical_accent_color"),
          accentIcon: options.get("critical_accent_color_icon"),
          icon: "",
        };
      case "warning":
        return {
          visible: true,
          accent: options.get("warning_accent_color"),
          accentIcon: options.get("warning_accent_color_icon"),
          icon: "",
        };
      default:
        return { visible: true, accent: "", accentIcon: "", icon: "" };
    }
  },
};
