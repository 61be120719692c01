/**
 * Disk widget - usage of one or more mount points
 */

import { statfsSync } from "node:fs";
import { errorMessage, logger } from "../../utils/logger";
import { declareAppearanceOptions, declareThresholdOptions, thresholdDisplayInfo } from "./display";
import type { DisplayInfoProvider, Widget } from "./types";

/**
 * Used percentage the way df reports it: used / (used + available to users).
 */
export function diskUsagePercent(mount: string): number | undefined {
  try {
    const stats = statfsSync(mount);
    const used = stats.blocks - stats.bfree;
    const usable = used + stats.bavail;
    return usable > 0 ? Math.ceil((used / usable) * 100) : undefined;
  } catch (error) {
    logger.warn("disk", `statfs ${mount} failed: ${errorMessage(error)}`);
    return undefined;
  }
}

/**
 * Highest "<n>%" in the content, so several mounts color by the fullest one.
 */
export function highestPercent(content: string): number | undefined {
  const values = [...content.matchAll(/([0-9]+)%/g)].map((match) => Number.parseInt(match[1] ?? "0", 10));
  return values.length > 0 ? Math.max(...values) : undefined;
}

export const diskWidget: Widget & DisplayInfoProvider = {
  name: "disk",

  getType: () => "conditional",

  declareOptions(declare) {
    declareAppearanceOptions(declare, "\u{f02ca}");
    declareThresholdOptions(declare, { mode: "normal", warning: 70, critical: 90 });
    declare("mounts", "string", "/", "Comma-separated mount points");
    declare("separator", "string", " | ", "Separator between mount points");
    declare("show_label", "bool", "false", "Show the mount point before its value");
    declare("cache_ttl", "number", "120", "Cache duration in seconds");
  },

  async produce(context) {
    const { options } = context;
    const mounts = options
      .get("mounts")
      .split(",")
      .map((mount) => mount.trim())
      .filter(Boolean);
    const ttl = options.getNumber("cache_ttl") ?? 120;

    return context.cache.getOrCompute(`disk_${mounts.join("_")}`, ttl, () => {
      const parts: string[] = [];
      for (const mount of mounts) {
        const percent = diskUsagePercent(mount);
        if (percent === undefined) continue;
        parts.push(options.getBool("show_label") ? `${mount} ${percent}%` : `${percent}%`);
      }
      return parts.join(options.get("separator"));
    });
  },

  getDisplayInfo(content, context) {
    return thresholdDisplayInfo(content, highestPercent(content), context.options);
  },
};
