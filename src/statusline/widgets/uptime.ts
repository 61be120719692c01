/**
 * Uptime widget
 */

import { uptime } from "node:os";
import { declareAppearanceOptions, defaultDisplayInfo } from "./display";
import type { DisplayInfoProvider, Widget } from "./types";

/**
 * "3d 4h", "2h 15m" or "42m".
 */
export function formatUptime(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const days = Math.floor(seconds / 86_400);
  const hours = Math.floor((seconds % 86_400) / 3_600);
  const minutes = Math.floor((seconds % 3_600) / 60);
  if (days > 0) return `${days}d ${hours}h`;
  if (hours > 0) return `${hours}h ${minutes}m`;
  return `${minutes}m`;
}

export const uptimeWidget: Widget & DisplayInfoProvider = {
  name: "uptime",

  getType: () => "static",

  declareOptions(declare) {
    declareAppearanceOptions(declare, "\ue382");
    declare("cache_ttl", "number", "60", "Cache duration in seconds");
  },

  async produce(context) {
    const ttl = context.options.getNumber("cache_ttl") ?? 60;
    return context.cache.getOrCompute("uptime", ttl, () => formatUptime(uptime()));
  },

  getDisplayInfo(content) {
    return defaultDisplayInfo(content);
  },
};
