/**
 * Memory widget - used memory in percent
 */

import { existsSync, readFileSync } from "node:fs";
import { freemem, totalmem } from "node:os";
import { declareAppearanceOptions, declareThresholdOptions, firstInteger, thresholdDisplayInfo } from "./display";
import type { DisplayInfoProvider, Widget } from "./types";

const MEMINFO_PATH = "/proc/meminfo";

/**
 * Used-memory percentage from /proc/meminfo text (MemTotal vs MemAvailable).
 * Returns undefined when either field is missing.
 */
export function parseMeminfo(text: string): number | undefined {
  const field = (name: string): number | undefined => {
    const match = text.match(new RegExp(`^${name}:\\s+([0-9]+)`, "m"));
    return match?.[1] ? Number.parseInt(match[1], 10) : undefined;
  };
  const total = field("MemTotal");
  const available = field("MemAvailable");
  if (!total || available === undefined) return undefined;
  return Math.round(((total - available) / total) * 100);
}

function usedPercent(): number {
  if (existsSync(MEMINFO_PATH)) {
    const fromProc = parseMeminfo(readFileSync(MEMINFO_PATH, "utf-8"));
    if (fromProc !== undefined) return fromProc;
  }
  const total = totalmem();
  return total > 0 ? Math.round(((total - freemem()) / total) * 100) : 0;
}

export const memoryWidget: Widget & DisplayInfoProvider = {
  name: "memory",

  getType: () => "conditional",

  declareOptions(declare) {
    declareAppearanceOptions(declare, "\uefc5");
    declareThresholdOptions(declare, { mode: "normal", warning: 80, critical: 90 });
    declare("cache_ttl", "number", "5", "Cache duration in seconds");
  },

  async produce(context) {
    const ttl = context.options.getNumber("cache_ttl") ?? 5;
    return context.cache.getOrCompute("memory", ttl, () => `${usedPercent()}%`);
  },

  getDisplayInfo(content, context) {
    return thresholdDisplayInfo(content, firstInteger(content), context.options);
  },
};
