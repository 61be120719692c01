/**
 * CPU widget - overall CPU usage in percent
 */

import { cpus } from "node:os";
import { setTimeout as sleep } from "node:timers/promises";
import { declareAppearanceOptions, declareThresholdOptions, firstInteger, thresholdDisplayInfo } from "./display";
import type { DisplayInfoProvider, Widget } from "./types";

export interface CpuTimes {
  idle: number;
  total: number;
}

/**
 * Sum idle and total ticks across all cores.
 */
export function sampleCpuTimes(): CpuTimes {
  let idle = 0;
  let total = 0;
  for (const cpu of cpus()) {
    const { user, nice, sys, idle: cpuIdle, irq } = cpu.times;
    idle += cpuIdle;
    total += user + nice + sys + cpuIdle + irq;
  }
  return { idle, total };
}

/**
 * Busy share between two samples, rounded to a whole percent.
 */
export function cpuUsagePercent(before: CpuTimes, after: CpuTimes): number {
  const total = after.total - before.total;
  if (total <= 0) return 0;
  const busy = total - (after.idle - before.idle);
  return Math.min(100, Math.max(0, Math.round((busy / total) * 100)));
}

export const cpuWidget: Widget & DisplayInfoProvider = {
  name: "cpu",

  getType: () => "conditional",

  declareOptions(declare) {
    declareAppearanceOptions(declare, "\uf4bc");
    declareThresholdOptions(declare, { mode: "normal", warning: 70, critical: 90 });
    declare("sample_ms", "number", "200", "Sampling interval in milliseconds");
    declare("cache_ttl", "number", "5", "Cache duration in seconds");
  },

  async produce(context) {
    const ttl = context.options.getNumber("cache_ttl") ?? 5;
    return context.cache.getOrCompute("cpu", ttl, async () => {
      const before = sampleCpuTimes();
      await sleep(context.options.getNumber("sample_ms") ?? 200);
      return `${cpuUsagePercent(before, sampleCpuTimes())}%`;
    });
  },

  getDisplayInfo(content, context) {
    return thresholdDisplayInfo(content, firstInteger(content), context.options);
  },
};
