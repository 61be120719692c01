/**
 * Battery widget - charge level with charging and low-battery icons
 *
 * Content carries the charge state as a prefix ("charging:85%") so a cached
 * value still knows which icon to use. The prefix is not displayed.
 */

import { existsSync, readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { TmuxCommandError } from "../../terminal/base";
import { logger } from "../../utils/logger";
import { declareAppearanceOptions, declareThresholdOptions, thresholdDisplayInfo, thresholdSeverity } from "./display";
import type { DisplayInfoProvider, DependencyAware, Widget, WidgetContext } from "./types";

const POWER_SUPPLY_DIR = "/sys/class/power_supply";

export type ChargeState = "charging" | "discharging" | "full";

export interface BatteryReading {
  percent: number;
  state: ChargeState;
}

function toChargeState(status: string): ChargeState {
  const normalized = status.trim().toLowerCase();
  if (normalized === "charging" || normalized === "charged") return "charging";
  if (normalized === "full") return "full";
  return "discharging";
}

/**
 * Read the first battery under a sysfs power_supply directory.
 */
export function readSysfsBattery(root: string = POWER_SUPPLY_DIR): BatteryReading | undefined {
  if (!existsSync(root)) return undefined;
  for (const supply of readdirSync(root)) {
    const dir = join(root, supply);
    const typePath = join(dir, "type");
    const capacityPath = join(dir, "capacity");
    if (!existsSync(typePath) || !existsSync(capacityPath)) continue;
    if (readFileSync(typePath, "utf-8").trim() !== "Battery") continue;

    const percent = Number.parseInt(readFileSync(capacityPath, "utf-8").trim(), 10);
    if (Number.isNaN(percent)) continue;
    const statusPath = join(dir, "status");
    const status = existsSync(statusPath) ? readFileSync(statusPath, "utf-8") : "";
    return { percent, state: toChargeState(status) };
  }
  return undefined;
}

/**
 * Parse `pmset -g batt` output ("... 85%; charging; 1:02 remaining").
 */
export function parsePmset(output: string): BatteryReading | undefined {
  const match = output.match(/([0-9]+)%;\s*([a-zA-Z ]+);/);
  if (!match?.[1] || !match[2]) return undefined;
  return { percent: Number.parseInt(match[1], 10), state: toChargeState(match[2]) };
}

/**
 * Split "charging:85%" into its state and the displayed text.
 */
export function parseBatteryContent(content: string): { state: ChargeState; text: string } {
  const match = content.match(/^([a-z]+):(.*)$/);
  if (!match?.[1]) return { state: "discharging", text: content };
  return { state: toChargeState(match[1]), text: match[2] ?? "" };
}

function readBattery(context: WidgetContext): BatteryReading | undefined {
  const fromSysfs = readSysfsBattery();
  if (fromSysfs) return fromSysfs;
  if (process.platform !== "darwin") return undefined;
  try {
    return parsePmset(context.host.runShell("pmset -g batt", { timeoutMs: 1_000 }));
  } catch (error) {
    if (!(error instanceof TmuxCommandError)) throw error;
    logger.debug("battery", `pmset failed: ${error.message}`);
    return undefined;
  }
}

export const batteryWidget: Widget & DisplayInfoProvider & DependencyAware = {
  name: "battery",

  getType: () => "conditional",

  checkDependencies(deps) {
    if (process.platform === "darwin") {
      deps.requireCommand("pmset", true);
    }
    return true;
  },

  declareOptions(declare) {
    declareAppearanceOptions(declare, "\u{f0079}");
    declare("icon_charging", "icon", "\u{f0084}", "Icon when charging");
    declare("icon_low", "icon", "\u{f0083}", "Icon when the battery is low");
    declare("hide_when_full_and_charging", "bool", "false", "Hide at 100% while on power");
    declareThresholdOptions(declare, { mode: "inverted", warning: 50, critical: 30 });
    declare("cache_ttl", "number", "60", "Cache duration in seconds");
  },

  async produce(context) {
    const ttl = context.options.getNumber("cache_ttl") ?? 60;
    return context.cache.getOrCompute("battery", ttl, () => {
      const reading = readBattery(context);
      if (!reading) return "";
      if (
        context.options.getBool("hide_when_full_and_charging") &&
        reading.percent >= 100 &&
        reading.state !== "discharging"
      ) {
        return "";
      }
      return `${reading.state}:${reading.percent}%`;
    });
  },

  getDisplayInfo(content, context) {
    const { state, text } = parseBatteryContent(content);
    const value = Number.parseInt(text, 10);
    const reading = Number.isNaN(value) ? undefined : value;
    const info = thresholdDisplayInfo(text, reading, context.options);
    if (!info.visible) return info;

    if (state !== "discharging") {
      return { ...info, icon: context.options.get("icon_charging") };
    }
    const level = thresholdSeverity(reading, context.options);
    if (level === "warning" || level === "error") {
      return { ...info, icon: context.options.get("icon_low") };
    }
    return info;
  },
};
