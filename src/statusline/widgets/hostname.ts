/**
 * Hostname widget
 */

import { hostname } from "node:os";
import { declareAppearanceOptions } from "./display";
import type { Widget } from "./types";

export function formatHostname(name: string, format: string): string {
  return format === "full" ? name : (name.split(".")[0] ?? name);
}

export const hostnameWidget: Widget = {
  name: "hostname",

  getType: () => "static",

  declareOptions(declare) {
    declareAppearanceOptions(declare, "\u{f0379}");
    declare("format", "string", "short", "Hostname format (short|full)");
  },

  async produce(context) {
    return formatHostname(hostname(), context.options.get("format"));
  },
};
