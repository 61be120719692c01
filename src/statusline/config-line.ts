/**
 * Widget list parsing
 *
 * A config line is a ";"-separated list of entries:
 *   internal: name:accent:accentIcon:icon:type
 *   external: EXTERNAL|icon|content|accent|accentIcon|ttl[|name[|condition]]
 * Missing fields are empty and fall back to the widget's defaults.
 */

import type { WidgetType } from "./widgets/types";

export interface InternalEntry {
  kind: "internal";
  name: string;
  accent: string;
  accentIcon: string;
  icon: string;
  /** Set only when the entry names a known type */
  type?: WidgetType;
}

export interface ExternalEntry {
  kind: "external";
  name: string;
  icon: string;
  content: string;
  accent: string;
  accentIcon: string;
  ttlSeconds: number;
  condition: string;
}

export type ConfigEntry = InternalEntry | ExternalEntry;

const EXTERNAL_MARKER = "EXTERNAL|";

/**
 * Map a type field onto a widget type. "dynamic" is an older spelling of "conditional".
 */
export function parseWidgetType(value: string): WidgetType | undefined {
  switch (value.trim().toLowerCase()) {
    case "static":
      return "static";
    case "conditional":
    case "dynamic":
      return "conditional";
    default:
      return undefined;
  }
}

function parseTtl(value: string): number {
  const trimmed = value.trim();
  return /^[0-9]+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : 0;
}

export function parseExternalEntry(raw: string): ExternalEntry | undefined {
  const [, icon = "", content = "", accent = "", accentIcon = "", ttl = "", name = "", condition = ""] = raw.split("|");
  if (!content) return undefined;
  return {
    kind: "external",
    name: name || "external",
    icon,
    content,
    accent,
    accentIcon,
    ttlSeconds: parseTtl(ttl),
    condition,
  };
}

export function parseInternalEntry(raw: string): InternalEntry | undefined {
  const [name = "", accent = "", accentIcon = "", icon = "", type = ""] = raw.split(":");
  const trimmedName = name.trim();
  if (!trimmedName) return undefined;
  const entry: InternalEntry = { kind: "internal", name: trimmedName, accent, accentIcon, icon };
  const widgetType = parseWidgetType(type);
  if (widgetType) entry.type = widgetType;
  return entry;
}

/**
 * Parse a config line into entries, in order. Empty and malformed entries are dropped.
 */
export function parseConfigLine(line: string): ConfigEntry[] {
  const entries: ConfigEntry[] = [];
  for (const raw of line.split(";")) {
    const trimmed = raw.trim();
    if (!trimmed) continue;
    const entry = trimmed.startsWith(EXTERNAL_MARKER) ? parseExternalEntry(trimmed) : parseInternalEntry(trimmed);
    if (entry) entries.push(entry);
  }
  return entries;
}
