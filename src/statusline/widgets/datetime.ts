/**
 * Date/time widget
 */

import { errorMessage, logger } from "../../utils/logger";
import { isoWeek, strftime } from "../../utils/strftime";
import { declareAppearanceOptions } from "./display";
import type { Widget } from "./types";

export const DATETIME_FORMATS: Readonly<Record<string, string>> = {
  time: "%H:%M",
  "time-seconds": "%H:%M:%S",
  "time-12h": "%I:%M %p",
  "time-12h-seconds": "%I:%M:%S %p",
  date: "%d/%m",
  "date-us": "%m/%d",
  "date-full": "%d/%m/%Y",
  "date-full-us": "%m/%d/%Y",
  "date-iso": "%Y-%m-%d",
  datetime: "%d/%m %H:%M",
  "datetime-us": "%m/%d %I:%M %p",
  weekday: "%a %H:%M",
  "weekday-full": "%A %H:%M",
  full: "%a, %d %b %H:%M",
  "full-date": "%a, %d %b %Y",
  iso: "%Y-%m-%dT%H:%M:%S",
};

/**
 * A named format, or the value itself as a strftime pattern.
 */
export function resolveDateFormat(format: string): string {
  return (Object.hasOwn(DATETIME_FORMATS, format) ? DATETIME_FORMATS[format] : undefined) ?? format;
}

/**
 * "HH:MM" in another time zone, or undefined for an unknown zone.
 */
export function timeInZone(date: Date, timeZone: string): string | undefined {
  try {
    return new Intl.DateTimeFormat("en-GB", {
      timeZone,
      hour: "2-digit",
      minute: "2-digit",
      hourCycle: "h23",
    }).format(date);
  } catch (error) {
    logger.warn("datetime", `Unknown time zone ${timeZone}: ${errorMessage(error)}`);
    return undefined;
  }
}

export interface DatetimeSettings {
  format: string;
  timezone: string;
  showWeek: boolean;
  separator: string;
}

export function formatDatetime(date: Date, settings: DatetimeSettings): string {
  const separator = settings.separator || " ";
  const parts: string[] = [];
  if (settings.showWeek) {
    parts.push(`W${String(isoWeek(date)).padStart(2, "0")}`);
  }
  parts.push(strftime(resolveDateFormat(settings.format), date));
  if (settings.timezone) {
    const other = timeInZone(date, settings.timezone);
    if (other) parts.push(other);
  }
  return parts.join(separator);
}

export const datetimeWidget: Widget = {
  name: "datetime",

  getType: () => "static",

  declareOptions(declare) {
    declareAppearanceOptions(declare, "\u{f0954}");
    declare("format", "string", "datetime", "Named format (time|date|datetime|full|iso|...) or strftime pattern");
    declare("timezone", "string", "", "Secondary time zone to display");
    declare("show_week", "bool", "false", "Show the ISO week number");
    declare("separator", "string", " ", "Separator between elements");
  },

  async produce(context) {
    const { options } = context;
    return formatDatetime(context.now(), {
      format: options.get("format"),
      timezone: options.get("timezone"),
      showWeek: options.getBool("show_week"),
      separator: options.get("separator"),
    });
  },
};
