/**
 * Minimal strftime for status-line clocks (local time).
 * Supported: %H %M %S %I %p %d %e %m %Y %y %a %A %b %B %V %j %%.
 * Unknown directives are left as written.
 */

const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];
const MONTHS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

function pad(value: number, width = 2, fill = "0"): string {
  return String(value).padStart(width, fill);
}

/**
 * ISO-8601 week number (weeks start Monday; week 1 holds the first Thursday).
 */
export function isoWeek(date: Date): number {
  const d = new Date(Date.UTC(date.getFullYear(), date.getMonth(), date.getDate()));
  const day = d.getUTCDay() || 7;
  d.setUTCDate(d.getUTCDate() + 4 - day);
  const yearStart = Date.UTC(d.getUTCFullYear(), 0, 1);
  return Math.ceil(((d.getTime() - yearStart) / 86_400_000 + 1) / 7);
}

function dayOfYear(date: Date): number {
  const start = Date.UTC(date.getFullYear(), 0, 1);
  const today = Date.UTC(date.getFullYear(), date.getMonth(), date.getDate());
  return (today - start) / 86_400_000 + 1;
}

function directive(code: string, date: Date): string | undefined {
  const hours = date.getHours();
  switch (code) {
    case "H":
      return pad(hours);
    case "M":
      return pad(date.getMinutes());
    case "S":
      return pad(date.getSeconds());
    case "I":
      return pad(hours % 12 === 0 ? 12 : hours % 12);
    case "p":
      return hours < 12 ? "AM" : "PM";
    case "d":
      return pad(date.getDate());
    case "e":
      return pad(date.getDate(), 2, " ");
    case "m":
      return pad(date.getMonth() + 1);
    case "Y":
      return String(date.getFullYear());
    case "y":
      return pad(date.getFullYear() % 100);
    case "a":
      return WEEKDAYS[date.getDay()]?.slice(0, 3);
    case "A":
      return WEEKDAYS[date.getDay()];
    case "b":
      return MONTHS[date.getMonth()]?.slice(0, 3);
    case "B":
      return MONTHS[date.getMonth()];
    case "V":
      return pad(isoWeek(date));
    case "j":
      return pad(dayOfYear(date), 3);
    case "%":
      return "%";
    default:
      return undefined;
  }
}

export function strftime(format: string, date: Date): string {
  return format.replace(/%([A-Za-z%])/g, (match, code: string) => directive(code, date) ?? match);
}
