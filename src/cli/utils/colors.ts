/**
 * Shared CLI color helpers and output formatters
 */

export interface Colors {
  reset: string;
  bold: string;
  dim: string;
  green: string;
  red: string;
  yellow: string;
  cyan: string;
}

export interface Formatters {
  c: Colors;
  ok: (text: string) => string;
  fail: (text: string) => string;
  warn: (text: string) => string;
  header: (text: string) => string;
  dimText: (text: string) => string;
  /** Two-cell block in a hex color, or "" for non-hex values */
  swatch: (hex: string) => string;
}

/**
 * Create color codes and formatter functions.
 * Returns empty escape codes when output is not a terminal.
 */
export function createFormatters(useColor?: boolean): Formatters {
  const colored = useColor ?? process.stdout.isTTY === true;

  const c: Colors = {
    reset: colored ? "\x1b[0m" : "",
    bold: colored ? "\x1b[1m" : "",
    dim: colored ? "\x1b[2m" : "",
    green: colored ? "\x1b[32m" : "",
    red: colored ? "\x1b[31m" : "",
    yellow: colored ? "\x1b[33m" : "",
    cyan: colored ? "\x1b[36m" : "",
  };

  const swatch = (hex: string): string => {
    const match = hex.match(/^#([0-9a-fA-F]{2})([0-9a-fA-F]{2})([0-9a-fA-F]{2})$/);
    if (!colored || !match?.[1] || !match[2] || !match[3]) return "";
    const [r, g, b] = [match[1], match[2], match[3]].map((part) => Number.parseInt(part, 16));
    return `\x1b[48;2;${r};${g};${b}m  ${c.reset}`;
  };

  return {
    c,
    ok: (text: string) => `${c.green}✓${c.reset} ${text}`,
    fail: (text: string) => `${c.red}✗${c.reset} ${text}`,
    warn: (text: string) => `${c.yellow}⚠${c.reset} ${text}`,
    header: (text: string) => `${c.bold}${text}${c.reset}`,
    dimText: (text: string) => `${c.dim}${text}${c.reset}`,
    swatch,
  };
}
