/**
 * Color resolver
 *
 * Maps semantic color names ("warning", "error-subtle", "surface") to concrete
 * values from the active theme palette. Every base color gets generated
 * light/dark variants; "-subtle" and "-strong" are aliases onto them.
 */

// Percentages in tenths of a percent (189 = 18.9%)
const LIGHT_STEPS = { light: 100, lighter: 189, lightest: 350 } as const;
const DARK_STEPS = { dark: 150, darker: 300, darkest: 442 } as const;

// Semantic aliases consumed by the compositor for severity-colored segments
const VARIANT_ALIASES = new Map<string, string>([
  ["subtle", "lighter"],
  ["strong", "darkest"],
]);

// Present in every theme
export const UNIVERSAL_COLORS: Readonly<Record<string, string>> = {
  transparent: "NONE",
  none: "NONE",
  white: "#ffffff",
  black: "#000000",
};

const HEX_PATTERN = /^#?([0-9a-fA-F]{6})$/;

interface Rgb {
  r: number;
  g: number;
  b: number;
}

function hexToRgb(hex: string): Rgb | undefined {
  const match = hex.trim().match(HEX_PATTERN);
  const digits = match?.[1];
  if (!digits) return undefined;
  return {
    r: Number.parseInt(digits.slice(0, 2), 16),
    g: Number.parseInt(digits.slice(2, 4), 16),
    b: Number.parseInt(digits.slice(4, 6), 16),
  };
}

function clamp(value: number): number {
  return Math.min(255, Math.max(0, value));
}

function rgbToHex({ r, g, b }: Rgb): string {
  return `#${[r, g, b].map((c) => clamp(c).toString(16).padStart(2, "0")).join("")}`;
}

/**
 * Move a color toward white. Returns undefined for non-hex input.
 */
export function lighten(hex: string, tenthsOfPercent: number): string | undefined {
  const rgb = hexToRgb(hex);
  if (!rgb) return undefined;
  const step = (c: number) => c + Math.floor(((255 - c) * tenthsOfPercent) / 1000);
  return rgbToHex({ r: step(rgb.r), g: step(rgb.g), b: step(rgb.b) });
}

/**
 * Move a color toward black. Returns undefined for non-hex input.
 */
export function darken(hex: string, tenthsOfPercent: number): string | undefined {
  const rgb = hexToRgb(hex);
  if (!rgb) return undefined;
  const factor = 1000 - tenthsOfPercent;
  const step = (c: number) => Math.floor((c * factor) / 1000);
  return rgbToHex({ r: step(rgb.r), g: step(rgb.g), b: step(rgb.b) });
}

/**
 * Generate the six variants for each hex base color in a palette.
 */
export function generateVariants(palette: Record<string, string>): Map<string, string> {
  const variants = new Map<string, string>();
  for (const [name, base] of Object.entries(palette)) {
    for (const [suffix, amount] of Object.entries(LIGHT_STEPS)) {
      const value = lighten(base, amount);
      if (value) variants.set(`${name}-${suffix}`, value);
    }
    for (const [suffix, amount] of Object.entries(DARK_STEPS)) {
      const value = darken(base, amount);
      if (value) variants.set(`${name}-${suffix}`, value);
    }
  }
  return variants;
}

export interface PaletteListing {
  universal: Record<string, string>;
  base: Record<string, string>;
  variants: Record<string, string>;
}

export class ColorResolver {
  private readonly base: Map<string, string>;
  private readonly variants: Map<string, string>;

  constructor(palette: Record<string, string>) {
    this.base = new Map(Object.entries(palette));
    this.variants = generateVariants(palette);
  }

  /**
   * Resolve a color name to its concrete value.
   *
   * Lookup order: universal, explicit palette entry, generated variant,
   * "-subtle"/"-strong" alias. Literal hex values and tmux color names such
   * as "default" or "colour235" pass through. Unknown names resolve to "".
   */
  resolve(name: string): string {
    if (!name) return "";

    if (Object.hasOwn(UNIVERSAL_COLORS, name)) return UNIVERSAL_COLORS[name] ?? "";

    const explicit = this.base.get(name) ?? this.variants.get(name);
    if (explicit) return explicit;

    const aliased = this.resolveAlias(name);
    if (aliased) return aliased;

    if (HEX_PATTERN.test(name) && name.startsWith("#")) return name;
    if (name === "default" || /^colou?r[0-9]{1,3}$/.test(name)) return name;

    return "";
  }

  has(name: string): boolean {
    return this.resolve(name) !== "";
  }

  list(): PaletteListing {
    return {
      universal: { ...UNIVERSAL_COLORS },
      base: Object.fromEntries(this.base),
      variants: Object.fromEntries(this.variants),
    };
  }

  private resolveAlias(name: string): string | undefined {
    const dash = name.lastIndexOf("-");
    if (dash <= 0) return undefined;
    const suffix = VARIANT_ALIASES.get(name.slice(dash + 1));
    if (!suffix) return undefined;
    return this.variants.get(`${name.slice(0, dash)}-${suffix}`);
  }
}
