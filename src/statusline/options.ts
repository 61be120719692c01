/**
 * Widget option registry
 *
 * Widgets declare typed options with defaults; consumers resolve a value
 * through a fixed precedence chain and the result is memoized for the rest
 * of the process:
 *
 *   memoized value -> external override -> declared default
 *     -> global fallback default -> ""
 *
 * Resolution never throws. Invalid numbers and booleans degrade to the default.
 */

export type OptionKind = "string" | "number" | "bool" | "color" | "icon" | "key" | "path";

export interface OptionDescriptor {
  name: string;
  kind: OptionKind;
  default: string;
  description: string;
}

/**
 * Where per-widget overrides come from (tmux options, config file, tests).
 * Returns undefined when the option is not explicitly set.
 */
export interface OptionSource {
  get(widget: string, name: string): string | undefined;
}

export interface FallbackDefault {
  kind: OptionKind;
  value: string;
}

/**
 * Fallbacks keyed by option name (apply to every widget) or by
 * "widget.option" (apply to one widget only).
 */
export type FallbackDefaults = Record<string, FallbackDefault>;

// Framework options every widget understands without declaring them
export const FRAMEWORK_STANDARD_OPTIONS: FallbackDefaults = {
  display_condition: { kind: "string", value: "always" },
  display_threshold: { kind: "string", value: "" },
  accent_color: { kind: "color", value: "secondary" },
  accent_color_icon: { kind: "color", value: "active" },
  cache_ttl: { kind: "number", value: "5" },
};

const INTEGER_PATTERN = /^-?[0-9]+$/;

/**
 * Normalize a boolean-ish string to "true" / "false", or undefined.
 */
export function normalizeBool(value: string): "true" | "false" | undefined {
  switch (value.trim().toLowerCase()) {
    case "true":
    case "1":
    case "yes":
    case "on":
      return "true";
    case "false":
    case "0":
    case "no":
    case "off":
      return "false";
    default:
      return undefined;
  }
}

function validate(kind: OptionKind, value: string, fallback: string): string {
  switch (kind) {
    case "number":
      return INTEGER_PATTERN.test(value.trim()) ? value.trim() : fallback;
    case "bool":
      return normalizeBool(value) ?? normalizeBool(fallback) ?? fallback;
    default:
      return value;
  }
}

function memoKey(widget: string, name: string): string {
  return `${widget}\u001f${name}`;
}

/**
 * In-memory option source, used for config-file overrides and tests.
 */
export class MapOptionSource implements OptionSource {
  private readonly values = new Map<string, string>();

  constructor(initial?: Record<string, Record<string, string>>) {
    if (initial) {
      for (const [widget, options] of Object.entries(initial)) {
        for (const [name, value] of Object.entries(options)) {
          this.set(widget, name, value);
        }
      }
    }
  }

  set(widget: string, name: string, value: string): void {
    this.values.set(memoKey(widget, name), value);
  }

  delete(widget: string, name: string): void {
    this.values.delete(memoKey(widget, name));
  }

  get(widget: string, name: string): string | undefined {
    return this.values.get(memoKey(widget, name));
  }
}

/**
 * Consult several sources in order; the first explicitly set value wins.
 */
export class ChainedOptionSource implements OptionSource {
  constructor(private readonly sources: OptionSource[]) {}

  get(widget: string, name: string): string | undefined {
    for (const source of this.sources) {
      const value = source.get(widget, name);
      if (value !== undefined && value !== "") {
        return value;
      }
    }
    return undefined;
  }
}

export class OptionRegistry {
  private readonly declarations = new Map<string, Map<string, OptionDescriptor>>();
  private readonly resolved = new Map<string, string>();

  constructor(
    private readonly source: OptionSource = new MapOptionSource(),
    private readonly fallbacks: FallbackDefaults = FRAMEWORK_STANDARD_OPTIONS
  ) {}

  /**
   * Register an option for a widget. Re-declaring the same name overwrites it.
   */
  declareOption(
    widget: string,
    name: string,
    kind: OptionKind,
    defaultValue: string,
    description: string
  ): void {
    let options = this.declarations.get(widget);
    if (!options) {
      options = new Map();
      this.declarations.set(widget, options);
    }
    options.set(name, { name, kind, default: defaultValue, description });
  }

  /**
   * Resolve an option to a concrete string. Memoized per (widget, name).
   */
  resolve(widget: string, name: string): string {
    const key = memoKey(widget, name);
    const memoized = this.resolved.get(key);
    if (memoized !== undefined) {
      return memoized;
    }

    const descriptor = this.declarations.get(widget)?.get(name);
    const fallback = this.fallback(`${widget}.${name}`) ?? this.fallback(name);

    const kind: OptionKind = descriptor?.kind ?? fallback?.kind ?? "string";
    let defaultValue = "";
    if (descriptor && descriptor.default !== "") {
      defaultValue = descriptor.default;
    } else if (fallback) {
      defaultValue = fallback.value;
    }

    const override = this.readOverride(widget, name);
    const value = override === undefined ? defaultValue : validate(kind, override, defaultValue);

    this.resolved.set(key, value);
    return value;
  }

  /**
   * Resolve a number option; undefined when the resolved value is not an integer.
   */
  resolveNumber(widget: string, name: string): number | undefined {
    const value = this.resolve(widget, name);
    return INTEGER_PATTERN.test(value) ? Number.parseInt(value, 10) : undefined;
  }

  resolveBool(widget: string, name: string): boolean {
    return normalizeBool(this.resolve(widget, name)) === "true";
  }

  /**
   * Forget memoized values for one widget, or for every widget.
   */
  clearCache(widget?: string): void {
    if (widget === undefined) {
      this.resolved.clear();
      return;
    }
    const prefix = memoKey(widget, "");
    for (const key of [...this.resolved.keys()]) {
      if (key.startsWith(prefix)) {
        this.resolved.delete(key);
      }
    }
  }

  getDeclaredOptions(widget: string): OptionDescriptor[] {
    return [...(this.declarations.get(widget)?.values() ?? [])];
  }

  hasDeclaredOptions(widget: string): boolean {
    return (this.declarations.get(widget)?.size ?? 0) > 0;
  }

  /**
   * Widgets that declared at least one option, in declaration order.
   */
  listWidgets(): string[] {
    return [...this.declarations.keys()];
  }

  private fallback(key: string): FallbackDefault | undefined {
    return Object.hasOwn(this.fallbacks, key) ? this.fallbacks[key] : undefined;
  }

  private readOverride(widget: string, name: string): string | undefined {
    try {
      const value = this.source.get(widget, name);
      return value === undefined || value === "" ? undefined : value;
    } catch {
      // Unreadable host: use the defaults
      return undefined;
    }
  }
}
