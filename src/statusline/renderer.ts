/**
 * Status line render pipeline
 *
 * For each config entry, in order: resolve options, check dependencies,
 * produce content, apply the widget's display decision, resolve colors.
 * Each widget runs in isolation; a failing widget is logged and left out.
 */

import type { CacheStore } from "../cache/store";
import type { StatusHost } from "../terminal/base";
import { TmuxCommandError } from "../terminal/base";
import { errorMessage, logger } from "../utils/logger";
import type { ColorResolver } from "./colors";
import { render, type RenderOptions, type Segment } from "./compositor";
import { parseConfigLine, type ExternalEntry, type InternalEntry } from "./config-line";
import { resolveExternalContent } from "./external";
import type { OptionRegistry } from "./options";
import { DependencyChecker } from "./widgets/dependencies";
import {
  checksDependencies,
  providesDisplayInfo,
  type Widget,
  type WidgetContext,
  type WidgetOptions,
} from "./widgets/types";
import type { WidgetRegistry } from "./widgets";

const DEFAULT_ACCENT = "secondary";
const DEFAULT_ACCENT_ICON = "active";

export interface StatusRendererDeps {
  options: OptionRegistry;
  widgets: WidgetRegistry;
  colors: ColorResolver;
  cache: CacheStore;
  host: StatusHost;
  renderOptions: RenderOptions;
  cwd?: string;
  now?: () => Date;
}

/**
 * Strip internal status prefixes ("charging:", "MODIFIED:") from displayed content.
 */
export function cleanContent(content: string): string {
  const withoutState = /^[a-z]+:/.test(content) ? content.slice(content.indexOf(":") + 1) : content;
  return withoutState.startsWith("MODIFIED:") ? withoutState.slice("MODIFIED:".length) : withoutState;
}

export function missingDependencyMessage(widget: string, missing: readonly string[]): string {
  return `statuskit: widget '${widget}' disabled - missing: ${missing.join(" ")}`;
}

export function bindWidgetOptions(registry: OptionRegistry, widget: string): WidgetOptions {
  return {
    get: (name) => registry.resolve(widget, name),
    getNumber: (name) => registry.resolveNumber(widget, name),
    getBool: (name) => registry.resolveBool(widget, name),
  };
}

export class StatusRenderer {
  private readonly declared = new Set<string>();
  private readonly notified = new Set<string>();

  constructor(private readonly deps: StatusRendererDeps) {}

  /**
   * Render a config line to the final status string.
   */
  async render(configLine: string): Promise<string> {
    return render(await this.buildSegments(configLine), this.deps.renderOptions);
  }

  /**
   * Resolve every visible entry of a config line into a segment, in order.
   */
  async buildSegments(configLine: string): Promise<Segment[]> {
    const segments: Segment[] = [];
    for (const entry of parseConfigLine(configLine)) {
      try {
        const segment =
          entry.kind === "external" ? await this.externalSegment(entry) : await this.internalSegment(entry);
        if (segment) {
          segments.push(segment);
        }
      } catch (error) {
        logger.error("render", `Widget "${entry.name}" failed: ${errorMessage(error)}`);
      }
    }
    return segments;
  }

  /**
   * Register a widget's options with the option registry, once per process.
   */
  declareWidget(widget: Widget): void {
    if (this.declared.has(widget.name)) return;
    widget.declareOptions((name, kind, defaultValue, description) =>
      this.deps.options.declareOption(widget.name, name, kind, defaultValue, description)
    );
    this.declared.add(widget.name);
  }

  private async internalSegment(entry: InternalEntry): Promise<Segment | undefined> {
    const widget = this.deps.widgets.get(entry.name);
    if (!widget) {
      logger.warn("render", `Unknown widget "${entry.name}"`);
      return undefined;
    }

    this.declareWidget(widget);
    if (!this.dependenciesMet(widget)) return undefined;

    const context = this.widgetContext(widget.name);
    const content = await widget.produce(context);
    if (content === "") return undefined;

    const { options } = context;
    let accent = entry.accent || options.get("accent_color") || DEFAULT_ACCENT;
    let accentIcon = entry.accentIcon || options.get("accent_color_icon") || DEFAULT_ACCENT_ICON;
    let icon = entry.icon || options.get("icon");
    const configuredAccent = accent;

    if (providesDisplayInfo(widget)) {
      const info = widget.getDisplayInfo(content, context);
      const type = entry.type ?? widget.getType();
      if (!info.visible && type === "conditional") {
        logger.debug("render", `Widget "${widget.name}" hidden by its display rule`);
        return undefined;
      }
      if (info.accent) accent = info.accent;
      if (info.accentIcon) accentIcon = info.accentIcon;
      if (info.icon) icon = info.icon;
    }

    return this.segment(widget.name, cleanContent(content), icon, accent, accentIcon, accent !== configuredAccent);
  }

  private async externalSegment(entry: ExternalEntry): Promise<Segment | undefined> {
    const content = await resolveExternalContent(entry, this.deps.host, this.deps.cache);
    if (content === "") return undefined;
    logger.debug("render", `External widget "${entry.name}" loaded`);
    return this.segment(
      entry.name,
      content,
      entry.icon,
      entry.accent || DEFAULT_ACCENT,
      entry.accentIcon || DEFAULT_ACCENT_ICON,
      false
    );
  }

  private segment(
    name: string,
    content: string,
    icon: string,
    accent: string,
    accentIcon: string,
    hasThreshold: boolean
  ): Segment {
    const { colors } = this.deps;
    return {
      name,
      content,
      icon,
      accentColor: colors.resolve(accent),
      accentIconColor: colors.resolve(accentIcon),
      accentStrongColor: colors.resolve(`${accent}-strong`),
      accentSubtleColor: colors.resolve(`${accent}-subtle`),
      hasThreshold,
    };
  }

  private widgetContext(name: string): WidgetContext {
    return {
      name,
      options: bindWidgetOptions(this.deps.options, name),
      cache: this.deps.cache,
      host: this.deps.host,
      cwd: this.deps.cwd ?? process.cwd(),
      now: this.deps.now ?? (() => new Date()),
    };
  }

  private dependenciesMet(widget: Widget): boolean {
    if (!checksDependencies(widget)) return true;

    const checker = new DependencyChecker((command) => this.deps.host.commandExists(command));
    const ok = widget.checkDependencies(checker);

    if (checker.optionalMissing.length > 0) {
      logger.warn(
        "render",
        `Widget "${widget.name}": optional dependencies not found: ${checker.optionalMissing.join(" ")}`
      );
    }
    if (ok) return true;

    const missing = checker.missing.length > 0 ? checker.missing : ["unknown"];
    logger.error("render", `Widget "${widget.name}" skipped: missing dependencies: ${missing.join(" ")}`);
    this.notifyOnce(widget.name, missingDependencyMessage(widget.name, missing));
    return false;
  }

  private notifyOnce(widget: string, message: string): void {
    if (this.notified.has(widget)) return;
    this.notified.add(widget);
    try {
      this.deps.host.displayMessage(message);
    } catch (error) {
      if (!(error instanceof TmuxCommandError)) throw error;
      logger.warn("render", `Could not notify: ${error.message}`);
    }
  }
}
