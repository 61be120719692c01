/**
 * Widget contract
 *
 * A widget produces text. Everything else (visibility, coloring) is optional
 * and exposed through capability interfaces a widget may implement.
 */

import type { CacheStore } from "../../cache/store";
import type { StatusHost } from "../../terminal/base";
import type { OptionKind } from "../options";
import type { DependencyChecker } from "./dependencies";

// "static" widgets are never severity-hidden; "conditional" ones may be
export type WidgetType = "static" | "conditional";

/**
 * Result of a widget's display decision. Empty color or icon fields mean
 * "use the configured default".
 */
export interface DisplayInfo {
  visible: boolean;
  accent: string;
  accentIcon: string;
  icon: string;
}

export type OptionDeclarer = (name: string, kind: OptionKind, defaultValue: string, description: string) => void;

/**
 * Resolved options of one widget.
 */
export interface WidgetOptions {
  get(name: string): string;
  getNumber(name: string): number | undefined;
  getBool(name: string): boolean;
}

export interface WidgetContext {
  readonly name: string;
  readonly options: WidgetOptions;
  readonly cache: CacheStore;
  readonly host: StatusHost;
  readonly cwd: string;
  readonly now: () => Date;
}

export interface Widget {
  readonly name: string;
  getType(): WidgetType;
  declareOptions(declare: OptionDeclarer): void;
  /** Text for this cycle; "" suppresses the widget. */
  produce(context: WidgetContext): Promise<string>;
}

export interface DisplayInfoProvider {
  getDisplayInfo(content: string, context: WidgetContext): DisplayInfo;
}

export interface DependencyAware {
  /** Return false when a required dependency is missing. */
  checkDependencies(deps: DependencyChecker): boolean;
}

export function providesDisplayInfo(widget: Widget): widget is Widget & DisplayInfoProvider {
  return "getDisplayInfo" in widget && typeof widget.getDisplayInfo === "function";
}

export function checksDependencies(widget: Widget): widget is Widget & DependencyAware {
  return "checkDependencies" in widget && typeof widget.checkDependencies === "function";
}
