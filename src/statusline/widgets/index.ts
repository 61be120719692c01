/**
 * Widget registry
 */

export * from "./types";
export * from "./display";
export { DependencyChecker } from "./dependencies";

import type { Widget } from "./types";
import { batteryWidget } from "./battery";
import { cpuWidget } from "./cpu";
import { datetimeWidget } from "./datetime";
import { diskWidget } from "./disk";
import { gitWidget } from "./git";
import { hostnameWidget } from "./hostname";
import { loadavgWidget } from "./loadavg";
import { memoryWidget } from "./memory";
import { uptimeWidget } from "./uptime";

export const BUILTIN_WIDGETS: readonly Widget[] = [
  cpuWidget,
  memoryWidget,
  diskWidget,
  batteryWidget,
  loadavgWidget,
  gitWidget,
  hostnameWidget,
  datetimeWidget,
  uptimeWidget,
];

export class WidgetRegistry {
  private readonly widgets = new Map<string, Widget>();

  constructor(widgets: readonly Widget[] = []) {
    for (const widget of widgets) {
      this.register(widget);
    }
  }

  /**
   * Register a widget implementation. A later widget with the same name replaces it.
   */
  register(widget: Widget): void {
    this.widgets.set(widget.name, widget);
  }

  get(name: string): Widget | undefined {
    return this.widgets.get(name);
  }

  has(name: string): boolean {
    return this.widgets.has(name);
  }

  list(): Widget[] {
    return Array.from(this.widgets.values());
  }
}

/**
 * Registry holding every built-in widget
 */
export function createDefaultWidgetRegistry(): WidgetRegistry {
  return new WidgetRegistry(BUILTIN_WIDGETS);
}
