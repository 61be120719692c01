import type { OptionSource } from "../statusline/options";
import type { StatusHost } from "./base";

export const OPTION_PREFIX = "@statuskit_";
export const WIDGET_OPTION_PREFIX = `${OPTION_PREFIX}widget_`;

/**
 * tmux option holding a per-widget override, e.g. "@statuskit_widget_cpu_warning_threshold".
 */
export function widgetOptionName(widget: string, name: string): string {
  return `${WIDGET_OPTION_PREFIX}${widget}_${name}`;
}

/**
 * Per-widget overrides read from tmux global options.
 */
export class TmuxOptionSource implements OptionSource {
  constructor(private readonly host: StatusHost) {}

  get(widget: string, name: string): string | undefined {
    return this.host.getGlobalOption(widgetOptionName(widget, name));
  }
}
