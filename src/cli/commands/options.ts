import type { Command } from "commander";
import type { StatusRuntime } from "../../statusline/runtime";
import { createFormatters, type Formatters } from "../utils/colors";
import { loadRuntime } from "../utils/runtime";

export interface OptionRow {
  widget: string;
  name: string;
  kind: string;
  default: string;
  value: string;
  description: string;
}

/**
 * Declared options of one widget (or all widgets) with their resolved values.
 */
export function collectOptionRows(runtime: StatusRuntime, widget?: string): OptionRow[] {
  const widgets = widget ? runtime.widgets.list().filter((w) => w.name === widget) : runtime.widgets.list();
  const rows: OptionRow[] = [];
  for (const w of widgets) {
    runtime.renderer.declareWidget(w);
    for (const descriptor of runtime.options.getDeclaredOptions(w.name)) {
      rows.push({
        widget: w.name,
        name: descriptor.name,
        kind: descriptor.kind,
        default: descriptor.default,
        value: runtime.options.resolve(w.name, descriptor.name),
        description: descriptor.description,
      });
    }
  }
  return rows;
}

export function formatOptionRows(rows: readonly OptionRow[], fmt: Formatters): string[] {
  const { c } = fmt;
  const lines: string[] = [];
  let current = "";
  const width = Math.max(0, ...rows.map((row) => row.name.length));
  for (const row of rows) {
    if (row.widget !== current) {
      if (current) lines.push("");
      lines.push(fmt.header(row.widget));
      current = row.widget;
    }
    const quoted = JSON.stringify(row.value);
    const value = row.value === row.default ? quoted : `${c.cyan}${quoted}${c.reset}`;
    lines.push(`  ${row.name.padEnd(width)}  ${fmt.dimText(`(${row.kind})`)} ${value}  ${fmt.dimText(row.description)}`);
  }
  return lines;
}

export function registerOptionsCommand(program: Command) {
  program
    .command("options")
    .description("Show widget options with their defaults and resolved values")
    .argument("[widget]", "Only show this widget")
    .option("--json", "Print as JSON")
    .action((widget: string | undefined, options: { json?: boolean }) => {
      const fmt = createFormatters();
      const runtime = loadRuntime();
      if (widget && !runtime.widgets.has(widget)) {
        console.log(fmt.fail(`Unknown widget: ${widget}`));
        console.log(`Available: ${runtime.widgets.list().map((w) => w.name).join(", ")}`);
        process.exitCode = 1;
        return;
      }

      const rows = collectOptionRows(runtime, widget);
      if (options.json) {
        console.log(JSON.stringify(rows, null, 2));
        return;
      }
      for (const line of formatOptionRows(rows, fmt)) {
        console.log(line);
      }
    });
}
