import type { Command } from "commander";
import type { PaletteListing } from "../../statusline/colors";
import { createFormatters, type Formatters } from "../utils/colors";
import { loadRuntime } from "../utils/runtime";

export function formatPalette(listing: PaletteListing, fmt: Formatters): string[] {
  const lines: string[] = [];
  const section = (title: string, entries: Record<string, string>) => {
    const names = Object.keys(entries).sort();
    if (names.length === 0) return;
    if (lines.length > 0) lines.push("");
    lines.push(fmt.header(title));
    const width = Math.max(...names.map((name) => name.length));
    for (const name of names) {
      const value = entries[name] ?? "";
      const swatch = fmt.swatch(value);
      lines.push(`  ${name.padEnd(width)}  ${value}${swatch ? ` ${swatch}` : ""}`);
    }
  };
  section("Universal", listing.universal);
  section("Theme", listing.base);
  section("Variants", listing.variants);
  return lines;
}

export function registerColorsCommand(program: Command) {
  program
    .command("colors")
    .description("Show the resolved color palette of the active theme")
    .option("--base", "Only show theme base colors")
    .action((options: { base?: boolean }) => {
      const fmt = createFormatters();
      const runtime = loadRuntime();
      const listing = runtime.colors.list();
      console.log(fmt.dimText(`Theme: ${runtime.theme.name}`));
      console.log("");
      const shown: PaletteListing = options.base ? { universal: {}, base: listing.base, variants: {} } : listing;
      for (const line of formatPalette(shown, fmt)) {
        console.log(line);
      }
    });
}
