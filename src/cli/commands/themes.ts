import type { Command } from "commander";
import { listThemes } from "../../statusline/themes";
import { createFormatters } from "../utils/colors";
import { loadRuntime } from "../utils/runtime";

export function registerThemesCommand(program: Command) {
  program
    .command("themes")
    .description("List available themes")
    .action(() => {
      const { c } = createFormatters();
      const active = loadRuntime().theme.name;
      for (const name of listThemes()) {
        console.log(name === active ? `${c.green}●${c.reset} ${name}` : `  ${name}`);
      }
    });
}
