import type { Command } from "commander";
import { errorMessage, logger } from "../../utils/logger";
import { loadRuntime } from "../utils/runtime";

export function registerRenderCommand(program: Command) {
  program
    .command("render")
    .description("Print the status string for tmux (#(statuskit render ...))")
    .argument("[config-line]", "Widget list; defaults to the configured widgets")
    .action(async (configLine: string | undefined) => {
      try {
        const runtime = loadRuntime();
        const output = await runtime.renderer.render(configLine ?? runtime.config.widgets);
        process.stdout.write(output);
      } catch (error) {
        // An empty status line beats an error message in the status bar
        logger.error("render", `Render failed: ${errorMessage(error)}`);
      }
    });
}
