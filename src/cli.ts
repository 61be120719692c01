#!/usr/bin/env node
/**
 * statuskit CLI
 *
 * Usage:
 *   statuskit render [config-line]   # Status string for tmux
 *   statuskit options [widget]       # Widget options and resolved values
 *   statuskit colors                 # Active theme palette
 *   statuskit themes                 # Available themes
 *   statuskit cache clear            # Drop cached widget values
 *   statuskit cache age <key>        # Age of one cached value
 *
 * tmux.conf:
 *   set -g status-right "#(statuskit render 'cpu;memory;git;datetime')"
 */

import { program } from "commander";
import {
  registerCacheCommand,
  registerColorsCommand,
  registerOptionsCommand,
  registerRenderCommand,
  registerThemesCommand,
} from "./cli/commands";

program
  .name("statuskit")
  .description("Widget-based tmux status line")
  .version("1.0.0");

registerRenderCommand(program);
registerOptionsCommand(program);
registerColorsCommand(program);
registerThemesCommand(program);
registerCacheCommand(program);

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
