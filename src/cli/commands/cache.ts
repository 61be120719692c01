import type { Command } from "commander";
import { createFormatters } from "../utils/colors";
import { loadRuntime } from "../utils/runtime";

export function registerCacheCommand(program: Command) {
  const cacheCmd = program.command("cache").description("Manage the widget cache");

  cacheCmd
    .command("clear")
    .description("Delete every cached widget value")
    .action(() => {
      const { ok } = createFormatters();
      loadRuntime().cache.clear();
      console.log(ok("Cache cleared"));
    });

  cacheCmd
    .command("age")
    .description("Show how old a cached value is")
    .argument("<key>", "Cache key (e.g. cpu, battery)")
    .action((key: string) => {
      const { warn } = createFormatters();
      const age = loadRuntime().cache.age(key);
      if (age < 0) {
        console.log(warn(`No cache entry for ${key}`));
        process.exitCode = 1;
        return;
      }
      console.log(`${key}: ${age}s`);
    });
}
