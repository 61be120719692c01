/**
 * Shared test doubles
 */

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { MemoryCacheStore } from "../cache/store";
import { OptionRegistry, MapOptionSource } from "../statusline/options";
import { bindWidgetOptions } from "../statusline/renderer";
import type { Widget, WidgetContext, WidgetOptions } from "../statusline/widgets/types";
import { TmuxCommandError, type StatusHost } from "../terminal/base";

export interface FakeHostOptions {
  globals?: Record<string, string>;
  /** Shell command -> stdout. Unknown commands fail with exit 127. */
  shell?: Record<string, string>;
  /** Format -> expansion. Unknown formats expand their #{...} parts to "". */
  formats?: Record<string, string>;
  commands?: string[];
}

/**
 * In-memory stand-in for tmux.
 */
export class FakeHost implements StatusHost {
  readonly name = "tmux" as const;
  readonly messages: string[] = [];
  readonly shellCalls: string[] = [];

  constructor(private readonly fake: FakeHostOptions = {}) {}

  getGlobalOption(name: string): string | undefined {
    const globals = this.fake.globals ?? {};
    return Object.hasOwn(globals, name) ? globals[name] : undefined;
  }

  displayMessage(message: string): void {
    this.messages.push(message);
  }

  expandFormat(format: string): string {
    return this.fake.formats?.[format] ?? format.replace(/#\{[^}]*\}/g, "");
  }

  runShell(command: string): string {
    this.shellCalls.push(command);
    const shell = this.fake.shell ?? {};
    const output = Object.hasOwn(shell, command) ? shell[command] : undefined;
    if (output === undefined) {
      throw new TmuxCommandError({
        message: "Command failed (127): sh",
        command: "sh",
        args: ["-c", command],
        exitCode: 127,
      });
    }
    return output;
  }

  commandExists(command: string): boolean {
    return this.fake.commands?.includes(command) ?? false;
  }
}

/**
 * Resolved options of a widget, with optional overrides.
 */
export function widgetOptions(widget: Widget, overrides: Record<string, string> = {}): WidgetOptions {
  const registry = new OptionRegistry(new MapOptionSource({ [widget.name]: overrides }));
  widget.declareOptions((name, kind, defaultValue, description) =>
    registry.declareOption(widget.name, name, kind, defaultValue, description)
  );
  return bindWidgetOptions(registry, widget.name);
}

export function widgetContext(
  widget: Widget,
  overrides: Record<string, string> = {},
  host: StatusHost = new FakeHost()
): WidgetContext {
  return {
    name: widget.name,
    options: widgetOptions(widget, overrides),
    cache: new MemoryCacheStore(),
    host,
    cwd: "/tmp",
    now: () => new Date(2024, 0, 15, 9, 5, 7),
  };
}

/**
 * Create a temporary directory; the returned function removes it.
 */
export function makeTempDir(prefix: string): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), `statuskit-${prefix}-`));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

/**
 * Point the cache directory (and with it the log file) at a temp dir.
 */
export function isolateCacheDir(): { dir: string; restore: () => void } {
  const previous = process.env.STATUSKIT_CACHE_DIR;
  const { dir, cleanup } = makeTempDir("cache");
  process.env.STATUSKIT_CACHE_DIR = dir;
  return {
    dir,
    restore: () => {
      if (previous === undefined) delete process.env.STATUSKIT_CACHE_DIR;
      else process.env.STATUSKIT_CACHE_DIR = previous;
      cleanup();
    },
  };
}
