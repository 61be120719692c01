import { BaseStatusHost, TmuxCommandError } from "./base";

/**
 * Unquote one value from `tmux show-options` output.
 * tmux double-quotes values containing spaces or special characters and
 * backslash-escapes quotes inside them.
 */
export function unquoteOptionValue(raw: string): string {
  const value = raw.trim();
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1).replace(/\\(.)/g, "$1");
  }
  if (value.length >= 2 && value.startsWith("'") && value.endsWith("'")) {
    return value.slice(1, -1);
  }
  return value;
}

/**
 * Parse `tmux show-options -g` output into a name -> value map.
 * Lines without a value (unset array members, bare flags) map to "".
 */
export function parseShowOptions(output: string): Map<string, string> {
  const options = new Map<string, string>();
  for (const line of output.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    const space = trimmed.indexOf(" ");
    if (space === -1) {
      options.set(trimmed, "");
      continue;
    }
    options.set(trimmed.slice(0, space), unquoteOptionValue(trimmed.slice(space + 1)));
  }
  return options;
}

/**
 * tmux implementation of the status host.
 *
 * Global options are read once with a single `show-options -g` call and
 * kept for the rest of the process.
 */
export class TmuxHost extends BaseStatusHost {
  readonly name = "tmux" as const;

  private globalOptions: Map<string, string> | null = null;

  getGlobalOption(name: string): string | undefined {
    return this.loadGlobalOptions().get(name);
  }

  displayMessage(message: string): void {
    this.runCommand("tmux", ["display-message", message]);
  }

  expandFormat(format: string): string {
    const { stdout } = this.runCommand("tmux", ["display-message", "-p", format]);
    return stdout.replace(/\n+$/, "");
  }

  private loadGlobalOptions(): Map<string, string> {
    if (this.globalOptions) return this.globalOptions;
    try {
      const { stdout } = this.runCommand("tmux", ["show-options", "-g"]);
      this.globalOptions = parseShowOptions(stdout);
    } catch (error) {
      if (!(error instanceof TmuxCommandError)) throw error;
      // No server: every option reads as unset
      this.globalOptions = new Map();
    }
    return this.globalOptions;
  }
}
