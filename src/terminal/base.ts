import { spawnSync } from "node:child_process";
import type { CommandOptions, CommandResult, HostName } from "./types";

const DEFAULT_TIMEOUT_MS = 5_000;

/**
 * The terminal multiplexer the status line renders into.
 *
 * Every call is synchronous: a render is one short-lived process.
 */
export interface StatusHost {
  /** Host identifier. */
  readonly name: HostName;

  /**
   * Read a global user option (e.g. "@statuskit_theme").
   * Returns undefined when the option is unset.
   */
  getGlobalOption(name: string): string | undefined;

  /**
   * Show a transient message to the user.
   */
  displayMessage(message: string): void;

  /**
   * Expand host format strings such as "#{session_name}".
   */
  expandFormat(format: string): string;

  /**
   * Run a shell command and return its stdout without trailing newlines.
   */
  runShell(command: string, options?: CommandOptions): string;

  /**
   * Check whether an executable is on PATH.
   */
  commandExists(command: string): boolean;
}

/**
 * Error raised when a host command fails.
 */
export class TmuxCommandError extends Error {
  readonly command: string;
  readonly args: string[];
  readonly stderr: string;
  readonly exitCode: number | null;

  constructor(params: {
    message: string;
    command: string;
    args: string[];
    stderr?: string;
    exitCode?: number | null;
  }) {
    super(params.message);
    this.name = "TmuxCommandError";
    this.command = params.command;
    this.args = params.args;
    this.stderr = params.stderr ?? "";
    this.exitCode = params.exitCode ?? null;
  }
}

/**
 * Shared primitives for host implementations.
 */
export abstract class BaseStatusHost implements StatusHost {
  abstract readonly name: HostName;

  abstract getGlobalOption(name: string): string | undefined;
  abstract displayMessage(message: string): void;
  abstract expandFormat(format: string): string;

  runShell(command: string, options?: CommandOptions): string {
    const { stdout } = this.runCommand("sh", ["-c", command], options);
    return stdout.replace(/\n+$/, "");
  }

  commandExists(command: string): boolean {
    const result = this.runCommandRaw("sh", ["-c", 'command -v "$1" >/dev/null 2>&1', "sh", command]);
    return result.exitCode === 0;
  }

  /**
   * Execute a command with argument-array semantics to avoid shell expansion.
   * Throws TmuxCommandError on spawn failure, timeout or non-zero exit.
   */
  protected runCommand(command: string, args: string[], options?: CommandOptions): CommandResult {
    const result = this.runCommandRaw(command, args, options);
    if (result.exitCode !== 0) {
      throw new TmuxCommandError({
        message: `Command failed (${result.exitCode}): ${command}`,
        command,
        args,
        stderr: result.stderr,
        exitCode: result.exitCode,
      });
    }
    return result;
  }

  /**
   * Execute a command and report its exit code instead of throwing on
   * non-zero exit. Spawn failures and timeouts still throw.
   */
  protected runCommandRaw(command: string, args: string[], options?: CommandOptions): CommandResult {
    const timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const result = spawnSync(command, args, {
      encoding: "utf-8",
      timeout: timeoutMs,
      windowsHide: true,
      stdio: ["ignore", "pipe", "pipe"],
    });

    if (result.error) {
      const code = "code" in result.error ? result.error.code : undefined;
      let message = result.error.message;
      if (code === "ENOENT") {
        message = `Command not found: ${command}`;
      } else if (code === "ETIMEDOUT") {
        message = `Command timed out after ${timeoutMs}ms: ${command}`;
      }
      throw new TmuxCommandError({ message, command, args, stderr: result.stderr ?? "" });
    }

    return {
      stdout: result.stdout ?? "",
      stderr: result.stderr ?? "",
      exitCode: result.status,
    };
  }
}
