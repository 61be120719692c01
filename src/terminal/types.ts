/**
 * Supported status hosts.
 */
export type HostName = "tmux";

/**
 * Captured output of a finished host command.
 */
export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
}

/**
 * Options for running a host command.
 */
export interface CommandOptions {
  /** Kill the command after this many milliseconds. Default: 5000. */
  timeoutMs?: number;
}
