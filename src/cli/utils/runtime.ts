import { applyHostOverrides, loadConfig } from "../../config/loader";
import type { StatusHost } from "../../terminal/base";
import { TmuxHost } from "../../terminal/tmux";
import { createStatusRuntime, type StatusRuntime } from "../../statusline/runtime";

/**
 * Build the runtime the CLI commands share: config file, then tmux overrides.
 */
export function loadRuntime(host: StatusHost = new TmuxHost()): StatusRuntime {
  const config = applyHostOverrides(loadConfig(), host);
  return createStatusRuntime({ config, host });
}
