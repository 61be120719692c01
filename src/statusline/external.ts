/**
 * User-supplied command widgets (EXTERNAL entries)
 */

import { createHash } from "node:crypto";
import type { CacheStore } from "../cache/store";
import type { StatusHost } from "../terminal/base";
import { TmuxCommandError } from "../terminal/base";
import { logger } from "../utils/logger";
import type { ExternalEntry } from "./config-line";

const FORMAT_PATTERN = /#\{.*\}/;

export function externalCacheKey(content: string): string {
  return `external_${createHash("sha1").update(content).digest("hex").slice(0, 12)}`;
}

/**
 * The shell command inside "#(cmd)" or "$(cmd)", or undefined for plain content.
 */
export function commandOf(content: string): string | undefined {
  const match = content.match(/^[#$]\((.*)\)$/s);
  return match?.[1];
}

/**
 * Evaluate entry content: run "#(cmd)" / "$(cmd)" through the shell
 * (expanding tmux formats in the command first), expand a bare "#{...}"
 * format through tmux, or return literal text unchanged. Failures yield "".
 */
export function executeContent(content: string, host: StatusHost): string {
  try {
    const command = commandOf(content);
    if (command !== undefined) {
      const expanded = FORMAT_PATTERN.test(command) ? host.expandFormat(command) : command;
      return host.runShell(expanded);
    }
    if (FORMAT_PATTERN.test(content)) {
      return host.expandFormat(content);
    }
    return content;
  } catch (error) {
    if (!(error instanceof TmuxCommandError)) throw error;
    logger.debug("external", `${error.message}${error.stderr ? `: ${error.stderr.trim()}` : ""}`);
    return "";
  }
}

/**
 * A visibility command hides the widget when it yields "", "false" or "0".
 */
export function conditionPasses(condition: string, host: StatusHost): boolean {
  if (!condition) return true;
  const result = executeContent(condition, host).trim();
  return result !== "" && result !== "false" && result !== "0";
}

/**
 * Content of an external entry for this cycle, or "" when it should not show.
 */
export async function resolveExternalContent(
  entry: ExternalEntry,
  host: StatusHost,
  cache: CacheStore
): Promise<string> {
  const content =
    entry.ttlSeconds > 0
      ? await cache.getOrCompute(externalCacheKey(entry.content), entry.ttlSeconds, () =>
          executeContent(entry.content, host)
        )
      : executeContent(entry.content, host);

  if (!conditionPasses(entry.condition, host)) return "";
  return content;
}
