/**
 * Git widget - branch name and working tree status of the active pane
 */

import { execFileSync } from "node:child_process";
import { existsSync } from "node:fs";
import { TmuxCommandError } from "../../terminal/base";
import { errorMessage, logger } from "../../utils/logger";
import { declareAppearanceOptions, SHOWN } from "./display";
import type { DependencyAware, DisplayInfoProvider, Widget, WidgetContext } from "./types";

export const MODIFIED_PREFIX = "MODIFIED:";

/**
 * Summarize `git status --porcelain=v1 --branch` output.
 *
 * "main" when clean, "MODIFIED:main ~2 +1" with 2 changed and 1 untracked
 * file. Returns "" when there is no branch line.
 */
export function summarizeGitStatus(output: string): string {
  const lines = output.split("\n").filter((line) => line.length > 0);
  const header = lines[0];
  if (!header?.startsWith("## ")) return "";

  const branch = header.slice(3).replace(/\.\.\..*$/, "");
  if (!branch) return "";

  let changed = 0;
  let untracked = 0;
  for (const line of lines.slice(1)) {
    const status = line.slice(0, 2);
    if (status === "??") untracked++;
    else if (status !== "  ") changed++;
  }

  let summary = branch;
  if (changed > 0) summary += ` ~${changed}`;
  if (untracked > 0) summary += ` +${untracked}`;
  return lines.length > 1 ? `${MODIFIED_PREFIX}${summary}` : summary;
}

function panePath(context: WidgetContext): string {
  try {
    const path = context.host.expandFormat("#{pane_current_path}");
    if (path && existsSync(path)) return path;
  } catch (error) {
    if (!(error instanceof TmuxCommandError)) throw error;
  }
  return context.cwd;
}

function readGitStatus(cwd: string): string {
  try {
    return execFileSync("git", ["-C", cwd, "status", "--porcelain=v1", "--branch"], {
      encoding: "utf-8",
      timeout: 1_000,
      stdio: ["ignore", "pipe", "ignore"],
    });
  } catch (error) {
    // Not a work tree, or git failed
    logger.debug("git", `git status in ${cwd} failed: ${errorMessage(error)}`);
    return "";
  }
}

export const gitWidget: Widget & DisplayInfoProvider & DependencyAware = {
  name: "git",

  getType: () => "conditional",

  checkDependencies(deps) {
    return deps.requireCommand("git");
  },

  declareOptions(declare) {
    declareAppearanceOptions(declare, "\u{f01d2}");
    declare("modified_accent_color", "color", "warning", "Background color for a modified tree");
    declare("modified_accent_color_icon", "color", "warning-subtle", "Icon background color for a modified tree");
    declare("cache_ttl", "number", "15", "Cache duration in seconds");
  },

  async produce(context) {
    const path = panePath(context);
    const ttl = context.options.getNumber("cache_ttl") ?? 15;
    return context.cache.getOrCompute(`git_${path}`, ttl, () => summarizeGitStatus(readGitStatus(path)));
  },

  getDisplayInfo(content, context) {
    const { options } = context;
    if (content.startsWith(MODIFIED_PREFIX)) {
      return {
        visible: true,
        accent: options.get("modified_accent_color"),
        accentIcon: options.get("modified_accent_color_icon"),
        icon: "",
      };
    }
    return SHOWN;
  },
};
