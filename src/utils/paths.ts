import { homedir } from "node:os";
import { join } from "node:path";

/**
 * Directory for the on-disk widget cache and logs.
 * STATUSKIT_CACHE_DIR wins, then $XDG_CACHE_HOME, then ~/.cache.
 */
export function getCacheDir(): string {
  if (process.env.STATUSKIT_CACHE_DIR) {
    return process.env.STATUSKIT_CACHE_DIR;
  }
  const base = process.env.XDG_CACHE_HOME || join(homedir(), ".cache");
  return join(base, "tmux-statuskit");
}

export function getLogPath(): string {
  return join(getCacheDir(), "logs", "statuskit.log");
}
