/**
 * Widget cache store
 *
 * Key/value strings with a caller-supplied TTL. The file store keeps one
 * JSON file per key and replaces it atomically (write to a temp file, then
 * rename), so concurrent renders see either the old or the new value.
 */

import { existsSync, mkdirSync, readFileSync, readdirSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { errorMessage, logger } from "../utils/logger";

export type Clock = () => number;

export interface CacheEntry {
  key: string;
  value: string;
  writtenAt: number;
}

export interface CacheStore {
  /** Value when an entry exists and is younger than `ttlSeconds`. */
  get(key: string, ttlSeconds: number): string | undefined;
  /** Overwrite unconditionally. */
  set(key: string, value: string): void;
  /**
   * Return the cached value on a hit. On a miss run `compute`, store a
   * non-empty result, and return it.
   */
  getOrCompute(key: string, ttlSeconds: number, compute: () => string | Promise<string>): Promise<string>;
  invalidate(key: string): void;
  clear(): void;
  /** Age in whole seconds, or -1 when there is no entry. */
  age(key: string): number;
}

const CacheEntrySchema = z.object({
  key: z.string(),
  value: z.string(),
  writtenAt: z.number(),
});

/**
 * Map a key onto a safe file name.
 */
export function sanitizeKey(key: string): string {
  return key.replace(/[^A-Za-z0-9._-]/g, "_");
}

function isFresh(entry: CacheEntry, ttlSeconds: number, now: number): boolean {
  return ttlSeconds > 0 && now - entry.writtenAt < ttlSeconds * 1000;
}

/**
 * Shared getOrCompute/age logic over a raw entry lookup.
 */
abstract class BaseCacheStore implements CacheStore {
  constructor(protected readonly now: Clock = Date.now) {}

  protected abstract readEntry(key: string): CacheEntry | undefined;
  protected abstract writeEntry(entry: CacheEntry): void;
  abstract invalidate(key: string): void;
  abstract clear(): void;

  get(key: string, ttlSeconds: number): string | undefined {
    const entry = this.readEntry(key);
    if (!entry || !isFresh(entry, ttlSeconds, this.now())) {
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: string): void {
    this.writeEntry({ key, value, writtenAt: this.now() });
  }

  async getOrCompute(
    key: string,
    ttlSeconds: number,
    compute: () => string | Promise<string>
  ): Promise<string> {
    const cached = this.get(key, ttlSeconds);
    if (cached !== undefined) {
      return cached;
    }

    const result = await compute();
    if (result !== "") {
      this.set(key, result);
    }
    return result;
  }

  age(key: string): number {
    const entry = this.readEntry(key);
    if (!entry) return -1;
    return Math.max(0, Math.floor((this.now() - entry.writtenAt) / 1000));
  }
}

export class MemoryCacheStore extends BaseCacheStore {
  private readonly entries = new Map<string, CacheEntry>();

  protected readEntry(key: string): CacheEntry | undefined {
    return this.entries.get(key);
  }

  protected writeEntry(entry: CacheEntry): void {
    this.entries.set(entry.key, entry);
  }

  invalidate(key: string): void {
    this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }
}

export class FileCacheStore extends BaseCacheStore {
  private initialized = false;
  private writeCounter = 0;

  constructor(
    readonly directory: string,
    now?: Clock
  ) {
    super(now);
  }

  protected readEntry(key: string): CacheEntry | undefined {
    const path = this.entryPath(key);
    if (!existsSync(path)) return undefined;

    try {
      const parsed = CacheEntrySchema.safeParse(JSON.parse(readFileSync(path, "utf-8")));
      if (!parsed.success) {
        logger.warn("cache", `Ignoring malformed cache entry: ${path}`);
        return undefined;
      }
      return parsed.data;
    } catch (error) {
      logger.warn("cache", `Failed to read cache entry ${key}: ${errorMessage(error)}`);
      return undefined;
    }
  }

  protected writeEntry(entry: CacheEntry): void {
    const path = this.entryPath(entry.key);
    const tempPath = `${path}.${process.pid}.${this.writeCounter++}.tmp`;
    try {
      this.ensureDirectory();
      writeFileSync(tempPath, JSON.stringify(entry), "utf-8");
      renameSync(tempPath, path);
    } catch (error) {
      logger.warn("cache", `Failed to write cache entry ${entry.key}: ${errorMessage(error)}`);
      if (existsSync(tempPath)) rmSync(tempPath, { force: true });
    }
  }

  invalidate(key: string): void {
    rmSync(this.entryPath(key), { force: true });
  }

  clear(): void {
    if (!existsSync(this.directory)) return;
    for (const file of readdirSync(this.directory)) {
      if (file.endsWith(".cache")) {
        rmSync(join(this.directory, file), { force: true });
      }
    }
  }

  private entryPath(key: string): string {
    return join(this.directory, `${sanitizeKey(key)}.cache`);
  }

  private ensureDirectory(): void {
    if (this.initialized) return;
    if (!existsSync(this.directory)) {
      mkdirSync(this.directory, { recursive: true });
    }
    this.initialized = true;
  }
}
