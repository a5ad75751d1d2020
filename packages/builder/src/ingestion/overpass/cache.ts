/**
 * Disk cache for Overpass API responses.
 *
 * Entries are keyed by a hash of the full query text, so a change to the
 * bbox, the tag filters or the timeout is a different entry.
 *
 * Cache lives at ~/.transit-vibes/overpass-cache/.
 */

import { createHash } from "node:crypto";
import { existsSync, mkdirSync, readFileSync, statSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import type { OverpassJson } from "overpass-ts";

/** Default cache directory */
export function defaultCacheDir(): string {
  return join(homedir(), ".transit-vibes", "overpass-cache");
}

/** 16-char hex key, filesystem-safe */
export function queryCacheKey(query: string): string {
  return createHash("sha256").update(query).digest("hex").slice(0, 16);
}

function isOverpassJson(value: unknown): value is OverpassJson {
  return (
    typeof value === "object" &&
    value !== null &&
    "elements" in value &&
    Array.isArray(value.elements)
  );
}

export function getCachePath(query: string, cacheDir?: string): string {
  return join(cacheDir ?? defaultCacheDir(), `${queryCacheKey(query)}.json`);
}

/**
 * Read a cached Overpass response from disk.
 *
 * @returns The response on hit, or null on miss or corruption
 */
export function readCachedResponse(query: string, cacheDir?: string): OverpassJson | null {
  const filepath = getCachePath(query, cacheDir);
  if (!existsSync(filepath)) return null;

  try {
    if (statSync(filepath).size === 0) return null;
    const parsed: unknown = JSON.parse(readFileSync(filepath, "utf-8"));
    return isOverpassJson(parsed) ? parsed : null;
  } catch (err) {
    console.warn(`[overpass] Ignoring unreadable cache entry ${filepath}: ${String(err)}`);
    return null;
  }
}

export function writeCachedResponse(query: string, response: OverpassJson, cacheDir?: string): void {
  const dir = cacheDir ?? defaultCacheDir();
  mkdirSync(dir, { recursive: true });
  writeFileSync(getCachePath(query, dir), JSON.stringify(response));
}
