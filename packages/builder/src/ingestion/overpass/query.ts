/**
 * Overpass API query construction and execution for POI enrichment.
 *
 * Fetches named nodes carrying the tags that describe what a place feels
 * like to visit: tourism, leisure, arts centres, cafes, libraries and
 * historic sites.
 */

import type { BoundingBox } from "@transit-vibes/types";
import { overpassJson } from "overpass-ts";
import type { OverpassJson, OverpassOptions as OverpassTsOptions } from "overpass-ts";
import { readCachedResponse, writeCachedResponse } from "./cache.js";

/** Options for Overpass API requests */
export interface OverpassOptions {
  /** Overpass API endpoint URL (for self-hosted instances) */
  endpoint?: string;
  /** Query timeout in seconds (default: 25) */
  timeout?: number;
  userAgent?: string;
  /** Bypass cache read (still writes to cache) */
  force?: boolean;
  /** Override the cache directory (default: ~/.transit-vibes/overpass-cache/) */
  cacheDir?: string;
  /** Disable caching entirely (no read or write) */
  noCache?: boolean;
}

const DEFAULT_ENDPOINT = "https://overpass-api.de/api/interpreter";
const DEFAULT_TIMEOUT = 25;

/** Central Helsinki */
export const DEFAULT_POI_BBOX: BoundingBox = {
  minLat: 60.15,
  maxLat: 60.2,
  minLng: 24.9,
  maxLng: 24.98,
};

/** Overpass tag filters, one node statement each */
export const POI_TAG_FILTERS: readonly string[] = [
  '["tourism"]',
  '["leisure"]',
  '["amenity"="arts_centre"]',
  '["amenity"~"^(cafe|library)$"]',
  '["historic"]',
];

/**
 * Build an Overpass QL query for POI nodes within a bbox.
 *
 * @param bbox - Bounding box (WGS84)
 * @param timeout - Query timeout in seconds
 */
export function buildPoiQuery(bbox: BoundingBox, timeout: number = DEFAULT_TIMEOUT): string {
  // Overpass bbox format: (south, west, north, east)
  const bboxStr = `${bbox.minLat},${bbox.minLng},${bbox.maxLat},${bbox.maxLng}`;
  const statements = POI_TAG_FILTERS.map((filter) => `  node${filter}["name"](${bboxStr});`);

  return `[out:json][timeout:${timeout}];
(
${statements.join("\n")}
);
out body;`;
}

/** Fetch POI nodes from the Overpass API, through the disk cache. */
export async function fetchPoiData(
  bbox: BoundingBox = DEFAULT_POI_BBOX,
  options?: OverpassOptions,
): Promise<OverpassJson> {
  const query = buildPoiQuery(bbox, options?.timeout ?? DEFAULT_TIMEOUT);
  const useCache = !options?.noCache;

  if (useCache && !options?.force) {
    const cached = readCachedResponse(query, options?.cacheDir);
    if (cached) {
      console.log(`[overpass] Cache hit: ${cached.elements.length} elements`);
      return cached;
    }
  }

  const overpassOpts: Partial<OverpassTsOptions> = {
    endpoint: options?.endpoint ?? DEFAULT_ENDPOINT,
  };
  if (options?.userAgent) {
    overpassOpts.userAgent = options.userAgent;
  }

  const start = Date.now();
  const data = await overpassJson(query, overpassOpts);
  console.log(`[overpass] Fetched ${data.elements.length} elements in ${Date.now() - start}ms`);

  if (useCache) {
    writeCachedResponse(query, data, options?.cacheDir);
  }
  return data;
}
