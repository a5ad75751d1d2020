/**
 * Overpass API ingestion module: POI nodes for semantic enrichment.
 */

export {
  buildPoiQuery,
  fetchPoiData,
  DEFAULT_POI_BBOX,
  POI_TAG_FILTERS,
  type OverpassOptions,
} from "./query.js";
export { parsePoiResponse, poiFromElement } from "./parser.js";
export {
  defaultCacheDir,
  queryCacheKey,
  readCachedResponse,
  writeCachedResponse,
  getCachePath,
} from "./cache.js";
