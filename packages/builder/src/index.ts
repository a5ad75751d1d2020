/**
 * @transit-vibes/builder
 *
 * ETL side of the knowledge base.
 *
 * Pipeline:
 * 1. Read a GTFS static feed -> stops, routes, SERVES and CONNECTS edges
 * 2. Fetch POIs from Overpass -> POI nodes with descriptions
 * 3. Link stops and POIs within walking distance -> IS_NEAR edges
 * 4. Embed POI descriptions and write a SQLite snapshot
 *
 * The server reads the snapshot back with loadKnowledgeBase().
 */

// GTFS
export {
  loadGtfsFeed,
  readGtfsTable,
  parseStop,
  parseRoute,
  parseTrip,
  parseStopTime,
  stripFeedPrefix,
  routeTypeToMode,
  buildTransitGraph,
  DEFAULT_SERVES_WEIGHT_KM,
  type GtfsFeed,
  type GtfsStop,
  type GtfsRoute,
  type GtfsTrip,
  type GtfsStopTime,
  type TransitGraph,
  type TransitGraphOptions,
} from "./ingestion/gtfs/index.js";

// Overpass API
export {
  buildPoiQuery,
  fetchPoiData,
  parsePoiResponse,
  poiFromElement,
  DEFAULT_POI_BBOX,
  POI_TAG_FILTERS,
  type OverpassOptions,
} from "./ingestion/overpass/index.js";

// Enrichment
export {
  PointSpatialIndex,
  linkNearby,
  categoryOf,
  describePoi,
  tagsOf,
  imageForCategory,
  type NearLinkOptions,
  type NearLinkStats,
  type NearbyMatch,
  type OsmTags,
} from "./enrichment/index.js";

// Snapshot persistence
export {
  readSnapshot,
  writeSnapshot,
  type KnowledgeBaseSnapshot,
  type SnapshotMeta,
} from "./snapshot/index.js";

// Build + load
export {
  buildKnowledgeBase,
  loadKnowledgeBase,
  type BuildKnowledgeBaseOptions,
  type KnowledgeBaseBuildResult,
  type KnowledgeBaseBuildStats,
  type KnowledgeBaseLoadResult,
  type LiveStores,
  type PoiFetcher,
} from "./knowledge-base/index.js";
