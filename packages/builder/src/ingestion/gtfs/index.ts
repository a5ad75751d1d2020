export {
  loadGtfsFeed,
  readGtfsTable,
  parseStop,
  parseRoute,
  parseTrip,
  parseStopTime,
  stripFeedPrefix,
  type GtfsFeed,
  type GtfsStop,
  type GtfsRoute,
  type GtfsTrip,
  type GtfsStopTime,
} from "./feed.js";
export { routeTypeToMode } from "./route-types.js";
export {
  buildTransitGraph,
  DEFAULT_SERVES_WEIGHT_KM,
  type TransitGraph,
  type TransitGraphOptions,
} from "./transit-graph.js";
