/**
 * IS_NEAR linking: joins stops to POIs, and POIs to each other, when
 * they lie within walking distance.
 */

import { DEFAULT_MAX_NEAR_DISTANCE_METERS } from "@transit-vibes/engine";
import type { PoiNode, Relationship, StopNode } from "@transit-vibes/types";
import { PointSpatialIndex } from "./spatial-index.js";

export interface NearLinkOptions {
  /** Maximum distance in meters (default: 400) */
  maxDistanceMeters?: number;
  /** Also link POI pairs (default: true) */
  linkPoiPairs?: boolean;
}

export interface NearLinkStats {
  stopPoiLinks: number;
  poiPoiLinks: number;
  /** POIs with no stop within range */
  isolatedPois: number;
}

/** Distance in kilometres, rounded to the metre */
function toKm(meters: number): number {
  return Math.round(meters) / 1000;
}

export function linkNearby(
  stops: readonly StopNode[],
  pois: readonly PoiNode[],
  options: NearLinkOptions = {},
): { relationships: Relationship[]; stats: NearLinkStats } {
  const maxDistance = options.maxDistanceMeters ?? DEFAULT_MAX_NEAR_DISTANCE_METERS;
  const linkPoiPairs = options.linkPoiPairs ?? true;

  const stopIndex = new PointSpatialIndex(stops, maxDistance);
  const poiIndex = new PointSpatialIndex(pois, maxDistance);
  const relationships: Relationship[] = [];
  const stats: NearLinkStats = { stopPoiLinks: 0, poiPoiLinks: 0, isolatedPois: 0 };

  for (const poi of pois) {
    const nearStops = stopIndex.within(poi.location, maxDistance);
    if (nearStops.length === 0) stats.isolatedPois++;
    for (const { item: stop, distanceMeters } of nearStops) {
      relationships.push({
        kind: "IS_NEAR",
        source: { kind: "stop", id: stop.id },
        target: { kind: "poi", id: poi.id },
        weight: toKm(distanceMeters),
      });
      stats.stopPoiLinks++;
    }

    if (!linkPoiPairs) continue;
    for (const { item: other, distanceMeters } of poiIndex.within(poi.location, maxDistance)) {
      // One edge per unordered pair; traversal is symmetric anyway
      if (other.id <= poi.id) continue;
      relationships.push({
        kind: "IS_NEAR",
        source: { kind: "poi", id: poi.id },
        target: { kind: "poi", id: other.id },
        weight: toKm(distanceMeters),
      });
      stats.poiPoiLinks++;
    }
  }

  console.log(
    `[link] ${stats.stopPoiLinks.toLocaleString()} stop-POI and ${stats.poiPoiLinks.toLocaleString()} POI-POI ` +
      `IS_NEAR links within ${maxDistance}m (${stats.isolatedPois} POIs without a stop)`,
  );
  return { relationships, stats };
}
