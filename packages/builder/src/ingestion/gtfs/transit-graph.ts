/**
 * GTFS feed → transit part of the knowledge graph.
 *
 * - Every platform-level stop becomes a Stop node.
 * - Every route with at least one served stop becomes a Route node,
 *   located at the first stop of its first trip.
 * - SERVES joins a route to each stop any of its trips calls at.
 * - CONNECTS joins consecutive stops of a trip, weighted by distance.
 */

import { haversineDistance } from "@transit-vibes/engine";
import type {
  BoundingBox,
  Relationship,
  RouteNode,
  StopNode,
  TransitMode,
} from "@transit-vibes/types";
import type { GtfsFeed, GtfsStopTime } from "./feed.js";
import { routeTypeToMode } from "./route-types.js";

/** Default SERVES weight: a short walk to the platform */
export const DEFAULT_SERVES_WEIGHT_KM = 0.2;

export interface TransitGraphOptions {
  /** Keep only stops inside this box */
  bounds?: BoundingBox;
  servesWeightKm?: number;
}

interface RouteInfo {
  shortName: string;
  longName: string;
  mode: TransitMode;
}

export interface TransitGraph {
  stops: StopNode[];
  routes: RouteNode[];
  relationships: Relationship[];
}

function inBounds(lat: number, lng: number, bounds: BoundingBox | undefined): boolean {
  if (!bounds) return true;
  return lat >= bounds.minLat && lat <= bounds.maxLat && lng >= bounds.minLng && lng <= bounds.maxLng;
}

/** Distance in kilometres, rounded to the metre */
function distanceKm(a: StopNode, b: StopNode): number {
  return Math.round(haversineDistance(a.location, b.location)) / 1000;
}

function groupByTrip(stopTimes: GtfsStopTime[]): Map<string, GtfsStopTime[]> {
  const byTrip = new Map<string, GtfsStopTime[]>();
  for (const st of stopTimes) {
    let list = byTrip.get(st.tripId);
    if (!list) {
      list = [];
      byTrip.set(st.tripId, list);
    }
    list.push(st);
  }
  for (const list of byTrip.values()) list.sort((a, b) => a.stopSequence - b.stopSequence);
  return byTrip;
}

export function buildTransitGraph(feed: GtfsFeed, options: TransitGraphOptions = {}): TransitGraph {
  const servesWeight = options.servesWeightKm ?? DEFAULT_SERVES_WEIGHT_KM;

  const stops = new Map<string, StopNode>();
  for (const s of feed.stops) {
    if (!inBounds(s.lat, s.lng, options.bounds) || stops.has(s.stopId)) continue;
    const node: StopNode = { kind: "stop", id: s.stopId, name: s.name, location: { lat: s.lat, lng: s.lng } };
    if (s.code) node.code = s.code;
    stops.set(s.stopId, node);
  }

  const routeInfo = new Map<string, RouteInfo>();
  for (const r of feed.routes) {
    routeInfo.set(r.routeId, {
      shortName: r.shortName,
      longName: r.longName,
      mode: routeTypeToMode(r.routeType),
    });
  }

  const routeOfTrip = new Map<string, string>();
  for (const t of feed.trips) routeOfTrip.set(t.tripId, t.routeId);

  const servedStops = new Map<string, Set<string>>();
  const routeAnchor = new Map<string, StopNode>();
  const connects = new Map<string, Relationship>();

  for (const [tripId, calls] of groupByTrip(feed.stopTimes)) {
    const routeId = routeOfTrip.get(tripId);
    if (!routeId || !routeInfo.has(routeId)) continue;

    let served = servedStops.get(routeId);
    if (!served) {
      served = new Set();
      servedStops.set(routeId, served);
    }

    let previous: StopNode | undefined;
    for (const call of calls) {
      const stop = stops.get(call.stopId);
      if (!stop) {
        // Outside the bounds: break the chain rather than bridge the gap
        previous = undefined;
        continue;
      }
      served.add(stop.id);
      if (!routeAnchor.has(routeId)) routeAnchor.set(routeId, stop);

      if (previous && previous.id !== stop.id) {
        const key = `${previous.id}>${stop.id}`;
        if (!connects.has(key)) {
          connects.set(key, {
            kind: "CONNECTS",
            source: { kind: "stop", id: previous.id },
            target: { kind: "stop", id: stop.id },
            weight: distanceKm(previous, stop),
          });
        }
      }
      previous = stop;
    }
  }

  const routes: RouteNode[] = [];
  const relationships: Relationship[] = [];
  for (const [routeId, anchor] of routeAnchor) {
    const info = routeInfo.get(routeId);
    if (!info) continue;
    routes.push({
      kind: "route",
      id: routeId,
      name: info.shortName || info.longName || routeId,
      location: anchor.location,
      shortName: info.shortName,
      longName: info.longName,
      mode: info.mode,
    });
    for (const stopId of [...(servedStops.get(routeId) ?? [])].sort()) {
      relationships.push({
        kind: "SERVES",
        source: { kind: "route", id: routeId },
        target: { kind: "stop", id: stopId },
        weight: servesWeight,
      });
    }
  }
  relationships.push(...connects.values());

  console.log(
    `[gtfs] Transit graph: ${stops.size.toLocaleString()} stops, ${routes.length} routes, ` +
      `${relationships.length.toLocaleString()} relationships`,
  );
  return { stops: [...stops.values()], routes, relationships };
}
