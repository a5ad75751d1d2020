/**
 * GTFS route_type → transit mode.
 *
 * Covers the basic GTFS codes (0-12) and the extended Hierarchical
 * Vehicle Type ranges. Anything unrecognised is OTHER.
 */

import type { TransitMode } from "@transit-vibes/types";

export function routeTypeToMode(routeType: string | number | undefined): TransitMode {
  if (routeType === undefined || routeType === "") return "OTHER";
  const n = Number(routeType);
  if (!Number.isInteger(n)) return "OTHER";

  // Basic GTFS
  switch (n) {
    case 0:
      return "TRAM";
    case 1:
      return "METRO";
    case 2:
    case 12:
      return "TRAIN";
    case 3:
    case 11:
      return "BUS";
    case 4:
      return "FERRY";
  }

  // Extended route types
  if (n >= 100 && n <= 117) return "TRAIN";
  if (n >= 200 && n <= 209) return "BUS";
  if (n >= 400 && n <= 405) return "METRO";
  if (n >= 700 && n <= 716) return "BUS";
  if (n === 800) return "BUS";
  if (n >= 900 && n <= 906) return "TRAM";
  if (n === 1000 || n === 1200) return "FERRY";
  return "OTHER";
}
