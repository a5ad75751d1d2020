/**
 * Great-circle distance helpers.
 */

import type { Coordinate } from "@transit-vibes/types";

const EARTH_RADIUS_METERS = 6_371_000;

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/** Haversine distance between two coordinates, in meters. */
export function haversineDistance(a: Coordinate, b: Coordinate): number {
  if (a.lat === b.lat && a.lng === b.lng) return 0;

  const dLat = toRadians(b.lat - a.lat);
  const dLng = toRadians(b.lng - a.lng);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(a.lat)) * Math.cos(toRadians(b.lat)) * Math.sin(dLng / 2) ** 2;

  // Floating point can push h a hair outside [0, 1]
  const clamped = Math.min(Math.max(h, 0), 1);
  return 2 * EARTH_RADIUS_METERS * Math.atan2(Math.sqrt(clamped), Math.sqrt(1 - clamped));
}

export function isValidCoordinate(value: unknown): value is Coordinate {
  if (typeof value !== "object" || value === null) return false;
  if (!("lat" in value) || !("lng" in value)) return false;
  const { lat, lng } = value;
  return (
    typeof lat === "number" &&
    typeof lng === "number" &&
    Number.isFinite(lat) &&
    Number.isFinite(lng) &&
    lat >= -90 &&
    lat <= 90 &&
    lng >= -180 &&
    lng <= 180
  );
}
