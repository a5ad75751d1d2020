/** WGS84 point, degrees */
export interface Coordinate {
  lat: number;
  lng: number;
}

/** A named place an itinerary starts from or goes to */
export interface Place extends Coordinate {
  name: string;
}

/**
 * Area the ETL pulls POIs and stops from. Overpass takes it as
 * (south, west, north, east); GTFS stops outside it are dropped.
 */
export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLng: number;
  maxLng: number;
}
