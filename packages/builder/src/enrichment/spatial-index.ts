/**
 * Grid-based spatial index for proximity queries over located nodes.
 *
 * Uses square grid cells (flat-earth approximation) sized to the search
 * radius, so a radius query only has to look at a cell and its 8
 * neighbours. Exact distances are haversine.
 */

import { haversineDistance } from "@transit-vibes/engine";
import type { Coordinate } from "@transit-vibes/types";

/** Default grid cell size in meters */
const DEFAULT_CELL_SIZE = 400;

/** Meters per degree of latitude (roughly constant) */
const METERS_PER_DEG_LAT = 111_320;

export interface Located {
  location: Coordinate;
}

export interface NearbyMatch<T> {
  item: T;
  distanceMeters: number;
}

export class PointSpatialIndex<T extends Located> {
  /** cell key -> items in that cell */
  private grid = new Map<string, T[]>();
  private readonly cellSize: number;
  private readonly metersPerDegLng: number;

  /**
   * @param items - Items to index
   * @param cellSizeMeters - Should be at least the largest query radius
   */
  constructor(items: readonly T[], cellSizeMeters: number = DEFAULT_CELL_SIZE) {
    this.cellSize = cellSizeMeters;

    // Mid-latitude for lng-to-meters conversion
    let sumLat = 0;
    for (const item of items) sumLat += item.location.lat;
    const midLat = items.length > 0 ? sumLat / items.length : 60;
    this.metersPerDegLng = METERS_PER_DEG_LAT * Math.cos((midLat * Math.PI) / 180);

    for (const item of items) {
      const key = this.cellKey(item.location);
      let list = this.grid.get(key);
      if (!list) {
        list = [];
        this.grid.set(key, list);
      }
      list.push(item);
    }
  }

  /**
   * Items within `maxDistance` meters of `coord`, nearest first.
   * A radius larger than the cell size may miss items.
   */
  within(coord: Coordinate, maxDistance: number): NearbyMatch<T>[] {
    const matches: NearbyMatch<T>[] = [];
    const [cx, cy] = this.cellCoords(coord);

    // Check the cell and its 8 neighbors
    for (let dx = -1; dx <= 1; dx++) {
      for (let dy = -1; dy <= 1; dy++) {
        for (const item of this.grid.get(`${cx + dx},${cy + dy}`) ?? []) {
          const distanceMeters = haversineDistance(coord, item.location);
          if (distanceMeters <= maxDistance) matches.push({ item, distanceMeters });
        }
      }
    }
    return matches.sort((a, b) => a.distanceMeters - b.distanceMeters);
  }

  private cellKey(coord: Coordinate): string {
    const [cx, cy] = this.cellCoords(coord);
    return `${cx},${cy}`;
  }

  private cellCoords(coord: Coordinate): [number, number] {
    const mx = coord.lng * this.metersPerDegLng;
    const my = coord.lat * METERS_PER_DEG_LAT;
    return [Math.floor(mx / this.cellSize), Math.floor(my / this.cellSize)];
  }
}
