/**
 * GTFS static feed reader.
 *
 * Streams the four tables the knowledge graph needs through csv-parse.
 * Feed-scoped id prefixes (e.g. "HSL:1020201") are stripped so ids are
 * stable across feed releases.
 */

import { createReadStream, existsSync } from "node:fs";
import { join } from "node:path";
import { parse } from "csv-parse";

export interface GtfsStop {
  stopId: string;
  name: string;
  lat: number;
  lng: number;
  code?: string;
}

export interface GtfsRoute {
  routeId: string;
  shortName: string;
  longName: string;
  routeType: string;
}

export interface GtfsTrip {
  tripId: string;
  routeId: string;
  directionId: string;
  headsign: string;
}

export interface GtfsStopTime {
  tripId: string;
  stopId: string;
  stopSequence: number;
}

export interface GtfsFeed {
  stops: GtfsStop[];
  routes: GtfsRoute[];
  trips: GtfsTrip[];
  stopTimes: GtfsStopTime[];
}

type CsvRow = Record<string, string>;

/** Matches an agency prefix such as "HSL:" */
const FEED_PREFIX = /^[A-Za-z]+:/;

export function stripFeedPrefix(id: string): string {
  return id.replace(FEED_PREFIX, "");
}

function toRow(record: unknown): CsvRow {
  const row: CsvRow = {};
  if (typeof record !== "object" || record === null) return row;
  for (const [key, value] of Object.entries(record)) {
    if (typeof value === "string") row[key] = value;
  }
  return row;
}

/**
 * Stream one table, calling `onRow` per record.
 *
 * @returns Number of rows read
 */
export async function readGtfsTable(
  feedDir: string,
  file: string,
  onRow: (row: CsvRow) => void,
): Promise<number> {
  const path = join(feedDir, file);
  if (!existsSync(path)) {
    throw new Error(`GTFS table ${file} not found in ${feedDir}`);
  }
  const parser = createReadStream(path).pipe(
    parse({ columns: true, skip_empty_lines: true, bom: true, trim: true }),
  );
  let count = 0;
  for await (const record of parser) {
    onRow(toRow(record));
    count++;
  }
  return count;
}

/** Parse a stop row; stations, entrances and rows without coordinates are skipped. */
export function parseStop(row: CsvRow): GtfsStop | null {
  const locationType = row["location_type"] ?? "";
  if (locationType !== "" && locationType !== "0") return null;
  const id = row["stop_id"];
  const lat = Number(row["stop_lat"]);
  const lng = Number(row["stop_lon"]);
  if (!id || !Number.isFinite(lat) || !Number.isFinite(lng)) return null;

  const stop: GtfsStop = { stopId: stripFeedPrefix(id), name: row["stop_name"] ?? "", lat, lng };
  if (row["stop_code"]) stop.code = row["stop_code"];
  return stop;
}

export function parseRoute(row: CsvRow): GtfsRoute | null {
  const id = row["route_id"];
  if (!id) return null;
  return {
    routeId: stripFeedPrefix(id),
    shortName: row["route_short_name"] ?? "",
    longName: row["route_long_name"] ?? "",
    routeType: row["route_type"] ?? "",
  };
}

export function parseTrip(row: CsvRow): GtfsTrip | null {
  const tripId = row["trip_id"];
  const routeId = row["route_id"];
  if (!tripId || !routeId) return null;
  return {
    tripId: stripFeedPrefix(tripId),
    routeId: stripFeedPrefix(routeId),
    directionId: row["direction_id"] ?? "",
    headsign: row["trip_headsign"] ?? "",
  };
}

export function parseStopTime(row: CsvRow): GtfsStopTime | null {
  const tripId = row["trip_id"];
  const stopId = row["stop_id"];
  const stopSequence = Number(row["stop_sequence"]);
  if (!tripId || !stopId || !Number.isInteger(stopSequence)) return null;
  return { tripId: stripFeedPrefix(tripId), stopId: stripFeedPrefix(stopId), stopSequence };
}

function collect<T>(parseRow: (row: CsvRow) => T | null, into: T[]): (row: CsvRow) => void {
  return (row) => {
    const parsed = parseRow(row);
    if (parsed) into.push(parsed);
  };
}

/** Read stops, routes, trips and stop_times from an unzipped feed directory. */
export async function loadGtfsFeed(feedDir: string): Promise<GtfsFeed> {
  const start = Date.now();
  const feed: GtfsFeed = { stops: [], routes: [], trips: [], stopTimes: [] };

  await readGtfsTable(feedDir, "stops.txt", collect(parseStop, feed.stops));
  await readGtfsTable(feedDir, "routes.txt", collect(parseRoute, feed.routes));
  await readGtfsTable(feedDir, "trips.txt", collect(parseTrip, feed.trips));
  await readGtfsTable(feedDir, "stop_times.txt", collect(parseStopTime, feed.stopTimes));

  console.log(
    `[gtfs] Loaded ${feed.stops.length.toLocaleString()} stops, ${feed.routes.length} routes, ` +
      `${feed.trips.length.toLocaleString()} trips, ` +
      `${feed.stopTimes.length.toLocaleString()} stop times in ${Date.now() - start}ms`,
  );
  return feed;
}
