import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { OverpassJson } from "overpass-ts";
import { buildPoiQuery, fetchPoiData } from "./query.js";
import { getCachePath, readCachedResponse, writeCachedResponse } from "./cache.js";

vi.mock("overpass-ts", () => ({
  overpassJson: vi.fn(),
}));

import { overpassJson } from "overpass-ts";

const bbox = { minLat: 60.15, maxLat: 60.2, minLng: 24.9, maxLng: 24.98 };

function response(ids: number[]): OverpassJson {
  return {
    version: 0.6,
    generator: "test",
    osm3s: { timestamp_osm_base: "2024-01-01T00:00:00Z", copyright: "test" },
    elements: ids.map((id) => ({ type: "node" as const, id, lat: 60.17, lon: 24.94, tags: { name: `P${id}` } })),
  };
}

describe("buildPoiQuery", () => {
  it("formats bbox as south,west,north,east", () => {
    expect(buildPoiQuery(bbox)).toContain('node["tourism"]["name"](60.15,24.9,60.2,24.98);');
  });

  it("includes every POI tag filter", () => {
    const query = buildPoiQuery(bbox);
    expect(query).toContain('node["leisure"]["name"]');
    expect(query).toContain('node["amenity"="arts_centre"]["name"]');
    expect(query).toContain('node["amenity"~"^(cafe|library)$"]["name"]');
    expect(query).toContain('node["historic"]["name"]');
  });

  it("requests JSON output with the given timeout", () => {
    const query = buildPoiQuery(bbox, 60);
    expect(query.startsWith("[out:json][timeout:60];")).toBe(true);
    expect(query.endsWith("out body;")).toBe(true);
  });
});

describe("fetchPoiData caching", () => {
  let cacheDir: string;
  const mockedOverpassJson = vi.mocked(overpassJson);
  const query = buildPoiQuery(bbox);

  beforeEach(() => {
    cacheDir = mkdtempSync(join(tmpdir(), "overpass-query-test-"));
    mockedOverpassJson.mockReset();
    mockedOverpassJson.mockResolvedValue(response([1, 2]));
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(cacheDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("returns cached response without calling the API", async () => {
    writeCachedResponse(query, response([9]), cacheDir);
    const data = await fetchPoiData(bbox, { cacheDir });
    expect(data.elements.map((e) => e.id)).toEqual([9]);
    expect(mockedOverpassJson).not.toHaveBeenCalled();
  });

  it("calls the API and writes the cache on a miss", async () => {
    const data = await fetchPoiData(bbox, { cacheDir });
    expect(data).toEqual(response([1, 2]));
    expect(mockedOverpassJson).toHaveBeenCalledWith(query, {
      endpoint: "https://overpass-api.de/api/interpreter",
    });
    expect(readCachedResponse(query, cacheDir)).toEqual(response([1, 2]));
  });

  it("force: true skips the cache read but still writes", async () => {
    writeCachedResponse(query, response([9]), cacheDir);
    await fetchPoiData(bbox, { cacheDir, force: true });
    expect(mockedOverpassJson).toHaveBeenCalledOnce();
    expect(readCachedResponse(query, cacheDir)).toEqual(response([1, 2]));
  });

  it("noCache: true disables both read and write", async () => {
    await fetchPoiData(bbox, { cacheDir, noCache: true });
    expect(mockedOverpassJson).toHaveBeenCalledOnce();
    expect(readCachedResponse(query, cacheDir)).toBeNull();
  });

  it("treats a corrupt cache entry as a miss", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    writeFileSync(getCachePath(query, cacheDir), "{ truncated");
    expect(readCachedResponse(query, cacheDir)).toBeNull();
    await fetchPoiData(bbox, { cacheDir });
    expect(mockedOverpassJson).toHaveBeenCalledOnce();
  });
});
