import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { OverpassJson } from "overpass-ts";
import {
  BulkLoadValidationError,
  HashingQueryEncoder,
  InMemoryEmbeddingIndex,
  InMemoryGraphStore,
} from "@transit-vibes/engine";
import { buildKnowledgeBase, loadKnowledgeBase } from "./pipeline.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

let feedDir: string;

function writeFeed(): void {
  const tables: Record<string, string[]> = {
    "stops.txt": [
      "stop_id,stop_name,stop_lat,stop_lon",
      "HSL:S1,Lasipalatsi,60.170,24.940",
      "HSL:S2,Kansallismuseo,60.172,24.940",
      "HSL:S3,Far Away,60.300,24.940",
    ],
    "routes.txt": ["route_id,route_short_name,route_long_name,route_type", "HSL:R4,4,Munkkiniemi - Katajanokka,0"],
    "trips.txt": ["route_id,trip_id,trip_headsign,direction_id", "HSL:R4,HSL:T1,Katajanokka,0"],
    "stop_times.txt": [
      "trip_id,stop_id,stop_sequence",
      "HSL:T1,HSL:S1,1",
      "HSL:T1,HSL:S2,2",
      "HSL:T1,HSL:S3,3",
    ],
  };
  for (const [file, lines] of Object.entries(tables)) {
    writeFileSync(join(feedDir, file), lines.join("\n") + "\n");
  }
}

function overpass(elements: OverpassJson["elements"]): OverpassJson {
  return {
    version: 0.6,
    generator: "test",
    osm3s: { timestamp_osm_base: "2024-01-01T00:00:00Z", copyright: "test" },
    elements,
  };
}

const POIS = overpass([
  { type: "node", id: 123, lat: 60.1705, lon: 24.94, tags: { name: "Bookish Cafe", amenity: "cafe" } },
  { type: "node", id: 456, lat: 60.19, lon: 24.94, tags: { name: "Old Fort", historic: "fort" } },
  { type: "node", id: 789, lat: 60.171, lon: 24.94, tags: { amenity: "cafe" } },
]);

const encoder = new HashingQueryEncoder({ dimension: 32 });

beforeEach(() => {
  feedDir = mkdtempSync(join(tmpdir(), "kb-pipeline-"));
  writeFeed();
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  rmSync(feedDir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

// ─── buildKnowledgeBase ─────────────────────────────────────────────────────

describe("buildKnowledgeBase", () => {
  it("joins the transit layer, POIs and spatial links into one snapshot", async () => {
    const fetchPois = vi.fn(async () => POIS);
    const { snapshot, stats } = await buildKnowledgeBase({ gtfsDir: feedDir, encoder, fetchPois });

    expect(fetchPois).toHaveBeenCalledOnce();
    expect(stats).toMatchObject({ stops: 2, routes: 1, pois: 2, relationships: 5, embeddings: 2 });
    expect(stats.linking).toEqual({ stopPoiLinks: 2, poiPoiLinks: 0, isolatedPois: 1 });

    expect(snapshot.graph.relationships).toContainEqual({
      kind: "CONNECTS",
      source: { kind: "stop", id: "S1" },
      target: { kind: "stop", id: "S2" },
      weight: 0.222,
    });
    expect(snapshot.graph.relationships).toContainEqual({
      kind: "IS_NEAR",
      source: { kind: "stop", id: "S1" },
      target: { kind: "poi", id: "123" },
      weight: 0.056,
    });
    expect(snapshot.embeddings.map((e) => e.nodeId)).toEqual(["123", "456"]);
    expect(snapshot.embeddings[0]?.vector).toEqual(await encoder.encode("Bookish Cafe (cafe)"));
    expect(snapshot.meta.encoderDimension).toBe(32);
  });

  it("rejects a batch with invalid nodes", async () => {
    const fetchPois = async () =>
      overpass([{ type: "node", id: 1, lat: 95, lon: 24.94, tags: { name: "Nowhere", tourism: "museum" } }]);

    await expect(buildKnowledgeBase({ gtfsDir: feedDir, encoder, fetchPois })).rejects.toBeInstanceOf(
      BulkLoadValidationError,
    );
  });
});

// ─── loadKnowledgeBase ──────────────────────────────────────────────────────

describe("loadKnowledgeBase", () => {
  it("reuses stored vectors when the encoder matches", async () => {
    const { snapshot } = await buildKnowledgeBase({ gtfsDir: feedDir, encoder, fetchPois: async () => POIS });
    const graph = new InMemoryGraphStore();
    const index = new InMemoryEmbeddingIndex();

    const result = await loadKnowledgeBase(snapshot, { graph, index, encoder });

    expect(result.reembedded).toBe(false);
    expect(result.vectors).toBe(2);
    expect(result.graph.nodes).toEqual({ stop: 2, poi: 2, route: 1 });
    expect(graph.hasPoi("123")).toBe(true);
  });

  it("re-embeds descriptions when the encoder dimension changed", async () => {
    const { snapshot } = await buildKnowledgeBase({ gtfsDir: feedDir, encoder, fetchPois: async () => POIS });
    const index = new InMemoryEmbeddingIndex();

    const result = await loadKnowledgeBase(snapshot, {
      graph: new InMemoryGraphStore(),
      index,
      encoder: new HashingQueryEncoder({ dimension: 16 }),
    });

    expect(result.reembedded).toBe(true);
    expect(result.vectors).toBe(2);
    expect(index.dimension).toBe(16);
  });

  it("rejects orphan vectors before touching the graph", async () => {
    const { snapshot } = await buildKnowledgeBase({ gtfsDir: feedDir, encoder, fetchPois: async () => POIS });
    snapshot.embeddings.push({ nodeId: "ghost", vector: new Array<number>(32).fill(0.1) });
    const graph = new InMemoryGraphStore();

    await expect(
      loadKnowledgeBase(snapshot, { graph, index: new InMemoryEmbeddingIndex(), encoder }),
    ).rejects.toBeInstanceOf(BulkLoadValidationError);
    expect(graph.version()).toBe(0);
  });
  it("leaves both stores untouched when re-embedding fails validation", async () => {
    const { snapshot } = await buildKnowledgeBase({ gtfsDir: feedDir, encoder, fetchPois: async () => POIS });
    const graph = new InMemoryGraphStore();
    const index = new InMemoryEmbeddingIndex();
    await loadKnowledgeBase(snapshot, { graph, index, encoder });

    const broken = {
      ...snapshot,
      graph: {
        ...snapshot.graph,
        nodes: snapshot.graph.nodes.map((node) =>
          node.kind === "poi" && node.id === "123" ? { ...node, name: "", description: "" } : node,
        ),
      },
    };

    await expect(
      loadKnowledgeBase(broken, { graph, index, encoder: new HashingQueryEncoder({ dimension: 16 }) }),
    ).rejects.toBeInstanceOf(BulkLoadValidationError);
    expect(graph.version()).toBe(1);
    expect(index.version()).toBe(1);
    expect(index.dimension).toBe(32);
    expect(graph.getNode({ kind: "poi", id: "123" })?.name).toBe("Bookish Cafe");
  });
});
