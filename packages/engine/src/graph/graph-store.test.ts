import { describe, it, expect, beforeEach, vi } from "vitest";
import type {
  GraphBatch,
  PoiNode,
  Relationship,
  RelationshipKind,
  RouteNode,
  StopNode,
} from "@transit-vibes/types";
import { BulkLoadValidationError, InvalidInputError, NotFoundError } from "../errors/index.js";
import { InMemoryGraphStore } from "./graph-store.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

// Helsinki city centre (~60.17, 24.94)
const BASE_LAT = 60.17;
const BASE_LNG = 24.94;

function stop(id: string, dLat = 0, dLng = 0): StopNode {
  return { kind: "stop", id, name: `Stop ${id}`, location: { lat: BASE_LAT + dLat, lng: BASE_LNG + dLng } };
}

function poi(id: string, dLat = 0, dLng = 0): PoiNode {
  return {
    kind: "poi",
    id,
    name: `Place ${id}`,
    location: { lat: BASE_LAT + dLat, lng: BASE_LNG + dLng },
    tags: [],
    description: `Place ${id}`,
  };
}

function route(id: string): RouteNode {
  return {
    kind: "route",
    id,
    name: `Line ${id}`,
    location: { lat: BASE_LAT, lng: BASE_LNG },
    shortName: id,
    longName: `Line ${id}`,
    mode: "TRAM",
  };
}

function rel(
  kind: RelationshipKind,
  source: { kind: "stop" | "poi" | "route"; id: string },
  target: { kind: "stop" | "poi" | "route"; id: string },
  weight: number,
): Relationship {
  return { kind, source, target, weight };
}

const ALL_KINDS = ["IS_NEAR", "SERVES", "CONNECTS"];

/**
 * P1 --IS_NEAR 0.1-- S1 --CONNECTS 0.5--> S2 --IS_NEAR 0.2-- P2
 * R4 --SERVES 0.2--> S1, R4 --SERVES 0.2--> S2
 */
function sampleBatch(): GraphBatch {
  return {
    nodes: [stop("S1"), stop("S2", 0.001), poi("P1"), poi("P2", 0.001), route("R4")],
    relationships: [
      rel("IS_NEAR", { kind: "poi", id: "P1" }, { kind: "stop", id: "S1" }, 0.1),
      rel("CONNECTS", { kind: "stop", id: "S1" }, { kind: "stop", id: "S2" }, 0.5),
      rel("IS_NEAR", { kind: "stop", id: "S2" }, { kind: "poi", id: "P2" }, 0.2),
      rel("SERVES", { kind: "route", id: "R4" }, { kind: "stop", id: "S1" }, 0.2),
      rel("SERVES", { kind: "route", id: "R4" }, { kind: "stop", id: "S2" }, 0.2),
    ],
  };
}

async function loadedStore(): Promise<InMemoryGraphStore> {
  const store = new InMemoryGraphStore();
  await store.load(sampleBatch());
  return store;
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

// ─── Loading ────────────────────────────────────────────────────────────────

describe("InMemoryGraphStore.load", () => {
  it("commits a valid batch and reports counts", async () => {
    const store = new InMemoryGraphStore();
    const stats = await store.load(sampleBatch());
    expect(stats).toEqual({ nodes: { stop: 2, poi: 2, route: 1 }, relationships: 5, version: 1 });
    expect(store.getNode({ kind: "poi", id: "P1" })?.name).toBe("Place P1");
    expect(store.hasPoi("P2")).toBe(true);
    expect(store.hasPoi("S1")).toBe(false);
  });

  it("rejects a batch with a dangling relationship and keeps the old snapshot", async () => {
    const store = await loadedStore();
    const bad = sampleBatch();
    bad.relationships.push(rel("IS_NEAR", { kind: "poi", id: "P1" }, { kind: "stop", id: "S9" }, 0.1));

    await expect(store.load(bad)).rejects.toBeInstanceOf(BulkLoadValidationError);
    expect(store.version()).toBe(1);
    expect(store.stats().relationships).toBe(5);
  });
});

// ─── Traversal ──────────────────────────────────────────────────────────────

describe("InMemoryGraphStore.neighbors", () => {
  it("throws NotFoundError for an unknown start node", async () => {
    const store = await loadedStore();
    await expect(store.neighbors({ kind: "poi", id: "nope" }, 2, ALL_KINDS)).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });

  it("rejects a negative hop bound", async () => {
    const store = await loadedStore();
    await expect(store.neighbors({ kind: "poi", id: "P1" }, -1, ALL_KINDS)).rejects.toBeInstanceOf(
      InvalidInputError,
    );
  });

  it("returns nothing for maxHops 0", async () => {
    const store = await loadedStore();
    expect(await store.neighbors({ kind: "poi", id: "P1" }, 0, ALL_KINDS)).toEqual([]);
  });

  it("follows IS_NEAR from either endpoint", async () => {
    const store = await loadedStore();
    const result = await store.neighbors({ kind: "poi", id: "P1" }, 1, ALL_KINDS);
    expect(result.map((n) => [n.node.id, n.cumulativeWeight, n.hops])).toEqual([["S1", 0.1, 1]]);
  });

  it("expands hop by hop, cheapest first, without revisiting the start", async () => {
    const store = await loadedStore();
    const result = await store.neighbors({ kind: "poi", id: "P1" }, 2, ALL_KINDS);
    expect(result.map((n) => n.node.id)).toEqual(["S1", "R4", "S2"]);
    expect(result[1]?.cumulativeWeight).toBeCloseTo(0.3, 10);
    expect(result[2]?.cumulativeWeight).toBeCloseTo(0.6, 10);
    expect(result.every((n) => n.hops <= 2)).toBe(true);
  });

  it("keeps the cheapest path within maxHops and the depth that first reached the node", async () => {
    const store = await loadedStore();
    // CONNECTS reaches S2 in one hop for 0.5; S1 -> R4 -> S2 costs 0.4 in two
    const result = await store.neighbors({ kind: "stop", id: "S1" }, 2, ALL_KINDS);
    const s2 = result.find((n) => n.node.id === "S2");
    expect(s2?.hops).toBe(1);
    expect(s2?.cumulativeWeight).toBeCloseTo(0.4, 10);
  });

  it("ignores a cheaper path that needs more than maxHops", async () => {
    const store = await loadedStore();
    const result = await store.neighbors({ kind: "stop", id: "S1" }, 1, ALL_KINDS);
    expect(result.find((n) => n.node.id === "S2")).toMatchObject({ cumulativeWeight: 0.5, hops: 1 });
  });

  it("carries an improved weight on to the nodes beyond it", async () => {
    const store = await loadedStore();
    // P2 via CONNECTS: 0.5 + 0.2; via R4: 0.2 + 0.2 + 0.2
    const result = await store.neighbors({ kind: "stop", id: "S1" }, 3, ALL_KINDS);
    const p2 = result.find((n) => n.node.id === "P2");
    expect(p2?.hops).toBe(2);
    expect(p2?.cumulativeWeight).toBeCloseTo(0.6, 10);
  });

  it("traverses CONNECTS only in its stored direction", async () => {
    const store = await loadedStore();
    const result = await store.neighbors({ kind: "stop", id: "S2" }, 1, ["CONNECTS"]);
    expect(result).toEqual([]);
  });

  it("reaches a stop's routes through SERVES", async () => {
    const store = await loadedStore();
    const result = await store.neighbors({ kind: "stop", id: "S2" }, 1, ["SERVES"]);
    expect(result.map((n) => n.node.id)).toEqual(["R4"]);
  });

  it("restricts traversal to the requested kinds and ignores unknown ones", async () => {
    const store = await loadedStore();
    const result = await store.neighbors({ kind: "poi", id: "P1" }, 3, ["IS_NEAR", "TELEPORTS"]);
    expect(result.map((n) => n.node.id)).toEqual(["S1"]);
  });

  it("pins a snapshot for every read through a view", async () => {
    const store = await loadedStore();
    const view = store.view();
    await store.load({ nodes: [poi("P1")], relationships: [] });

    expect(view.version()).toBe(1);
    expect(view.getNode({ kind: "stop", id: "S1" })?.name).toBe("Stop S1");
    expect((await view.neighbors({ kind: "poi", id: "P1" }, 1, ALL_KINDS)).map((n) => n.node.id)).toEqual(["S1"]);
    expect(store.version()).toBe(2);
    expect(store.getNode({ kind: "stop", id: "S1" })).toBeUndefined();
  });

  it("serves an in-flight traversal from the snapshot it started on", async () => {
    const store = await loadedStore();
    const pending = store.neighbors({ kind: "poi", id: "P1" }, 1, ALL_KINDS);
    await store.load({ nodes: [poi("P1")], relationships: [] });
    expect((await pending).map((n) => n.node.id)).toEqual(["S1"]);
    expect(await store.neighbors({ kind: "poi", id: "P1" }, 1, ALL_KINDS)).toEqual([]);
  });
});
