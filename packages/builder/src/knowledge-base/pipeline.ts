/**
 * Knowledge base build and load.
 *
 * Build: GTFS feed -> stops, routes, SERVES/CONNECTS edges; Overpass ->
 * POIs; grid linking -> IS_NEAR edges; encoder -> POI embeddings. The
 * result is validated as a whole before it is returned.
 *
 * Load: every vector is validated (and re-embedded where needed) before
 * either live store is swapped, then the graph and the index commit.
 */

import {
  BulkLoadValidationError,
  EmbeddingIngestor,
  validateGraphBatch,
  type EmbeddingIndex,
  type GraphStats,
  type KnowledgeGraphStore,
  type QueryEncoder,
  type ValidationIssue,
} from "@transit-vibes/engine";
import type { BoundingBox, EmbeddingRecord, GraphBatch, PoiNode } from "@transit-vibes/types";
import type { OverpassJson } from "overpass-ts";
import { linkNearby, type NearLinkStats } from "../enrichment/index.js";
import { buildTransitGraph, loadGtfsFeed } from "../ingestion/gtfs/index.js";
import { DEFAULT_POI_BBOX, fetchPoiData, parsePoiResponse, type OverpassOptions } from "../ingestion/overpass/index.js";
import type { KnowledgeBaseSnapshot } from "../snapshot/index.js";

export type PoiFetcher = (bbox: BoundingBox, options?: OverpassOptions) => Promise<OverpassJson>;

export interface BuildKnowledgeBaseOptions {
  /** Directory holding stops.txt, routes.txt, trips.txt and stop_times.txt */
  gtfsDir: string;
  /** Area to build for (default: central Helsinki) */
  bbox?: BoundingBox;
  /** Encoder for POI descriptions */
  encoder: QueryEncoder;
  overpass?: OverpassOptions;
  /** Maximum IS_NEAR distance in meters (default: 400) */
  maxNearDistanceMeters?: number;
  servesWeightKm?: number;
  /** Override the POI source (default: Overpass API) */
  fetchPois?: PoiFetcher;
}

export interface KnowledgeBaseBuildStats {
  stops: number;
  routes: number;
  pois: number;
  relationships: number;
  embeddings: number;
  linking: NearLinkStats;
  durationMs: number;
}

export interface KnowledgeBaseBuildResult {
  snapshot: KnowledgeBaseSnapshot;
  stats: KnowledgeBaseBuildStats;
}

export async function buildKnowledgeBase(
  options: BuildKnowledgeBaseOptions,
): Promise<KnowledgeBaseBuildResult> {
  const start = Date.now();
  const bbox = options.bbox ?? DEFAULT_POI_BBOX;

  // 1. Transit layer
  const feed = await loadGtfsFeed(options.gtfsDir);
  const transit = buildTransitGraph(feed, { bounds: bbox, servesWeightKm: options.servesWeightKm });

  // 2. POIs
  const fetchPois = options.fetchPois ?? fetchPoiData;
  const pois = parsePoiResponse(await fetchPois(bbox, options.overpass));

  // 3. Spatial links
  const linked = linkNearby(transit.stops, pois, { maxDistanceMeters: options.maxNearDistanceMeters });

  const graph: GraphBatch = {
    nodes: [...transit.stops, ...pois, ...transit.routes],
    relationships: [...transit.relationships, ...linked.relationships],
  };
  const issues = validateGraphBatch(graph, { maxNearDistanceMeters: options.maxNearDistanceMeters });
  if (issues.length > 0) throw new BulkLoadValidationError(issues);

  // 4. Embeddings
  const embeddings: EmbeddingRecord[] = [];
  for (const poi of pois) {
    embeddings.push({ nodeId: poi.id, vector: await options.encoder.encode(poi.description) });
  }

  const stats: KnowledgeBaseBuildStats = {
    stops: transit.stops.length,
    routes: transit.routes.length,
    pois: pois.length,
    relationships: graph.relationships.length,
    embeddings: embeddings.length,
    linking: linked.stats,
    durationMs: Date.now() - start,
  };
  console.log(
    `[snapshot] Knowledge base built in ${stats.durationMs}ms: ${stats.stops} stops, ` +
      `${stats.routes} routes, ${stats.pois} POIs, ${stats.relationships} relationships`,
  );

  return {
    snapshot: {
      graph,
      embeddings,
      meta: {
        builtAt: new Date().toISOString(),
        encoderDimension: embeddings.length > 0 ? options.encoder.dimension : null,
      },
    },
    stats,
  };
}

export interface LiveStores {
  graph: KnowledgeGraphStore;
  index: EmbeddingIndex;
  /** Encoder the server queries with */
  encoder: QueryEncoder;
}

export interface KnowledgeBaseLoadResult {
  graph: GraphStats;
  vectors: number;
  indexVersion: number;
  /** True when stored vectors did not fit the encoder and were recomputed */
  reembedded: boolean;
}

function poiIdsOf(batch: GraphBatch): Set<string> {
  const ids = new Set<string>();
  for (const node of batch.nodes) if (node.kind === "poi") ids.add(node.id);
  return ids;
}

/**
 * Load a snapshot into live stores.
 *
 * Stored vectors are used as-is when their dimension matches the live
 * encoder; otherwise every POI description is re-embedded.
 */
export async function loadKnowledgeBase(
  snapshot: KnowledgeBaseSnapshot,
  stores: LiveStores,
): Promise<KnowledgeBaseLoadResult> {
  const poiIds = poiIdsOf(snapshot.graph);
  const issues: ValidationIssue[] = [];
  const seen = new Set<string>();
  snapshot.embeddings.forEach((record, i) => {
    const path = `embeddings[${i}]`;
    if (!poiIds.has(record.nodeId)) {
      issues.push({ path, message: `no POI node with id "${record.nodeId}"` });
    }
    if (seen.has(record.nodeId)) {
      issues.push({ path, message: `duplicate embedding for "${record.nodeId}"` });
    }
    if (!record.vector.every((x) => Number.isFinite(x))) {
      issues.push({ path, message: "vector contains a non-finite component" });
    }
    seen.add(record.nodeId);
  });
  if (issues.length > 0) throw new BulkLoadValidationError(issues);

  const reuse =
    snapshot.meta.encoderDimension === stores.encoder.dimension &&
    snapshot.embeddings.every((r) => r.vector.length === stores.encoder.dimension);

  let embeddings: EmbeddingRecord[] = snapshot.embeddings;
  if (!reuse) {
    console.warn(
      `[snapshot] Stored vectors (dimension ${String(snapshot.meta.encoderDimension)}) do not fit the ` +
        `encoder (dimension ${stores.encoder.dimension}); re-embedding POI descriptions`,
    );
    const descriptions = snapshot.graph.nodes
      .filter((node): node is PoiNode => node.kind === "poi")
      .map((poi) => ({ nodeId: poi.id, description: poi.description || poi.name }));
    embeddings = await new EmbeddingIngestor(stores.encoder, stores.index).embed(descriptions, (id) =>
      poiIds.has(id),
    );
  }

  const graph = await stores.graph.load(snapshot.graph);
  await stores.index.replaceAll(embeddings);

  return {
    graph,
    vectors: stores.index.size(),
    indexVersion: stores.index.version(),
    reembedded: !reuse,
  };
}
