/**
 * Hybrid retriever: nearest-neighbour search over POI embeddings,
 * expanded through the knowledge graph and merged into one ranked,
 * deduplicated candidate list.
 *
 * Pipeline per call:
 * 1. Encode the query text
 * 2. Fetch ceil(oversampleFactor × topK) nearest POIs from the index
 * 3. Expand each hit through the graph (stops/routes become supporting
 *    context, nearby POIs become candidates of their own)
 * 4. Score, deduplicate by node, sort, truncate to topK
 *
 * The index is mandatory: its failure fails the call. The graph is an
 * enrichment: its failure degrades the call to semantic-only ranking.
 */

import {
  nodeKey,
  refOf,
  type Neighbor,
  type PoiNode,
  type RankedCandidate,
  type RetrievalConfig,
  type RetrievalOptions,
  type RetrievalResult,
  type SupportingNode,
} from "@transit-vibes/types";
import { getDefaultRetrievalConfig } from "../config/retrieval-config.js";
import type {
  EmbeddingIndex,
  EmbeddingIndexView,
  SimilarityHit,
} from "../embedding/embedding-index.js";
import type { QueryEncoder } from "../encoder/query-encoder.js";
import {
  EncoderUnavailableError,
  IndexUnavailableError,
  InvalidInputError,
  NotFoundError,
  RetrievalCancelledError,
} from "../errors/index.js";
import type { GraphView, KnowledgeGraphStore } from "../graph/graph-store.js";
import { callExternal, throwIfAborted } from "../resilience/index.js";
import { hashQuery } from "./query-hash.js";
import {
  combineScores,
  compareCandidates,
  graphScoreFromWeight,
  semanticScoreFromSimilarity,
} from "./scoring.js";

export interface HybridRetrieverDeps {
  encoder: QueryEncoder;
  index: EmbeddingIndex;
  graph: KnowledgeGraphStore;
  /** Defaults and timeouts; built-in defaults when omitted */
  config?: RetrievalConfig;
}

interface ResolvedOptions {
  topK: number;
  maxHops: number;
  relationshipKinds: readonly string[];
  alpha: number;
  oversampleFactor: number;
}

/** A semantic hit resolved to its POI node */
interface PoiHit {
  node: PoiNode;
  semanticScore: number;
  /** Not in the graph snapshot; `node` is a stand-in built from the id */
  detached: boolean;
}

interface ResolvedHits {
  hits: PoiHit[];
  /** The graph failed while looking nodes up */
  lookupFailed: boolean;
}

interface ExpansionOutcome {
  /** Neighbours per hit, aligned with the hits array */
  neighbors: Neighbor[][];
  degraded: boolean;
  expansions: number;
}

/** Stand-in for a POI the index returned but the graph does not hold */
function detachedPoi(nodeId: string): PoiNode {
  return {
    kind: "poi",
    id: nodeId,
    name: nodeId,
    location: { lat: 0, lng: 0 },
    tags: [],
    description: "",
  };
}

function toSupporting(neighbor: Neighbor): SupportingNode {
  return {
    ref: refOf(neighbor.node),
    name: neighbor.node.name,
    cumulativeWeight: neighbor.cumulativeWeight,
    hops: neighbor.hops,
  };
}

export class HybridRetriever {
  private readonly config: RetrievalConfig;

  constructor(private readonly deps: HybridRetrieverDeps) {
    this.config = deps.config ?? getDefaultRetrievalConfig();
  }

  getConfig(): RetrievalConfig {
    return this.config;
  }

  /**
   * Rank POIs for a free-text query.
   *
   * @throws InvalidInputError - empty query or out-of-range option
   * @throws IndexUnavailableError - the embedding index could not answer
   * @throws RetrievalCancelledError - `signal` aborted; no partial result
   */
  async retrieve(
    queryText: string,
    options: RetrievalOptions = {},
    signal?: AbortSignal,
  ): Promise<RetrievalResult> {
    const start = Date.now();
    if (typeof queryText !== "string" || queryText.trim().length === 0) {
      throw new InvalidInputError("query text must be a non-empty string");
    }
    const opts = this.resolveOptions(options);
    const queryHash = hashQuery(queryText);
    // Every read of this call goes through the same pair of snapshots
    const index = this.deps.index.view();
    const graph = this.deps.graph.view();
    const snapshot = { indexVersion: index.version(), graphVersion: graph.version() };
    throwIfAborted(signal);

    const vector = await this.encode(queryText, queryHash, signal);
    const semanticTopN = Math.max(opts.topK, Math.ceil(opts.oversampleFactor * opts.topK));
    const rawHits = await this.searchIndex(index, vector, semanticTopN, queryHash, signal);
    const { hits, lookupFailed } = this.resolveHits(graph, rawHits, queryHash);

    const expansion = lookupFailed
      ? this.degradedExpansion(hits, 0, queryHash)
      : await this.expandHits(graph, hits, opts, queryHash, signal);
    throwIfAborted(signal);

    const candidates = this.rank(hits, expansion, opts.alpha).slice(0, opts.topK);
    const elapsedMs = Date.now() - start;

    console.log(
      `[retrieval] query ${queryHash}: ${rawHits.length} semantic hits, ` +
        `${candidates.length} candidates in ${elapsedMs}ms` +
        (expansion.degraded ? " (degraded: graph-unavailable)" : ""),
    );

    return {
      candidates,
      metadata: {
        queryHash,
        degraded: expansion.degraded,
        degradationReasons: expansion.degraded ? ["graph-unavailable"] : [],
        semanticHits: rawHits.length,
        graphExpansions: expansion.expansions,
        elapsedMs,
        snapshot,
      },
    };
  }

  private resolveOptions(options: RetrievalOptions): ResolvedOptions {
    const topK = options.topK ?? this.config.topK;
    const maxHops = options.maxHops ?? this.config.maxHops;
    const relationshipKinds = options.relationshipKinds ?? this.config.relationshipKinds;
    const alpha = options.alpha ?? this.config.alpha;
    const oversampleFactor = options.oversampleFactor ?? this.config.oversampleFactor;

    if (!Number.isInteger(topK) || topK <= 0) {
      throw new InvalidInputError(`topK must be a positive integer, got ${topK}`);
    }
    if (!Number.isInteger(maxHops) || maxHops < 0) {
      throw new InvalidInputError(`maxHops must be a non-negative integer, got ${maxHops}`);
    }
    if (!(alpha >= 0 && alpha <= 1)) {
      throw new InvalidInputError(`alpha must be within [0, 1], got ${alpha}`);
    }
    if (!Number.isFinite(oversampleFactor) || oversampleFactor < 1) {
      throw new InvalidInputError(`oversampleFactor must be >= 1, got ${oversampleFactor}`);
    }
    return { topK, maxHops, relationshipKinds, alpha, oversampleFactor };
  }

  private async encode(text: string, queryHash: string, signal?: AbortSignal): Promise<number[]> {
    try {
      return await callExternal((sig) => this.deps.encoder.encode(text, sig), {
        dependency: "encoder",
        timeoutMs: this.config.timeouts.encoderMs,
        retryBackoffMs: this.config.retryBackoffMs,
        signal,
        queryHash,
      });
    } catch (err) {
      if (
        err instanceof InvalidInputError ||
        err instanceof RetrievalCancelledError ||
        err instanceof EncoderUnavailableError
      ) {
        throw err;
      }
      throw new EncoderUnavailableError("Query encoder unavailable", { cause: err });
    }
  }

  private async searchIndex(
    index: EmbeddingIndexView,
    vector: number[],
    k: number,
    queryHash: string,
    signal?: AbortSignal,
  ): Promise<SimilarityHit[]> {
    try {
      return await callExternal((sig) => index.query(vector, k, sig), {
        dependency: "index",
        timeoutMs: this.config.timeouts.indexMs,
        retryBackoffMs: this.config.retryBackoffMs,
        signal,
        queryHash,
      });
    } catch (err) {
      if (err instanceof RetrievalCancelledError || err instanceof IndexUnavailableError) throw err;
      throw new IndexUnavailableError("Embedding index unavailable", { cause: err });
    }
  }

  /**
   * Map index hits to POI nodes. A hit the graph does not hold stays in
   * the ranking as a detached candidate with no graph context.
   */
  private resolveHits(graph: GraphView, rawHits: SimilarityHit[], queryHash: string): ResolvedHits {
    const hits: PoiHit[] = [];
    let lookupFailed = false;
    for (const hit of rawHits) {
      const semanticScore = semanticScoreFromSimilarity(hit.similarity);
      let node: PoiNode | undefined;
      if (!lookupFailed) {
        try {
          const found = graph.getNode({ kind: "poi", id: hit.nodeId });
          if (found?.kind === "poi") node = found;
        } catch (err) {
          lookupFailed = true;
          const message = err instanceof Error ? err.message : String(err);
          console.warn(`[graph] node lookup failed (query ${queryHash}): ${message}`);
        }
      }
      if (node) {
        hits.push({ node, semanticScore, detached: false });
        continue;
      }
      if (!lookupFailed) {
        console.warn(
          `[retrieval] query ${queryHash}: vector ${hit.nodeId} has no POI node, ranking without context`,
        );
      }
      hits.push({ node: detachedPoi(hit.nodeId), semanticScore, detached: true });
    }
    return { hits, lookupFailed };
  }

  private degradedExpansion(hits: PoiHit[], expansions: number, queryHash: string): ExpansionOutcome {
    console.warn(
      `[retrieval] query ${queryHash}: graph unavailable, ranking on semantic score only`,
    );
    return { neighbors: hits.map((): Neighbor[] => []), degraded: true, expansions };
  }

  private async expandHits(
    graph: GraphView,
    hits: PoiHit[],
    opts: ResolvedOptions,
    queryHash: string,
    signal?: AbortSignal,
  ): Promise<ExpansionOutcome> {
    const empty = hits.map((): Neighbor[] => []);
    if (hits.length === 0 || opts.maxHops === 0 || opts.relationshipKinds.length === 0) {
      return { neighbors: empty, degraded: false, expansions: 0 };
    }

    const settled = await Promise.allSettled(
      hits.map((hit) =>
        callExternal(
          (sig) =>
            graph.neighbors(refOf(hit.node), opts.maxHops, opts.relationshipKinds, sig),
          {
            dependency: "graph",
            timeoutMs: this.config.timeouts.graphMs,
            retryBackoffMs: this.config.retryBackoffMs,
            signal,
            queryHash,
          },
        ),
      ),
    );

    throwIfAborted(signal);
    const neighbors: Neighbor[][] = [];
    let degraded = false;
    let expansions = 0;

    for (let i = 0; i < settled.length; i++) {
      const outcome = settled[i];
      if (!outcome) continue;
      if (outcome.status === "fulfilled") {
        neighbors.push(outcome.value);
        expansions++;
        continue;
      }
      neighbors.push([]);
      const reason: unknown = outcome.reason;
      if (reason instanceof RetrievalCancelledError) throw reason;
      if (reason instanceof NotFoundError) {
        console.warn(`[retrieval] query ${queryHash}: ${hits[i]?.node.id ?? "?"} not in graph, no context`);
        continue;
      }
      degraded = true;
    }

    if (degraded) return this.degradedExpansion(hits, expansions, queryHash);
    return { neighbors, degraded: false, expansions };
  }

  private rank(hits: PoiHit[], expansion: ExpansionOutcome, alpha: number): RankedCandidate[] {
    const semanticById = new Map<string, number>(
      hits.map((h): [string, number] => [h.node.id, h.semanticScore]),
    );
    const best = new Map<string, RankedCandidate>();

    const offer = (candidate: RankedCandidate): void => {
      const key = nodeKey(candidate.node);
      const existing = best.get(key);
      if (!existing || compareCandidates(candidate, existing) < 0) {
        best.set(key, candidate);
      }
    };

    hits.forEach((hit, i) => {
      const reached = expansion.neighbors[i] ?? [];
      const supporting = reached.filter((n) => n.node.kind !== "poi").map(toSupporting);
      const graphScore = supporting.reduce(
        (max, s) => Math.max(max, graphScoreFromWeight(s.cumulativeWeight)),
        0,
      );
      offer({
        node: hit.node,
        semanticScore: hit.semanticScore,
        graphScore,
        combinedScore: combineScores(hit.semanticScore, graphScore, alpha),
        supporting,
        ...(hit.detached ? { detached: true } : {}),
      });

      // Nearby POIs ride on this hit's relevance through graph proximity
      const hitRef = refOf(hit.node);
      for (const neighbor of reached) {
        if (neighbor.node.kind !== "poi") continue;
        const semanticScore = semanticById.get(neighbor.node.id) ?? 0;
        const proximity = graphScoreFromWeight(neighbor.cumulativeWeight);
        offer({
          node: neighbor.node,
          semanticScore,
          graphScore: proximity,
          combinedScore: combineScores(semanticScore, proximity, alpha),
          supporting: [
            {
              ref: hitRef,
              name: hit.node.name,
              cumulativeWeight: neighbor.cumulativeWeight,
              hops: neighbor.hops,
            },
          ],
          via: hitRef,
        });
      }
    });

    return [...best.values()].sort(compareCandidates);
  }
}
