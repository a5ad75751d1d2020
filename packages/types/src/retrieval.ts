/**
 * Retrieval results - the output of the hybrid retriever and the
 * itinerary pipeline built on top of it.
 */

import type { KnowledgeNode, NodeRef, RelationshipKind } from "./knowledge-graph.js";

/** A node that supports a ranked candidate (reached through the graph) */
export interface SupportingNode {
  ref: NodeRef;
  name: string;
  cumulativeWeight: number;
  hops: number;
}

/** One entry of a ranked result (all scores 0-1, higher is better) */
export interface RankedCandidate {
  node: KnowledgeNode;
  semanticScore: number;
  graphScore: number;
  combinedScore: number;
  /** Graph context gathered for this candidate, cheapest first */
  supporting: SupportingNode[];
  /** POI whose semantic hit surfaced this candidate */
  via?: NodeRef;
  /**
   * Set when the index knows the POI but the graph snapshot does not;
   * `node` then carries only the id.
   */
  detached?: boolean;
}

/** Why a result was produced with a subsystem missing */
export type DegradationReason = "graph-unavailable";

export interface RetrievalMetadata {
  /** Truncated sha256 of the query text; raw text is never exposed */
  queryHash: string;
  degraded: boolean;
  degradationReasons: DegradationReason[];
  /** Number of nearest-neighbour hits fetched from the index */
  semanticHits: number;
  /** Number of successful graph expansions */
  graphExpansions: number;
  elapsedMs: number;
  snapshot: {
    indexVersion: number;
    graphVersion: number;
  };
}

export interface RetrievalResult {
  candidates: RankedCandidate[];
  metadata: RetrievalMetadata;
}

/** Per-call retrieval knobs; anything omitted comes from configuration */
export interface RetrievalOptions {
  topK?: number;
  maxHops?: number;
  /** Kinds to traverse; values that are not relationship kinds are ignored */
  relationshipKinds?: readonly (RelationshipKind | string)[];
  /** Weight of the semantic score in the combined score (0-1) */
  alpha?: number;
  /** Semantic oversampling: fetch ceil(factor × topK) nearest POIs */
  oversampleFactor?: number;
}

/** Bounded textual context for narrative generation */
export interface AssembledContext {
  text: string;
  includedCount: number;
  droppedCount: number;
}
