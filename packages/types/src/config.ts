/**
 * Engine configuration shapes.
 */

import type { RelationshipKind } from "./knowledge-graph.js";

/** Independent timeouts per external dependency, in milliseconds */
export interface DependencyTimeouts {
  encoderMs: number;
  indexMs: number;
  graphMs: number;
  generatorMs: number;
}

export interface RetrievalConfig {
  topK: number;
  maxHops: number;
  relationshipKinds: RelationshipKind[];
  /** Semantic weight in combinedScore = α·semantic + (1-α)·graph */
  alpha: number;
  oversampleFactor: number;
  maxContextChars: number;
  timeouts: DependencyTimeouts;
  /** Delay before the single retry of a failed external call */
  retryBackoffMs: number;
}

/** A named preset stored under configs/retrieval/profiles/ */
export interface RetrievalProfileInfo {
  name: string;
  description: string;
}
