/**
 * API request/response types for the Transit Vibes server.
 *
 * Domain shapes (candidates, results, configs) come from
 * @transit-vibes/types; these are the HTTP envelopes around them.
 */

import type {
  AssembledContext,
  NodeKind,
  Place,
  RetrievalResult,
} from "@transit-vibes/types";

export type {
  AssembledContext,
  Coordinate,
  Place,
  RankedCandidate,
  RetrievalConfig,
  RetrievalProfileInfo,
  RetrievalResult,
  SupportingNode,
} from "@transit-vibes/types";

// ---------------------------------------------------------------------------
// Retrieval
// ---------------------------------------------------------------------------

export interface SearchRequest {
  /** Free-text vibe, e.g. "cozy book cafe" */
  query: string;
  topK?: number;
  maxHops?: number;
  relationshipKinds?: string[];
  alpha?: number;
}

// ---------------------------------------------------------------------------
// Itineraries
// ---------------------------------------------------------------------------

export interface ItineraryRequest extends SearchRequest {
  origin?: Place;
  maxContextChars?: number;
}

export interface ItineraryResponse {
  retrieval: RetrievalResult;
  context: AssembledContext;
  destination: Place | null;
  /** Null when generation failed; see generationError */
  narrative: string | null;
  generationError: string | null;
}

// ---------------------------------------------------------------------------
// Knowledge base
// ---------------------------------------------------------------------------

export interface GraphStats {
  nodes: Record<NodeKind, number>;
  relationships: number;
  version: number;
}

export interface ReloadResponse {
  graph: GraphStats;
  vectors: number;
  indexVersion: number;
  reembedded: boolean;
  builtAt: string;
}

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

export interface HealthResponse {
  status: "ok" | "empty";
  uptime: number;
  profile: string | null;
  snapshot: {
    path: string;
    builtAt: string | null;
    loadedAt: string | null;
  };
  graph: {
    version: number;
    nodes: Record<NodeKind, number>;
    relationships: number;
  };
  index: {
    version: number;
    vectors: number;
    dimension: number | null;
  };
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export interface ErrorResponse {
  message: string;
  /** Per-field messages on 422 */
  details?: Record<string, { message: string; value?: unknown }>;
  /** Bulk load issues on a rejected snapshot */
  issues?: Array<{ path: string; message: string }>;
}
