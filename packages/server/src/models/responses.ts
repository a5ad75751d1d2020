import type { GraphStats, ItineraryResult } from "@transit-vibes/engine";
import type { NodeKind, RetrievalProfileInfo } from "@transit-vibes/types";

export interface HealthResponse {
  /** "empty" until a snapshot has been loaded */
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

export interface ReloadResponse {
  graph: GraphStats;
  vectors: number;
  indexVersion: number;
  reembedded: boolean;
  builtAt: string;
}

export type ProfileListItem = RetrievalProfileInfo;

export type ItineraryResponse = ItineraryResult;
