// Base
export { BaseClient, ApiError, type ClientConfig, type RequestParams } from "./baseClient.js";

// Domain clients
export { RetrievalClient } from "./retrievalClient.js";
export { ItineraryClient } from "./itineraryClient.js";
export { KnowledgeBaseClient } from "./knowledgeBaseClient.js";
export { ConfigClient } from "./configClient.js";
export { HealthClient } from "./healthClient.js";

// Types
export type {
  // Domain
  AssembledContext,
  Coordinate,
  Place,
  RankedCandidate,
  RetrievalConfig,
  RetrievalProfileInfo,
  RetrievalResult,
  SupportingNode,
  // Retrieval
  SearchRequest,
  // Itineraries
  ItineraryRequest,
  ItineraryResponse,
  // Knowledge base
  GraphStats,
  ReloadResponse,
  // Health
  HealthResponse,
  // Errors
  ErrorResponse,
} from "./types.js";
