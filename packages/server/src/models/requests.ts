/** Body of POST /api/retrieval/search */
export interface SearchRequest {
  /** Free-text vibe, e.g. "cozy book cafe" */
  query: string;
  topK?: number;
  maxHops?: number;
  /** Subset of IS_NEAR, SERVES, CONNECTS */
  relationshipKinds?: string[];
  /** Semantic weight, 0-1 */
  alpha?: number;
}

export interface PlaceInput {
  name: string;
  lat: number;
  lng: number;
}

/** Body of POST /api/itineraries */
export interface ItineraryRequestBody extends SearchRequest {
  origin?: PlaceInput;
  maxContextChars?: number;
}
