/**
 * @transit-vibes/types
 *
 * Shared domain types for the hybrid graph + vector retrieval engine.
 *
 * - Knowledge graph: stops, POIs, routes and their relationships
 * - Retrieval: ranked candidates, result metadata, assembled context
 * - Config: tunable retrieval parameters
 */

export * from "./knowledge-graph.js";
export * from "./retrieval.js";
export * from "./config.js";
export * from "./geo.js";
