/**
 * @transit-vibes/engine
 *
 * Hybrid graph-RAG retrieval: embedding index, knowledge graph store,
 * query encoder, hybrid retriever, context assembler and the itinerary
 * pipeline that feeds a narrative generator.
 */

export * from "./errors/index.js";
export * from "./resilience/index.js";
export * from "./geo/index.js";
export * from "./config/index.js";
export * from "./embedding/index.js";
export * from "./encoder/index.js";
export * from "./graph/index.js";
export * from "./retrieval/index.js";
export * from "./context/index.js";
export * from "./narrative/index.js";
export * from "./itinerary/index.js";
