export {
  InMemoryEmbeddingIndex,
  compareHits,
  type EmbeddingIndex,
  type EmbeddingIndexView,
  type SimilarityHit,
} from "./embedding-index.js";
export { cosineSimilarity, l2Normalize, clamp01, isFiniteVector } from "./similarity.js";
export { EmbeddingIngestor, type EmbeddingIngestResult } from "./embedding-ingestor.js";
