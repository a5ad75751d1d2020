export { HybridRetriever, type HybridRetrieverDeps } from "./hybrid-retriever.js";
export {
  combineScores,
  compareCandidates,
  graphScoreFromWeight,
  semanticScoreFromSimilarity,
} from "./scoring.js";
export { hashQuery } from "./query-hash.js";
