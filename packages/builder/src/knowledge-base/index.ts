export {
  buildKnowledgeBase,
  loadKnowledgeBase,
  type BuildKnowledgeBaseOptions,
  type KnowledgeBaseBuildResult,
  type KnowledgeBaseBuildStats,
  type KnowledgeBaseLoadResult,
  type LiveStores,
  type PoiFetcher,
} from "./pipeline.js";
