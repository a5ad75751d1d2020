export {
  getDefaultRetrievalConfig,
  validateRetrievalConfig,
  deepMerge,
  findConfigsRoot,
  loadBaseRetrievalConfig,
  loadRetrievalProfile,
  listRetrievalProfiles,
  resolveRetrievalConfig,
  type RetrievalProfile,
} from "./retrieval-config.js";
