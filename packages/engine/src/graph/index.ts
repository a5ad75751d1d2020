export {
  InMemoryGraphStore,
  BIDIRECTIONAL_KINDS,
  type KnowledgeGraphStore,
  type GraphView,
  type GraphStats,
} from "./graph-store.js";
export {
  validateGraphBatch,
  countByKind,
  DEFAULT_MAX_NEAR_DISTANCE_METERS,
  type GraphValidationOptions,
} from "./validation.js";
