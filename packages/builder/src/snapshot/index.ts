export {
  readSnapshot,
  writeSnapshot,
  type KnowledgeBaseSnapshot,
  type SnapshotMeta,
} from "./sqlite-snapshot.js";
