export {
  IndexedMetadataSchema,
  type VectorBackend,
  type VectorEntry,
  type VectorMatch,
} from "./backend.js";
export { cosineSimilarity } from "./similarity.js";
export { FileVectorBackend } from "./file-backend.js";
export {
  RECORD_VECTOR_INDEX,
  Neo4jVectorBackend,
  ensureVectorIndex,
} from "./neo4j-backend.js";
export { VectorIndex, embeddingText, recordId } from "./vector-index.js";
