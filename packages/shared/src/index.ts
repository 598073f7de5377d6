// @trendwire/shared — record model, scoring pipeline, store, vector index, RAG
export * from "./types.js";
export * from "./schemas.js";
export * from "./config.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./services.js";
export * from "./pipeline/index.js";
export * from "./store/index.js";
export * from "./vector/index.js";
export * from "./rag/index.js";
export * from "./neo4j/index.js";
export * from "./anthropic/index.js";
export * from "./embeddings/index.js";
