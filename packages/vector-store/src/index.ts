export type {
  IVectorStore,
  IndexSpec,
  ScoredChunk,
  BackendStats,
} from "./vector-store.interface.js";
export { PgVectorStore, isConnectionError } from "./pgvector-store.js";
export type { PgVectorStoreOptions } from "./pgvector-store.js";
export { InMemoryVectorStore } from "./in-memory-store.js";
export { DegradableVectorStore } from "./degradable-store.js";
export type { DegradableVectorStoreOptions, PersistResult } from "./degradable-store.js";
export { createVectorStore } from "./factory.js";
export type { VectorStoreFactoryConfig } from "./factory.js";
export { indexDdl, scoreFromDistance, similarity, escapeLike } from "./similarity.js";
