export { InMemoryVectorStore, cosineSimilarity, euclideanDistance } from "./memory"
export type { InMemoryMetric } from "./memory"
export { PineconeVectorStore, batchUpsertRecords } from "./pinecone"
export type { PineconeStoreOptions } from "./pinecone"
export { chunkFromMetadata, chunkToMetadata } from "./types"
export type {
  VectorMatch,
  VectorMeasure,
  VectorMetadata,
  VectorRecord,
  VectorStore,
} from "./types"
