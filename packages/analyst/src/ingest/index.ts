export { chunkText, splitSentences, CHUNK_MAX_WORDS, CHUNK_MIN_WORDS, CHUNK_OVERLAP_WORDS } from "./chunker"
export type { ChunkingOptions } from "./chunker"
export { chunkSummary, cleanChunkText, textQuality } from "./clean"
export { Ingestor, prepareChunks, toChunkID } from "./service"
export type { IngestorOptions } from "./service"
export { IngestError, IngestInput } from "./types"
export type { IngestErrorCode, IngestResult } from "./types"
