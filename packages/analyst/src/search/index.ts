export { BM25Index, buildLexicalIndex, queryLexicalIndex } from "./bm25"
export type { BM25Hit, LexicalIndex } from "./bm25"
export { DenseIndex, similarityFromMeasure } from "./dense"
export type { DenseIndexOptions } from "./dense"
export { fuseCandidates } from "./fusion"
export { CorpusRegistry } from "./registry"
export { Reranker, minMaxNormalize, scoreInBatches } from "./rerank"
export type { RerankOutput, RerankerOptions } from "./rerank"
export { RetrievalOrchestrator, orderCandidates } from "./retrieval"
export type { HybridRetrieveOptions, RetrievalOrchestratorOptions } from "./retrieval"
export { lexicalText, tokenize } from "./tokenizer"
export {
  CandidateOrigin,
  Chunk,
  DEFAULT_TOP_K,
  MIN_CHUNK_CHARS,
  RetrievalError,
  RetrievalStrategy,
} from "./types"
export type {
  Candidate,
  CrossEncoder,
  Embedder,
  RetrievalDiagnostics,
  RetrievalErrorCode,
  RetrievalResult,
} from "./types"
