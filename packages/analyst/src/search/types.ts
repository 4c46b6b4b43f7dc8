import { z } from "zod"

export const Chunk = z.object({
  id: z.string().min(1),
  source: z.string().min(1),
  chunk_index: z.number().int().nonnegative(),
  text: z.string().min(1),
  summary: z.string().optional(),
  quality: z.number().min(0).max(1),
})
export type Chunk = z.infer<typeof Chunk>

export const CandidateOrigin = z.enum(["vector", "lexical"])
export type CandidateOrigin = z.infer<typeof CandidateOrigin>

export const RetrievalStrategy = z.enum(["vector", "bm25", "hybrid"])
export type RetrievalStrategy = z.infer<typeof RetrievalStrategy>

/**
 * A chunk scored against one query by one retrieval signal.
 *
 * `score` is null for lexical hits: BM25 values only order the lexical list
 * and are not comparable with similarities. `rerank_score` is set only when
 * a cross-encoder pass ran.
 */
export type Candidate = {
  chunk: Chunk
  score: number | null
  origin: CandidateOrigin
  rank: number
  rerank_score?: number
}

export type RetrievalDiagnostics = {
  strategy: RetrievalStrategy
  vector_candidates: number
  lexical_candidates: number
  merged_candidates: number
  reranked: boolean
  source_errors: Partial<Record<CandidateOrigin, string>>
  error?: string
  elapsed_ms: number
}

export type RetrievalResult = {
  candidates: Candidate[]
  diagnostics: RetrievalDiagnostics
}

/** Deterministic for identical input within one process. */
export interface Embedder {
  embed(text: string, signal?: AbortSignal): Promise<number[]>
  /** One vector per text, in input order. */
  embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]>
}

/**
 * Joint relevance of the query with each passage, one score per passage in
 * input order; the range is unbounded.
 */
export interface CrossEncoder {
  scoreBatch(query: string, passages: string[], signal?: AbortSignal): Promise<number[]>
}

export type RetrievalErrorCode =
  | "LEXICAL_FAILED"
  | "DENSE_FAILED"
  | "RETRIEVAL_FAILED"

export class RetrievalError extends Error {
  constructor(
    public readonly code: RetrievalErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = "RetrievalError"
  }
}

export const DEFAULT_TOP_K = 5
export const MIN_CHUNK_CHARS = 50
export const RERANK_TEXT_CHAR_LIMIT = 1_000
export const RERANK_BATCH_SIZE = 20
export const RERANK_CONCURRENCY = 4
export const RERANK_TIMEOUT_MS = 30_000
export const RETRIEVAL_OVERSAMPLE = 10
export const DENSE_OVERSAMPLE = 3
