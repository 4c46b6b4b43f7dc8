import { Log } from "@/util/log"
import { queryLexicalIndex } from "./bm25"
import type { DenseIndex } from "./dense"
import { fuseCandidates } from "./fusion"
import type { CorpusRegistry } from "./registry"
import type { Reranker } from "./rerank"
import {
  RETRIEVAL_OVERSAMPLE,
  RetrievalError,
  type Candidate,
  type CandidateOrigin,
  type RetrievalDiagnostics,
  type RetrievalResult,
  type RetrievalStrategy,
} from "./types"

const log = Log.create({ service: "search.retrieval" })

export type RetrievalOrchestratorOptions = {
  registry: CorpusRegistry
  dense: DenseIndex
  reranker: Reranker
  oversample?: number
}

export type HybridRetrieveOptions = {
  strategy?: RetrievalStrategy
  signal?: AbortSignal
}

function errorMessage(error: unknown) {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message
  }
  return String(error)
}

/**
 * Scored candidates first by score, then unscored lexical hits in BM25 rank
 * order. The sort is stable, so equal keys keep fusion order.
 */
export function orderCandidates(candidates: Candidate[]) {
  return [...candidates].sort((a, b) => {
    if (a.score !== null && b.score !== null) return b.score - a.score
    if (a.score !== null) return -1
    if (b.score !== null) return 1
    return a.rank - b.rank
  })
}

export class RetrievalOrchestrator {
  private readonly registry: CorpusRegistry
  private readonly dense: DenseIndex
  private readonly reranker: Reranker
  private readonly oversample: number

  constructor(options: RetrievalOrchestratorOptions) {
    this.registry = options.registry
    this.dense = options.dense
    this.reranker = options.reranker
    this.oversample = Math.max(1, options.oversample ?? RETRIEVAL_OVERSAMPLE)
  }

  private async queryLexical(queryText: string, k: number) {
    try {
      const index = await this.registry.lexical()
      return queryLexicalIndex(index, queryText, k)
    } catch (error) {
      throw new RetrievalError("LEXICAL_FAILED", `lexical search failed: ${errorMessage(error)}`, { cause: error })
    }
  }

  private async queryDense(queryText: string, k: number, signal?: AbortSignal) {
    try {
      return await this.dense.query(queryText, k, signal)
    } catch (error) {
      throw new RetrievalError("DENSE_FAILED", `vector search failed: ${errorMessage(error)}`, { cause: error })
    }
  }

  async hybridRetrieve(queryText: string, k: number, options: HybridRetrieveOptions = {}): Promise<RetrievalResult> {
    const started = Date.now()
    const strategy = options.strategy ?? "hybrid"
    const limit = Math.max(0, Math.floor(k))
    const diagnostics: RetrievalDiagnostics = {
      strategy,
      vector_candidates: 0,
      lexical_candidates: 0,
      merged_candidates: 0,
      reranked: false,
      source_errors: {},
      elapsed_ms: 0,
    }
    const finish = (candidates: Candidate[]): RetrievalResult => {
      diagnostics.elapsed_ms = Date.now() - started
      return { candidates, diagnostics }
    }

    if (queryText.trim().length === 0 || limit === 0) {
      return finish([])
    }

    const poolSize = limit * this.oversample
    const runLexical = strategy !== "vector"
    const runDense = strategy !== "bm25"

    const [lexicalResult, denseResult] = await Promise.allSettled([
      runLexical ? this.queryLexical(queryText, poolSize) : Promise.resolve<Candidate[]>([]),
      runDense ? this.queryDense(queryText, poolSize, options.signal) : Promise.resolve<Candidate[]>([]),
    ])

    const settled: Array<[CandidateOrigin, PromiseSettledResult<Candidate[]>, boolean]> = [
      ["lexical", lexicalResult, runLexical],
      ["vector", denseResult, runDense],
    ]
    const lists: Record<CandidateOrigin, Candidate[]> = { lexical: [], vector: [] }
    let attempted = 0
    let failed = 0
    for (const [origin, result, ran] of settled) {
      if (!ran) continue
      attempted += 1
      if (result.status === "fulfilled") {
        lists[origin] = result.value
        continue
      }
      failed += 1
      diagnostics.source_errors[origin] = errorMessage(result.reason)
      log.warn("retrieval source failed", { origin, error: result.reason })
    }

    diagnostics.lexical_candidates = lists.lexical.length
    diagnostics.vector_candidates = lists.vector.length

    if (attempted > 0 && failed === attempted) {
      const error = new RetrievalError(
        "RETRIEVAL_FAILED",
        Object.entries(diagnostics.source_errors)
          .map(([origin, message]) => `${origin}: ${message}`)
          .join("; "),
      )
      diagnostics.error = error.message
      log.error("all retrieval sources failed", { error })
      return finish([])
    }

    const merged = orderCandidates(fuseCandidates(lists.lexical, lists.vector))
    diagnostics.merged_candidates = merged.length

    const reranked = await this.reranker.rerank(queryText, merged, limit, options.signal)
    diagnostics.reranked = !reranked.degraded

    log.info("retrieved", {
      strategy,
      k: limit,
      lexical: diagnostics.lexical_candidates,
      vector: diagnostics.vector_candidates,
      merged: diagnostics.merged_candidates,
      reranked: diagnostics.reranked,
    })
    return finish(reranked.candidates)
  }
}
