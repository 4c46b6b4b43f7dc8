import { Log } from "@/util/log"
import { clipText } from "@/util/text"
import { withTimeout } from "@/util/timeout"
import {
  RERANK_BATCH_SIZE,
  RERANK_CONCURRENCY,
  RERANK_TEXT_CHAR_LIMIT,
  RERANK_TIMEOUT_MS,
  type Candidate,
  type CrossEncoder,
} from "./types"

const log = Log.create({ service: "search.rerank" })

export type RerankOutput = {
  candidates: Candidate[]
  degraded: boolean
  reason?: string
}

/** Min-max scaling into [0, 1]; a flat batch maps to 0 everywhere. */
export function minMaxNormalize(scores: number[]) {
  if (scores.length === 0) return []
  const min = Math.min(...scores)
  const max = Math.max(...scores)
  if (max === min) {
    return scores.map(() => 0)
  }
  return scores.map((score) => (score - min) / (max - min))
}

export type RerankerOptions = {
  textCharLimit?: number
  /** Passages sent in one cross-encoder call. */
  batchSize?: number
  /** Cross-encoder calls in flight at once. */
  concurrency?: number
  /** Budget for scoring the whole pool. */
  timeoutMs?: number
}

/**
 * Scores `passages` in batches with at most `concurrency` calls in flight.
 * Any failed batch fails the whole pass.
 */
export async function scoreInBatches(
  crossEncoder: CrossEncoder,
  queryText: string,
  passages: string[],
  options: { batchSize: number; concurrency: number; signal?: AbortSignal },
) {
  const scores = new Array<number>(passages.length).fill(0)
  const starts: number[] = []
  for (let start = 0; start < passages.length; start += options.batchSize) {
    starts.push(start)
  }

  let next = 0
  const worker = async () => {
    while (next < starts.length) {
      const start = starts[next] ?? 0
      next += 1
      const batch = passages.slice(start, start + options.batchSize)
      const batchScores = await crossEncoder.scoreBatch(queryText, batch, options.signal)
      if (batchScores.length !== batch.length) {
        throw new Error(`Cross-encoder returned ${batchScores.length} scores for ${batch.length} passages`)
      }
      batchScores.forEach((score, offset) => {
        scores[start + offset] = score
      })
    }
  }

  const workers = Math.max(1, Math.min(options.concurrency, starts.length))
  await Promise.all(Array.from({ length: workers }, () => worker()))
  return scores
}

export class Reranker {
  private readonly textCharLimit: number
  private readonly batchSize: number
  private readonly concurrency: number
  private readonly timeoutMs: number

  constructor(
    private readonly crossEncoder?: CrossEncoder,
    options: RerankerOptions = {},
  ) {
    this.textCharLimit = options.textCharLimit ?? RERANK_TEXT_CHAR_LIMIT
    this.batchSize = Math.max(1, options.batchSize ?? RERANK_BATCH_SIZE)
    this.concurrency = Math.max(1, options.concurrency ?? RERANK_CONCURRENCY)
    this.timeoutMs = Math.max(1, options.timeoutMs ?? RERANK_TIMEOUT_MS)
  }

  get available() {
    return this.crossEncoder !== undefined
  }

  async rerank(queryText: string, candidates: Candidate[], k: number, signal?: AbortSignal): Promise<RerankOutput> {
    const limit = Math.max(0, k)
    const crossEncoder = this.crossEncoder
    if (!crossEncoder) {
      return {
        candidates: candidates.slice(0, limit),
        degraded: true,
        reason: "cross-encoder unavailable",
      }
    }
    if (candidates.length === 0) {
      return { candidates: [], degraded: false }
    }

    const passages = candidates.map((candidate) => clipText(candidate.chunk.text, this.textCharLimit))
    let raw: number[]
    try {
      raw = await withTimeout(
        (timeoutSignal) =>
          scoreInBatches(crossEncoder, queryText, passages, {
            batchSize: this.batchSize,
            concurrency: this.concurrency,
            signal: signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal,
          }),
        this.timeoutMs,
      )
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      log.warn("cross-encoder failed, passing candidates through", { reason })
      return {
        candidates: candidates.slice(0, limit),
        degraded: true,
        reason,
      }
    }

    const normalized = minMaxNormalize(raw)
    const ranked = candidates
      .map((candidate, index) => ({
        ...candidate,
        rerank_score: normalized[index] ?? 0,
      }))
      .sort((a, b) => b.rerank_score - a.rerank_score)
      .slice(0, limit)

    return {
      candidates: ranked,
      degraded: false,
    }
  }
}
