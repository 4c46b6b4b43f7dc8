import { Log } from "@/util/log"
import { chunkFromMetadata, type VectorMeasure, type VectorStore } from "@/vectorstore"
import {
  DENSE_OVERSAMPLE,
  MIN_CHUNK_CHARS,
  type Candidate,
  type Embedder,
} from "./types"

const log = Log.create({ service: "search.dense" })

export type DenseIndexOptions = {
  embedder: Embedder
  store: VectorStore
  oversample?: number
  minChars?: number
}

/** Higher is more relevant; distances map into (0, 1]. */
export function similarityFromMeasure(measure: VectorMeasure) {
  if (measure.kind === "similarity") {
    return measure.value
  }
  return 1 / (1 + Math.max(0, measure.value))
}

export class DenseIndex {
  private readonly embedder: Embedder
  private readonly store: VectorStore
  readonly oversample: number
  readonly minChars: number

  constructor(options: DenseIndexOptions) {
    this.embedder = options.embedder
    this.store = options.store
    this.oversample = Math.max(1, options.oversample ?? DENSE_OVERSAMPLE)
    this.minChars = Math.max(0, options.minChars ?? MIN_CHUNK_CHARS)
  }

  async query(queryText: string, k: number, signal?: AbortSignal): Promise<Candidate[]> {
    if (k <= 0) return []

    const vector = await this.embedder.embed(queryText, signal)
    const matches = await this.store.query(vector, k * this.oversample)

    let dropped = 0
    const scored = matches.flatMap((match) => {
      const chunk = chunkFromMetadata(match.metadata, match.id)
      if (!chunk || chunk.text.trim().length < this.minChars) {
        dropped += 1
        return []
      }
      return [{ chunk, score: similarityFromMeasure(match.measure) }]
    })

    if (dropped > 0) {
      log.debug("dropped short or malformed matches", { dropped, requested: k * this.oversample })
    }

    return scored
      .sort((a, b) => b.score - a.score)
      .slice(0, k)
      .map((item, index) => ({
        chunk: item.chunk,
        score: item.score,
        origin: "vector" as const,
        rank: index + 1,
      }))
  }
}
