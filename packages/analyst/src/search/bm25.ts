import { Log } from "@/util/log"
import { lexicalText, tokenize } from "./tokenizer"
import type { Candidate, Chunk } from "./types"

const K1 = 1.2
const B = 0.75

const log = Log.create({ service: "search.lexical" })

export type BM25Hit = {
  position: number
  score: number
  rank: number
}

/**
 * Okapi BM25 over token lists addressed by their position in the corpus.
 * Two documents with identical tokens stay distinct hits.
 */
export class BM25Index {
  private readonly termFreqByDoc: Map<string, number>[] = []
  private readonly docLength: number[] = []
  private readonly docFreq = new Map<string, number>()
  private readonly avgDocLength: number

  constructor(documents: string[][]) {
    let totalLength = 0
    for (const tokens of documents) {
      const freq = new Map<string, number>()
      for (const token of tokens) {
        freq.set(token, (freq.get(token) ?? 0) + 1)
      }
      this.termFreqByDoc.push(freq)
      this.docLength.push(tokens.length)
      totalLength += tokens.length

      for (const token of new Set(tokens)) {
        this.docFreq.set(token, (this.docFreq.get(token) ?? 0) + 1)
      }
    }

    this.avgDocLength = documents.length > 0 ? totalLength / documents.length : 0
  }

  get size() {
    return this.docLength.length
  }

  private idf(token: string) {
    const totalDocs = this.size
    if (totalDocs === 0) return 0
    const df = this.docFreq.get(token) ?? 0
    return Math.log(1 + (totalDocs - df + 0.5) / (df + 0.5))
  }

  search(queryTokens: string[], limit: number): BM25Hit[] {
    const deduped = Array.from(new Set(queryTokens))
    const scored: Array<{ position: number; score: number }> = []

    for (let position = 0; position < this.size; position += 1) {
      const tf = this.termFreqByDoc[position]
      const length = this.docLength[position] ?? 0
      if (!tf || length === 0) continue

      let score = 0
      for (const token of deduped) {
        const freq = tf.get(token) ?? 0
        if (freq <= 0) continue

        const numerator = freq * (K1 + 1)
        const denominator = freq + K1 * (1 - B + B * (length / Math.max(this.avgDocLength, 1e-9)))
        score += this.idf(token) * (numerator / denominator)
      }
      if (score > 0) {
        scored.push({ position, score })
      }
    }

    // Array.prototype.sort is stable, so equal scores keep corpus order.
    return scored
      .sort((a, b) => b.score - a.score)
      .slice(0, Math.max(0, limit))
      .map((item, index) => ({
        ...item,
        rank: index + 1,
      }))
  }
}

/** Immutable lexical index handle over one corpus snapshot. */
export type LexicalIndex = {
  readonly chunks: readonly Chunk[]
  readonly bm25: BM25Index
  readonly version: number
}

export function buildLexicalIndex(corpus: readonly Chunk[], version = 0): LexicalIndex {
  const chunks = Object.freeze([...corpus])
  const bm25 = new BM25Index(chunks.map((chunk) => tokenize(lexicalText(chunk))))
  log.debug("built lexical index", { chunks: chunks.length, version })
  return Object.freeze({ chunks, bm25, version })
}

export function queryLexicalIndex(index: LexicalIndex, queryText: string, k: number): Candidate[] {
  if (index.chunks.length === 0 || k <= 0) {
    return []
  }

  return index.bm25.search(tokenize(queryText), k).flatMap((hit) => {
    const chunk = index.chunks[hit.position]
    if (!chunk) return []
    return [{
      chunk,
      score: null,
      origin: "lexical" as const,
      rank: hit.rank,
    }]
  })
}
