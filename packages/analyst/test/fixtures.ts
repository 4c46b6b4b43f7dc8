import type { AnswerGenerator } from "@/answer/types"
import { tokenize } from "@/search/tokenizer"
import type { Candidate, CandidateOrigin, Chunk, CrossEncoder, Embedder } from "@/search/types"
import { chunkToMetadata, type VectorMatch, type VectorRecord, type VectorStore } from "@/vectorstore"

export const BATTERY = "The battery lasts 10 hours."
export const WARRANTY = "Warranty covers 1 year."

export function makeChunk(input: {
  text: string
  source?: string
  chunk_index?: number
  id?: string
  summary?: string
  quality?: number
}): Chunk {
  const source = input.source ?? "doc"
  const chunkIndex = input.chunk_index ?? 0
  return {
    id: input.id ?? `${source}::${chunkIndex}`,
    source,
    chunk_index: chunkIndex,
    text: input.text,
    ...(input.summary === undefined ? {} : { summary: input.summary }),
    quality: input.quality ?? 1,
  }
}

export function makeCandidate(
  chunk: Chunk,
  score: number | null,
  options: { origin?: CandidateOrigin; rank?: number; rerank_score?: number } = {},
): Candidate {
  return {
    chunk,
    score,
    origin: options.origin ?? (score === null ? "lexical" : "vector"),
    rank: options.rank ?? 1,
    ...(options.rerank_score === undefined ? {} : { rerank_score: options.rerank_score }),
  }
}

export function manualChunks() {
  return [
    makeChunk({ text: BATTERY, source: "manualA", chunk_index: 0 }),
    makeChunk({ text: WARRANTY, source: "manualA", chunk_index: 1 }),
  ]
}

function bucket(token: string, dimensions: number) {
  let hash = 0
  for (const char of token) {
    hash = (hash * 31 + (char.codePointAt(0) ?? 0)) % 2_147_483_647
  }
  return hash % dimensions
}

/**
 * Bag-of-words vectors, so texts sharing words land close together. `calls`
 * lists every embedded text, `batches` the texts of each batch call.
 */
export function wordEmbedder(dimensions = 64): Embedder & { calls: string[]; batches: string[][] } {
  const calls: string[] = []
  const batches: string[][] = []
  const vectorFor = (text: string) => {
    calls.push(text)
    const vector = new Array<number>(dimensions).fill(0)
    for (const token of tokenize(text)) {
      const index = bucket(token, dimensions)
      vector[index] = (vector[index] ?? 0) + 1
    }
    return vector
  }
  return {
    calls,
    batches,
    async embed(text) {
      return vectorFor(text)
    },
    async embedBatch(texts) {
      batches.push([...texts])
      return texts.map(vectorFor)
    },
  }
}

export function failingEmbedder(message: string): Embedder {
  return {
    async embed() {
      throw new Error(message)
    },
    async embedBatch() {
      throw new Error(message)
    },
  }
}

/** Counts distinct query tokens found in each passage. */
export function overlapCrossEncoder(): CrossEncoder & { texts: string[] } {
  const texts: string[] = []
  return {
    texts,
    async scoreBatch(query, passages) {
      texts.push(...passages)
      const wanted = new Set(tokenize(query))
      return passages.map((text) => new Set(tokenize(text).filter((token) => wanted.has(token))).size)
    },
  }
}

export async function seedStore(store: VectorStore, chunks: Chunk[], embedder: Embedder) {
  const vectors = await embedder.embedBatch(chunks.map((chunk) => chunk.text))
  const records: VectorRecord[] = chunks.map((chunk, index) => ({
    id: chunk.id,
    values: vectors[index] ?? [],
    metadata: chunkToMetadata(chunk),
  }))
  await store.upsert(records)
}

/** Store stand-in that can be told to fail and records what it was asked. */
export class ScriptedStore implements VectorStore {
  readonly name = "scripted"
  readonly topKs: number[] = []
  scans = 0
  failScan?: Error
  failQuery?: Error

  constructor(
    private readonly matches: VectorMatch[] = [],
    private readonly metadata: Record<string, unknown>[] = [],
  ) {}

  async upsert() {
    return
  }

  async query(_values: number[], topK: number) {
    this.topKs.push(topK)
    if (this.failQuery) throw this.failQuery
    return this.matches.slice(0, topK)
  }

  async scanAll() {
    this.scans += 1
    if (this.failScan) throw this.failScan
    return this.metadata.map((item) => ({ ...item }))
  }

  async deleteBySource() {
    return 0
  }

  async clear() {
    return
  }
}

/**
 * Generator stand-in. A string is returned as the reply, an Error is thrown,
 * and "hang" waits until the call is aborted.
 */
export function scriptedGenerator(reply: string | Error | "hang") {
  const calls: Array<{ prompt: string; maxOutputTokens: number; signal?: AbortSignal }> = []
  const generator: AnswerGenerator & { calls: typeof calls } = {
    calls,
    async generate(prompt, maxOutputTokens, signal) {
      calls.push({ prompt, maxOutputTokens, signal })
      if (reply instanceof Error) throw reply
      if (reply === "hang") {
        return new Promise<string>((_, reject) => {
          signal?.addEventListener("abort", () => reject(signal?.reason))
        })
      }
      return reply
    },
  }
  return generator
}
