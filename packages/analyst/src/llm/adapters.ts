import { createHash } from "node:crypto"
import { readFileSync } from "node:fs"
import { fileURLToPath } from "node:url"
import { z } from "zod"
import { extractStructured } from "@/answer/parse"
import type { AnswerGenerator } from "@/answer/types"
import { tokenize } from "@/search/tokenizer"
import type { CrossEncoder, Embedder } from "@/search/types"
import { LLM } from "./index"

const RERANK_SYSTEM_PROMPT = readFileSync(
  fileURLToPath(new URL("./rerank-score.txt", import.meta.url)),
  "utf8",
)

export function createEmbedder(): Embedder {
  const client = LLM.for("retrieval.embedding")
  const embedBatch = async (texts: string[], signal?: AbortSignal) => {
    if (texts.length === 0) return []
    const { embeddings } = await client.embedMany({
      values: texts,
      abortSignal: signal,
    })
    if (embeddings.length !== texts.length) {
      throw new Error(`Embedding output size mismatch: ${embeddings.length} for ${texts.length} texts`)
    }
    if (embeddings.some((vector) => vector.length === 0)) {
      throw new Error("Embedding response was empty")
    }
    return embeddings
  }
  return {
    embedBatch,
    async embed(text, signal) {
      const [vector] = await embedBatch([text], signal)
      if (!vector) {
        throw new Error("Embedding response was empty")
      }
      return vector
    },
  }
}

export const HASH_EMBEDDING_DIMENSIONS = 512

function tokenBucket(token: string, dimensions: number) {
  return createHash("sha1").update(token).digest().readUInt32BE(0) % dimensions
}

/** Term counts hashed into a fixed number of buckets. */
export function hashVector(input: string, dimensions = HASH_EMBEDDING_DIMENSIONS) {
  const values = new Array<number>(dimensions).fill(0)
  for (const token of tokenize(input)) {
    const index = tokenBucket(token, dimensions)
    values[index] = (values[index] ?? 0) + 1
  }
  return values
}

/**
 * Offline stand-in used when no embedding model is configured. Texts that
 * share words land close together, so dense search degrades to word overlap.
 */
export function createHashEmbedder(dimensions = HASH_EMBEDDING_DIMENSIONS): Embedder {
  return {
    async embed(text) {
      return hashVector(text, dimensions)
    },
    async embedBatch(texts) {
      return texts.map((text) => hashVector(text, dimensions))
    },
  }
}

const RelevanceReply = z.object({
  results: z.array(z.object({
    index: z.coerce.number().int(),
    relevance: z.coerce.number(),
  })),
})

/**
 * Maps a batch reply onto passage order. Passages the reply skips score 0;
 * unknown indices and repeats are ignored.
 */
export function parseRelevanceReply(text: string, count: number) {
  const structured = extractStructured(text)
  const parsed = RelevanceReply.safeParse(structured?.value)
  if (!parsed.success) {
    throw new Error(`Relevance reply is not valid: ${text.slice(0, 80)}`)
  }
  const scores = new Array<number>(count).fill(0)
  const seen = new Set<number>()
  for (const item of parsed.data.results) {
    const position = item.index - 1
    if (position < 0 || position >= count || seen.has(position)) continue
    seen.add(position)
    scores[position] = item.relevance
  }
  return scores
}

export function formatPassages(passages: string[]) {
  return passages.map((passage, index) => `[${index + 1}] ${passage}`).join("\n\n")
}

/** Scores a batch of passages with one model call. */
export function createCrossEncoder(): CrossEncoder {
  const client = LLM.for("rerank.score")
  return {
    async scoreBatch(query, passages, signal) {
      if (passages.length === 0) return []
      const response = await client.generateText({
        system: RERANK_SYSTEM_PROMPT,
        prompt: `QUERY:\n${query}\n\nPASSAGES:\n${formatPassages(passages)}`,
        abortSignal: signal,
      })
      return parseRelevanceReply(response.text, passages.length)
    },
  }
}

export function createGenerator(): AnswerGenerator {
  const client = LLM.for("answer.generate")
  return {
    async generate(prompt, maxOutputTokens, signal) {
      const response = await client.generateText({
        system: "You are an AI analyst.",
        prompt,
        maxOutputTokens,
        abortSignal: signal,
      })
      return response.text
    },
  }
}
