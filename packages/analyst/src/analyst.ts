import { AnswerSynthesizer } from "@/answer/synthesizer"
import type { AnswerGenerator } from "@/answer/types"
import type { ChunkingOptions } from "@/ingest/chunker"
import { Ingestor } from "@/ingest/service"
import { LLM } from "@/llm"
import { createCrossEncoder, createEmbedder, createGenerator, createHashEmbedder } from "@/llm/adapters"
import { DenseIndex } from "@/search/dense"
import { CorpusRegistry } from "@/search/registry"
import { Reranker } from "@/search/rerank"
import { RetrievalOrchestrator } from "@/search/retrieval"
import type { CrossEncoder, Embedder } from "@/search/types"
import {
  isPineconeEnabled,
  resolveDenseOversample,
  resolveGenerationTimeoutMs,
  resolvePineconeEnv,
} from "@/server/env"
import { Supervisor } from "@/supervisor"
import { Log } from "@/util/log"
import { InMemoryVectorStore, PineconeVectorStore, type VectorStore } from "@/vectorstore"

const log = Log.create({ service: "analyst" })

export type AnalystOptions = {
  store: VectorStore
  embedder: Embedder
  crossEncoder?: CrossEncoder
  generator?: AnswerGenerator
  generationTimeoutMs?: number
  denseOversample?: number
  chunking?: ChunkingOptions
}

/** One wired pipeline. Owns the corpus registry for its store. */
export type Analyst = {
  store: VectorStore
  registry: CorpusRegistry
  retrieval: RetrievalOrchestrator
  synthesizer: AnswerSynthesizer
  supervisor: Supervisor
  ingestor: Ingestor
  init(): Promise<void>
  teardown(): Promise<void>
}

export function createAnalyst(options: AnalystOptions): Analyst {
  const registry = new CorpusRegistry(options.store)
  const retrieval = new RetrievalOrchestrator({
    registry,
    dense: new DenseIndex({
      embedder: options.embedder,
      store: options.store,
      oversample: options.denseOversample,
    }),
    reranker: new Reranker(options.crossEncoder),
  })
  const synthesizer = new AnswerSynthesizer({
    generator: options.generator,
    timeoutMs: options.generationTimeoutMs,
  })
  const supervisor = new Supervisor({ retrieval, synthesizer })
  const ingestor = new Ingestor({
    embedder: options.embedder,
    store: options.store,
    registry,
    chunking: options.chunking,
  })

  return {
    store: options.store,
    registry,
    retrieval,
    synthesizer,
    supervisor,
    ingestor,
    async init() {
      await registry.init()
      log.info("analyst ready", {
        store: options.store.name,
        reranker: options.crossEncoder !== undefined,
        generator: options.generator !== undefined,
        corpus_version: registry.corpusVersion,
      })
    },
    async teardown() {
      await registry.teardown()
    },
  }
}

/**
 * Builds the pipeline from the environment: Pinecone when configured, the
 * in-memory store otherwise; model-backed collaborators only with an OpenAI
 * key.
 */
export function createAnalystFromEnv(): Analyst {
  const models = LLM.available()
  const pinecone = resolvePineconeEnv()
  const store: VectorStore = isPineconeEnabled()
    ? new PineconeVectorStore({
        apiKey: pinecone.apiKey,
        indexName: pinecone.indexName,
        namespace: pinecone.namespace,
      })
    : new InMemoryVectorStore()

  if (!models) {
    log.warn("OPENAI_API_KEY is not set; using word-hash embeddings, no reranker and the extractive answer")
  }

  return createAnalyst({
    store,
    embedder: models ? createEmbedder() : createHashEmbedder(),
    crossEncoder: models ? createCrossEncoder() : undefined,
    generator: models ? createGenerator() : undefined,
    generationTimeoutMs: resolveGenerationTimeoutMs(),
    denseOversample: resolveDenseOversample(),
  })
}
