import type { CorpusRegistry } from "@/search/registry"
import { MIN_CHUNK_CHARS, type Chunk, type Embedder } from "@/search/types"
import { Log } from "@/util/log"
import { chunkToMetadata, type VectorRecord, type VectorStore } from "@/vectorstore"
import { chunkText, type ChunkingOptions } from "./chunker"
import { chunkSummary, cleanChunkText, textQuality } from "./clean"
import { IngestError, IngestInput, type IngestResult } from "./types"

const log = Log.create({ service: "ingest" })

export type IngestorOptions = {
  embedder: Embedder
  store: VectorStore
  registry: CorpusRegistry
  chunking?: ChunkingOptions
}

export function toChunkID(source: string, chunkIndex: number) {
  return `${source}::${chunkIndex}`
}

/** Cleans, chunks and scores one document; chunks under 50 characters are skipped. */
export function prepareChunks(source: string, text: string, chunking?: ChunkingOptions) {
  const cleaned = cleanChunkText(text)
  if (!cleaned) {
    throw new IngestError("EMPTY_TEXT", `No text left in ${source} after cleaning`)
  }

  const windows = chunkText(cleaned, chunking)
  const chunks: Chunk[] = []
  windows.forEach((window, chunkIndex) => {
    const body = cleanChunkText(window)
    if (body.length < MIN_CHUNK_CHARS) return
    chunks.push({
      id: toChunkID(source, chunkIndex),
      source,
      chunk_index: chunkIndex,
      text: body,
      summary: chunkSummary(body),
      quality: textQuality(body),
    })
  })

  if (chunks.length === 0) {
    throw new IngestError("EMPTY_CHUNKS", `Every chunk of ${source} was shorter than ${MIN_CHUNK_CHARS} characters`)
  }
  return { chunks, skipped: windows.length - chunks.length }
}

export class Ingestor {
  private readonly embedder: Embedder
  private readonly store: VectorStore
  private readonly registry: CorpusRegistry
  private readonly chunking?: ChunkingOptions

  constructor(options: IngestorOptions) {
    this.embedder = options.embedder
    this.store = options.store
    this.registry = options.registry
    this.chunking = options.chunking
  }

  async ingestDocument(input: unknown): Promise<IngestResult> {
    const parsed = IngestInput.safeParse(input)
    if (!parsed.success) {
      throw new IngestError("INVALID_INPUT", parsed.error.issues[0]?.message ?? "Invalid document", {
        cause: parsed.error,
      })
    }

    const { source, text } = parsed.data
    const { chunks, skipped } = prepareChunks(source, text, this.chunking)

    const vectors = await this.embedder.embedBatch(chunks.map((chunk) => chunk.text))
    const records: VectorRecord[] = chunks.map((chunk, index) => ({
      id: chunk.id,
      values: vectors[index] ?? [],
      metadata: chunkToMetadata(chunk),
    }))

    const replaced = await this.store.deleteBySource(source)
    await this.store.upsert(records)
    this.registry.invalidate(`ingested ${source}`)

    log.info("ingested document", { source, chunks: chunks.length, skipped, replaced, store: this.store.name })
    return {
      source,
      chunk_ids: chunks.map((chunk) => chunk.id),
      chunks: chunks.length,
      skipped,
      corpus_version: this.registry.corpusVersion,
    }
  }

  async clear() {
    await this.store.clear()
    this.registry.invalidate("corpus cleared")
    log.info("cleared corpus", { store: this.store.name })
  }
}
