import { Log } from "@/util/log"
import { chunkFromMetadata, type VectorStore } from "@/vectorstore"
import { buildLexicalIndex, type LexicalIndex } from "./bm25"
import type { Chunk } from "./types"

const log = Log.create({ service: "search.registry" })

/**
 * Process-scoped owner of the corpus-derived lexical index.
 *
 * Readers take the current handle and keep it for the whole query. A corpus
 * change bumps the version and drops the handle; the next reader builds a
 * fresh one, so no query ever sees an index mutated under it.
 */
export class CorpusRegistry {
  private version = 0
  private pending?: { version: number; index: Promise<LexicalIndex> }

  constructor(private readonly store: VectorStore) {}

  get corpusVersion() {
    return this.version
  }

  /** Builds the index for the current version ahead of the first query. */
  async init() {
    await this.lexical()
  }

  lexical(): Promise<LexicalIndex> {
    if (this.pending && this.pending.version === this.version) {
      return this.pending.index
    }

    const version = this.version
    const index = this.build(version)
    const entry = { version, index }
    this.pending = entry
    void index.catch(() => {
      if (this.pending === entry) {
        this.pending = undefined
      }
    })
    return index
  }

  invalidate(reason = "corpus changed") {
    this.version += 1
    this.pending = undefined
    log.info("invalidated lexical index", { version: this.version, reason })
  }

  /** Drops the cached handle; a later reader rebuilds it. */
  async teardown() {
    this.pending = undefined
  }

  private async build(version: number) {
    const metadata = await this.store.scanAll()
    const chunks: Chunk[] = []
    for (const item of metadata) {
      const chunk = chunkFromMetadata(item)
      if (chunk) chunks.push(chunk)
    }
    if (chunks.length < metadata.length) {
      log.warn("skipped malformed corpus records", { skipped: metadata.length - chunks.length })
    }
    return buildLexicalIndex(chunks, version)
  }
}
