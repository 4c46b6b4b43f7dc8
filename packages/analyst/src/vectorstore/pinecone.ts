import { Pinecone } from "@pinecone-database/pinecone"
import { Log } from "@/util/log"
import type { VectorMatch, VectorRecord, VectorStore } from "./types"

const PINECONE_MAX_REQUEST_BYTES = 2 * 1024 * 1024
const PINECONE_UPSERT_SAFE_BYTES = Math.floor(PINECONE_MAX_REQUEST_BYTES * 0.9)
const UPSERT_WRAPPER_PREFIX_BYTES = Buffer.byteLength('{"vectors":[', "utf8")
const UPSERT_WRAPPER_SUFFIX_BYTES = Buffer.byteLength("]}", "utf8")
const LIST_PAGE_SIZE = 100
const FETCH_BATCH_SIZE = 100
const DELETE_BATCH_SIZE = 1_000

const log = Log.create({ service: "vectorstore.pinecone" })

function byteLengthUTF8(input: string) {
  return Buffer.byteLength(input, "utf8")
}

export function batchUpsertRecords(records: VectorRecord[]) {
  const result: VectorRecord[][] = []
  let currentBatch: VectorRecord[] = []
  let currentBytes = UPSERT_WRAPPER_PREFIX_BYTES + UPSERT_WRAPPER_SUFFIX_BYTES

  for (const record of records) {
    const bytes = byteLengthUTF8(JSON.stringify(record))
    const singleRecordBytes = UPSERT_WRAPPER_PREFIX_BYTES + UPSERT_WRAPPER_SUFFIX_BYTES + bytes
    if (singleRecordBytes > PINECONE_UPSERT_SAFE_BYTES) {
      throw new Error(
        `Pinecone upsert record "${record.id}" exceeds safe request size (${singleRecordBytes} bytes)`,
      )
    }

    const delimiterBytes = currentBatch.length > 0 ? 1 : 0
    const nextBytes = currentBytes + delimiterBytes + bytes
    if (nextBytes > PINECONE_UPSERT_SAFE_BYTES) {
      if (currentBatch.length > 0) {
        result.push(currentBatch)
      }
      currentBatch = [record]
      currentBytes = singleRecordBytes
      continue
    }

    currentBatch.push(record)
    currentBytes = nextBytes
  }

  if (currentBatch.length > 0) {
    result.push(currentBatch)
  }
  return result
}

export type PineconeStoreOptions = {
  apiKey: string
  indexName: string
  namespace: string
}

/**
 * Chunk records in one Pinecone namespace. Pinecone reports similarity
 * scores, so matches are passed through as similarities.
 */
export class PineconeVectorStore implements VectorStore {
  readonly name = "pinecone"
  private readonly client: Pinecone

  constructor(private readonly options: PineconeStoreOptions) {
    this.client = new Pinecone({ apiKey: options.apiKey })
  }

  private namespace() {
    return this.client.index(this.options.indexName).namespace(this.options.namespace)
  }

  async upsert(records: VectorRecord[]) {
    if (records.length === 0) return
    const namespace = this.namespace()
    for (const batch of batchUpsertRecords(records)) {
      await namespace.upsert(batch)
    }
    log.info("upserted records", { count: records.length, namespace: this.options.namespace })
  }

  async query(values: number[], topK: number): Promise<VectorMatch[]> {
    if (topK <= 0) return []
    const result = await this.namespace().query({
      vector: values,
      topK,
      includeMetadata: true,
      includeValues: false,
    })

    return (result.matches ?? []).map((match) => ({
      id: match.id,
      measure: { kind: "similarity" as const, value: match.score ?? 0 },
      metadata: { ...(match.metadata ?? {}) },
    }))
  }

  private async listIDs(prefix?: string) {
    const namespace = this.namespace()
    const ids: string[] = []
    let paginationToken: string | undefined

    do {
      const page = await namespace.listPaginated({
        limit: LIST_PAGE_SIZE,
        ...(prefix ? { prefix } : {}),
        ...(paginationToken ? { paginationToken } : {}),
      })
      for (const item of page.vectors ?? []) {
        if (item.id) ids.push(item.id)
      }
      paginationToken = page.pagination?.next
    } while (paginationToken)

    return ids.sort((a, b) => a.localeCompare(b))
  }

  async scanAll() {
    const namespace = this.namespace()
    const ids = await this.listIDs()

    const metadata: Record<string, unknown>[] = []
    for (let start = 0; start < ids.length; start += FETCH_BATCH_SIZE) {
      const batch = ids.slice(start, start + FETCH_BATCH_SIZE)
      const fetched = await namespace.fetch(batch)
      for (const id of batch) {
        const record = fetched.records?.[id]
        if (!record) continue
        metadata.push({ chunk_id: id, ...(record.metadata ?? {}) })
      }
    }
    return metadata
  }

  /** Chunk ids are `source::index`, so one id-prefix listing finds a document. */
  async deleteBySource(source: string) {
    const ids = await this.listIDs(`${source}::`)
    const namespace = this.namespace()
    for (let start = 0; start < ids.length; start += DELETE_BATCH_SIZE) {
      await namespace.deleteMany(ids.slice(start, start + DELETE_BATCH_SIZE))
    }
    if (ids.length > 0) {
      log.info("deleted source records", { source, count: ids.length, namespace: this.options.namespace })
    }
    return ids.length
  }

  async clear() {
    await this.namespace().deleteAll()
  }
}
