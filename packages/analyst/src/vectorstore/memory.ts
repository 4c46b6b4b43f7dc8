import type { VectorMatch, VectorMetadata, VectorRecord, VectorStore } from "./types"

export type InMemoryMetric = "cosine" | "l2"

export function cosineSimilarity(left: number[], right: number[]) {
  if (left.length === 0 || right.length === 0 || left.length !== right.length) {
    return 0
  }

  let dot = 0
  let leftNorm = 0
  let rightNorm = 0
  for (let i = 0; i < left.length; i += 1) {
    dot += left[i] * right[i]
    leftNorm += left[i] * left[i]
    rightNorm += right[i] * right[i]
  }

  if (leftNorm === 0 || rightNorm === 0) {
    return 0
  }

  return dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm))
}

export function euclideanDistance(left: number[], right: number[]) {
  if (left.length !== right.length) {
    return Number.POSITIVE_INFINITY
  }
  let sum = 0
  for (let i = 0; i < left.length; i += 1) {
    const diff = left[i] - right[i]
    sum += diff * diff
  }
  return Math.sqrt(sum)
}

type StoredRecord = {
  id: string
  values: number[]
  metadata: VectorMetadata
}

/**
 * Process-local store. Cosine mode reports similarities, l2 mode reports
 * distances, mirroring the two kinds of hosted stores.
 */
export class InMemoryVectorStore implements VectorStore {
  readonly name = "memory"
  private readonly records = new Map<string, StoredRecord>()

  constructor(private readonly metric: InMemoryMetric = "cosine") {}

  get size() {
    return this.records.size
  }

  async upsert(records: VectorRecord[]) {
    for (const record of records) {
      this.records.set(record.id, {
        id: record.id,
        values: [...record.values],
        metadata: { ...record.metadata },
      })
    }
  }

  async query(values: number[], topK: number): Promise<VectorMatch[]> {
    if (topK <= 0) return []
    const scored = Array.from(this.records.values()).map((record) => {
      const value = this.metric === "cosine"
        ? cosineSimilarity(values, record.values)
        : euclideanDistance(values, record.values)
      return { record, value }
    })

    scored.sort((a, b) => (this.metric === "cosine" ? b.value - a.value : a.value - b.value))

    return scored.slice(0, topK).map(({ record, value }) => ({
      id: record.id,
      measure: this.metric === "cosine"
        ? { kind: "similarity" as const, value }
        : { kind: "distance" as const, value },
      metadata: { ...record.metadata },
    }))
  }

  async scanAll() {
    return Array.from(this.records.values()).map((record) => ({ ...record.metadata }))
  }

  async deleteBySource(source: string) {
    let removed = 0
    for (const [id, record] of this.records) {
      if (record.metadata.source !== source) continue
      this.records.delete(id)
      removed += 1
    }
    return removed
  }

  async clear() {
    this.records.clear()
  }
}
