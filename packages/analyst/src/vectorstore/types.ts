import { z } from "zod"
import { Chunk } from "@/search/types"

export type VectorMetadata = Record<string, string | number | boolean>

export type VectorRecord = {
  id: string
  values: number[]
  metadata: VectorMetadata
}

/**
 * How close a match is. Distance stores report smaller-is-closer values,
 * similarity stores report larger-is-closer values.
 */
export type VectorMeasure =
  | { kind: "distance"; value: number }
  | { kind: "similarity"; value: number }

export type VectorMatch = {
  id: string
  measure: VectorMeasure
  metadata: Record<string, unknown>
}

export interface VectorStore {
  readonly name: string
  upsert(records: VectorRecord[]): Promise<void>
  /** Nearest neighbours, closest first. */
  query(values: number[], topK: number): Promise<VectorMatch[]>
  /** Metadata of every record in the corpus, in a stable order. */
  scanAll(): Promise<Record<string, unknown>[]>
  /** Removes every chunk of one document; resolves to the number removed. */
  deleteBySource(source: string): Promise<number>
  clear(): Promise<void>
}

const ChunkMetadata = z.object({
  chunk_id: z.string().min(1),
  source: z.string().min(1),
  chunk_index: z.coerce.number().int().nonnegative(),
  text: z.string(),
  summary: z.string().optional(),
  quality: z.coerce.number().min(0).max(1).optional(),
})

export function chunkToMetadata(chunk: Chunk): VectorMetadata {
  return {
    chunk_id: chunk.id,
    source: chunk.source,
    chunk_index: chunk.chunk_index,
    text: chunk.text,
    ...(chunk.summary ? { summary: chunk.summary } : {}),
    quality: chunk.quality,
  }
}

/** Returns undefined for records that do not describe a usable chunk. */
export function chunkFromMetadata(metadata: Record<string, unknown>, fallbackID?: string): Chunk | undefined {
  const parsed = ChunkMetadata.safeParse({
    chunk_id: fallbackID,
    ...metadata,
  })
  if (!parsed.success || parsed.data.text.length === 0) {
    return undefined
  }
  return {
    id: parsed.data.chunk_id,
    source: parsed.data.source,
    chunk_index: parsed.data.chunk_index,
    text: parsed.data.text,
    summary: parsed.data.summary,
    quality: parsed.data.quality ?? 0,
  }
}
