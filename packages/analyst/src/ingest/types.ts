import { z } from "zod"

export const IngestInput = z.object({
  source: z.string().trim().min(1).max(256),
  text: z.string(),
})
export type IngestInput = z.infer<typeof IngestInput>

export type IngestResult = {
  source: string
  chunk_ids: string[]
  chunks: number
  skipped: number
  corpus_version: number
}

export type IngestErrorCode = "INVALID_INPUT" | "EMPTY_TEXT" | "EMPTY_CHUNKS"

export class IngestError extends Error {
  constructor(
    public readonly code: IngestErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = "IngestError"
  }
}
