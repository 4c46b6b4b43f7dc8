import type { Context } from "hono"
import { EvaluationError, type EvaluationErrorCode } from "@/evaluation/labels"
import { IngestError, type IngestErrorCode } from "@/ingest/types"

const INGEST_ERROR_STATUS: Record<IngestErrorCode, 400 | 422> = {
  INVALID_INPUT: 400,
  EMPTY_TEXT: 422,
  EMPTY_CHUNKS: 422,
}

const EVALUATION_ERROR_STATUS: Record<EvaluationErrorCode, 404 | 422> = {
  LABELS_NOT_FOUND: 404,
  LABELS_INVALID: 422,
  LABELS_EMPTY: 422,
}

export function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : "Unknown error"
}

export function ingestErrorResponse(c: Context, error: unknown) {
  if (!(error instanceof IngestError)) {
    return c.json({ error: errorMessage(error) }, 500)
  }
  return c.json({ error: error.message, code: error.code }, INGEST_ERROR_STATUS[error.code])
}

export function evaluationErrorResponse(c: Context, error: unknown) {
  if (!(error instanceof EvaluationError)) {
    return c.json({ error: errorMessage(error) }, 500)
  }
  return c.json({ error: error.message, code: error.code }, EVALUATION_ERROR_STATUS[error.code])
}
