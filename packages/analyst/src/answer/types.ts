export interface AnswerGenerator {
  generate(prompt: string, maxOutputTokens: number, signal?: AbortSignal): Promise<string>
}

export type EvidenceEntry = {
  source: string
  excerpt: string
  score: number | null
}

/**
 * How the answer was produced. `raw_text` means the model replied but no
 * structured block could be recovered from it.
 */
export type AnswerMode = "generated" | "raw_text" | "fallback" | "empty"

export type AnswerResult = {
  answer_text: string
  evidence: EvidenceEntry[]
  missing_information: string
  confidence: number
  mode: AnswerMode
}

export type GenerationErrorCode =
  | "GENERATION_FAILED"
  | "GENERATION_TIMEOUT"
  | "GENERATION_UNAVAILABLE"

export class GenerationError extends Error {
  constructor(
    public readonly code: GenerationErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = "GenerationError"
  }
}

export const CONTEXT_CANDIDATE_LIMIT = 10
export const CONTEXT_CHAR_LIMIT = 1_000
export const EVIDENCE_LIMIT = 5
export const ANSWER_MAX_OUTPUT_TOKENS = 800
export const FALLBACK_ANSWER_CHAR_LIMIT = 400
export const DEFAULT_GENERATION_TIMEOUT_MS = 30_000
