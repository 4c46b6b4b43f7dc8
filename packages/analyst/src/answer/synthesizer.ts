import type { Candidate } from "@/search/types"
import { Log } from "@/util/log"
import { clipText, firstSentence, shorten } from "@/util/text"
import { TimeoutError, withTimeout } from "@/util/timeout"
import { heuristicConfidence } from "./confidence"
import { normalizeAnswerFields, restrictEvidence } from "./normalize"
import { extractStructured } from "./parse"
import { buildAnswerPrompt } from "./prompt"
import {
  ANSWER_MAX_OUTPUT_TOKENS,
  CONTEXT_CHAR_LIMIT,
  DEFAULT_GENERATION_TIMEOUT_MS,
  EVIDENCE_LIMIT,
  FALLBACK_ANSWER_CHAR_LIMIT,
  GenerationError,
  type AnswerGenerator,
  type AnswerResult,
  type EvidenceEntry,
} from "./types"

const log = Log.create({ service: "answer" })

export const NO_MATCH_ANSWER = "I couldn't find relevant information in the indexed documents to answer this question."
export const NO_MATCH_NOTE = "No matching chunks found in the indexed documents for this question."
export const PARSE_FAILURE_NOTE = "Could not parse structured JSON from the model response; the raw reply is shown as the answer."
export const THIN_EVIDENCE_NOTE = "Only a few supporting chunks were found; the answer may be incomplete."
const THIN_EVIDENCE_COUNT = 3

export type AnswerSynthesizerOptions = {
  generator?: AnswerGenerator
  timeoutMs?: number
  maxOutputTokens?: number
}

export function rankingScore(candidate: Candidate) {
  return candidate.rerank_score ?? candidate.score
}

/** Highest ranking score wins; ties go to the earlier chunk of its document. */
export function pickTopCandidate(candidates: Candidate[]) {
  if (!candidates.some((candidate) => rankingScore(candidate) !== null)) {
    return candidates[0]
  }
  return [...candidates].sort((a, b) => {
    const delta = (rankingScore(b) ?? Number.NEGATIVE_INFINITY) - (rankingScore(a) ?? Number.NEGATIVE_INFINITY)
    if (delta !== 0 && !Number.isNaN(delta)) return delta
    return a.chunk.chunk_index - b.chunk.chunk_index
  })[0]
}

export function evidenceFromCandidates(candidates: Candidate[], limit = EVIDENCE_LIMIT): EvidenceEntry[] {
  return candidates.slice(0, limit).map((candidate) => ({
    source: candidate.chunk.source,
    excerpt: clipText(candidate.chunk.text.trim(), CONTEXT_CHAR_LIMIT),
    score: rankingScore(candidate),
  }))
}

export function emptyAnswer(): AnswerResult {
  return {
    answer_text: NO_MATCH_ANSWER,
    evidence: [],
    missing_information: NO_MATCH_NOTE,
    confidence: 0,
    mode: "empty",
  }
}

/** Extractive answer built from the best candidate without any model call. */
export function fallbackAnswer(candidates: Candidate[], note?: string): AnswerResult {
  const top = pickTopCandidate(candidates)
  if (!top) {
    return emptyAnswer()
  }

  const sentence = shorten(firstSentence(top.chunk.text), FALLBACK_ANSWER_CHAR_LIMIT)
  const notes = [note, candidates.length < THIN_EVIDENCE_COUNT ? THIN_EVIDENCE_NOTE : undefined].filter(
    (item): item is string => Boolean(item),
  )
  return {
    answer_text: `(Analyst) ${sentence}`,
    evidence: evidenceFromCandidates(candidates),
    missing_information: notes.join(" "),
    confidence: heuristicConfidence(candidates),
    mode: "fallback",
  }
}

function toGenerationError(error: unknown) {
  if (error instanceof GenerationError) return error
  if (error instanceof TimeoutError) {
    return new GenerationError("GENERATION_TIMEOUT", `generation timed out after ${error.timeoutMs}ms`, { cause: error })
  }
  const message = error instanceof Error ? error.message : String(error)
  return new GenerationError("GENERATION_FAILED", message, { cause: error })
}

export class AnswerSynthesizer {
  private readonly generator?: AnswerGenerator
  readonly timeoutMs: number
  readonly maxOutputTokens: number

  constructor(options: AnswerSynthesizerOptions = {}) {
    this.generator = options.generator
    this.timeoutMs = Math.max(1, options.timeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS)
    this.maxOutputTokens = options.maxOutputTokens ?? ANSWER_MAX_OUTPUT_TOKENS
  }

  get available() {
    return this.generator !== undefined
  }

  async answer(queryText: string, candidates: Candidate[]): Promise<AnswerResult> {
    if (candidates.length === 0) {
      return emptyAnswer()
    }
    const generator = this.generator
    if (!generator) {
      return fallbackAnswer(candidates)
    }

    const prompt = buildAnswerPrompt(queryText, candidates)
    let reply: string
    try {
      reply = await withTimeout((signal) => generator.generate(prompt, this.maxOutputTokens, signal), this.timeoutMs)
      if (reply.trim().length === 0) {
        throw new GenerationError("GENERATION_FAILED", "model returned an empty reply")
      }
    } catch (error) {
      const failure = toGenerationError(error)
      log.warn("generation failed, using extractive fallback", { code: failure.code, error: failure.message })
      return fallbackAnswer(candidates, `Answer generation failed (${failure.message}); showing an extractive answer.`)
    }

    return this.fromReply(reply, candidates)
  }

  private fromReply(reply: string, candidates: Candidate[]): AnswerResult {
    const structured = extractStructured(reply)
    const normalized = structured ? normalizeAnswerFields(structured.value) : undefined
    if (!normalized) {
      log.warn("model reply has no structured answer", { chars: reply.length })
      return {
        answer_text: reply.trim(),
        evidence: [],
        missing_information: PARSE_FAILURE_NOTE,
        confidence: 0,
        mode: "raw_text",
      }
    }

    const known = new Set(candidates.map((candidate) => candidate.chunk.source))
    const evidence = restrictEvidence(normalized.evidence, known, EVIDENCE_LIMIT)
    if (evidence.length < Math.min(normalized.evidence.length, EVIDENCE_LIMIT)) {
      log.debug("dropped evidence citing unknown sources", {
        cited: normalized.evidence.length,
        kept: evidence.length,
      })
    }
    if (structured && structured.method !== "direct") {
      log.debug("recovered structured answer", { method: structured.method })
    }

    return {
      answer_text: normalized.answer,
      evidence,
      missing_information: normalized.missing_information,
      confidence: normalized.confidence,
      mode: "generated",
    }
  }
}
