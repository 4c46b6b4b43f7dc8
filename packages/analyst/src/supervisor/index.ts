import type { AnswerSynthesizer } from "@/answer/synthesizer"
import type { AnswerResult, EvidenceEntry } from "@/answer/types"
import { analyze, type RetrievalPlan } from "@/planner"
import type { RetrievalOrchestrator } from "@/search/retrieval"
import type { Candidate, CandidateOrigin, RetrievalDiagnostics, RetrievalResult } from "@/search/types"
import { Log } from "@/util/log"

const log = Log.create({ service: "supervisor" })

export const EMPTY_QUESTION_ANSWER = "Please enter a question about the indexed documents."
export const EMPTY_QUESTION_NOTE = "No question was provided."
export const RETRIEVAL_FAILED_ANSWER = "I couldn't search the indexed documents for this question."
export const ANSWER_FAILED_ANSWER = "An answer could not be produced for this question."

export type TopChunk = {
  id: string
  source: string
  chunk_index: number
  text: string
  origin: CandidateOrigin
  score: number | null
  rerank_score: number | null
}

/** Field order is the order clients render in. */
export type AskResponse = {
  answer: string
  evidence_used: EvidenceEntry[]
  missing_information: string
  confidence_score: number
  top_chunks: TopChunk[]
  retrieval_diagnostics: RetrievalDiagnostics
  plan: RetrievalPlan
}

export type SupervisorOptions = {
  retrieval: RetrievalOrchestrator
  synthesizer: AnswerSynthesizer
  planner?: (question: string) => RetrievalPlan
}

export type AskOptions = {
  signal?: AbortSignal
}

function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error)
}

export function emptyDiagnostics(plan: RetrievalPlan, error?: string): RetrievalDiagnostics {
  return {
    strategy: plan.strategy,
    vector_candidates: 0,
    lexical_candidates: 0,
    merged_candidates: 0,
    reranked: false,
    source_errors: {},
    error,
    elapsed_ms: 0,
  }
}

export function toTopChunk(candidate: Candidate): TopChunk {
  return {
    id: candidate.chunk.id,
    source: candidate.chunk.source,
    chunk_index: candidate.chunk.chunk_index,
    text: candidate.chunk.text,
    origin: candidate.origin,
    score: candidate.score,
    rerank_score: candidate.rerank_score ?? null,
  }
}

function respond(answer: AnswerResult, retrieval: RetrievalResult, plan: RetrievalPlan): AskResponse {
  return {
    answer: answer.answer_text,
    evidence_used: answer.evidence,
    missing_information: answer.missing_information,
    confidence_score: answer.confidence,
    top_chunks: retrieval.candidates.map(toTopChunk),
    retrieval_diagnostics: retrieval.diagnostics,
    plan,
  }
}

/** Runs planner, retrieval and synthesis for one question. Never throws. */
export class Supervisor {
  private readonly retrieval: RetrievalOrchestrator
  private readonly synthesizer: AnswerSynthesizer
  private readonly planner: (question: string) => RetrievalPlan

  constructor(options: SupervisorOptions) {
    this.retrieval = options.retrieval
    this.synthesizer = options.synthesizer
    this.planner = options.planner ?? analyze
  }

  async ask(question: string, options: AskOptions = {}): Promise<AskResponse> {
    const plan = this.planner(question)
    if (question.trim().length === 0) {
      return {
        answer: EMPTY_QUESTION_ANSWER,
        evidence_used: [],
        missing_information: EMPTY_QUESTION_NOTE,
        confidence_score: 0,
        top_chunks: [],
        retrieval_diagnostics: emptyDiagnostics(plan),
        plan,
      }
    }

    let retrieval: RetrievalResult
    try {
      retrieval = await this.retrieval.hybridRetrieve(plan.query_text, plan.chunk_budget, {
        strategy: plan.strategy,
        signal: options.signal,
      })
    } catch (error) {
      log.error("retrieval threw", { error })
      retrieval = { candidates: [], diagnostics: emptyDiagnostics(plan, errorMessage(error)) }
    }

    const retrievalError = retrieval.diagnostics.error
    if (retrievalError !== undefined && retrieval.candidates.length === 0) {
      return respond(
        {
          answer_text: RETRIEVAL_FAILED_ANSWER,
          evidence: [],
          missing_information: `Retrieval failed: ${retrievalError}`,
          confidence: 0,
          mode: "empty",
        },
        retrieval,
        plan,
      )
    }

    let answer: AnswerResult
    try {
      answer = await this.synthesizer.answer(plan.query_text, retrieval.candidates)
    } catch (error) {
      log.error("answer stage failed", { error })
      answer = {
        answer_text: ANSWER_FAILED_ANSWER,
        evidence: [],
        missing_information: `Answer stage failed: ${errorMessage(error)}`,
        confidence: 0,
        mode: "empty",
      }
    }

    log.info("answered", {
      intent: plan.intent,
      chunks: retrieval.candidates.length,
      mode: answer.mode,
      confidence: answer.confidence,
    })
    return respond(answer, retrieval, plan)
  }
}
