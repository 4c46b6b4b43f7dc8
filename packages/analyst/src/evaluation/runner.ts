import { performance } from "node:perf_hooks"
import type { AskResponse } from "@/supervisor"
import { Log } from "@/util/log"
import { roundTo } from "@/util/text"
import type { EvalLabel } from "./labels"
import { isUnsupported, mean, precisionRecall, retrievedSources, summarizeLatency, type LatencySummary } from "./metrics"

const log = Log.create({ service: "evaluation" })

export type Asker = {
  ask(question: string): Promise<AskResponse>
}

export type QuestionReport = {
  question: string
  latency_ms: number
  unsupported: boolean
  confidence: number
  retrieved_sources: string[]
  relevant_sources: string[]
  precision: number | null
  recall: number | null
}

export type EvaluationReport = {
  num_questions: number
  hallucination_rate: number
  retrieval_precision: number | null
  retrieval_recall: number | null
  retrieval_hit_rate: number | null
  latency_ms: LatencySummary
  questions: QuestionReport[]
}

export type EvaluationOptions = {
  limit?: number
}

function rounded(value: number | undefined) {
  return value === undefined ? null : roundTo(value, 3)
}

/** Asks every labelled question in order and aggregates quality metrics. */
export async function runEvaluation(
  asker: Asker,
  labels: EvalLabel[],
  options: EvaluationOptions = {},
): Promise<EvaluationReport> {
  const selected = options.limit === undefined ? labels : labels.slice(0, Math.max(0, options.limit))
  const questions: QuestionReport[] = []

  for (const label of selected) {
    const started = performance.now()
    const response = await asker.ask(label.question)
    const latency = performance.now() - started

    const retrieved = retrievedSources(response)
    const relevant = new Set(label.relevant_sources)
    const scores = precisionRecall(retrieved, relevant)
    questions.push({
      question: label.question,
      latency_ms: roundTo(latency, 3),
      unsupported: isUnsupported(response),
      confidence: response.confidence_score,
      retrieved_sources: Array.from(retrieved).sort(),
      relevant_sources: Array.from(relevant).sort(),
      precision: rounded(scores?.precision),
      recall: rounded(scores?.recall),
    })
  }

  const labelled = questions.filter((item) => item.relevant_sources.length > 0)
  const hits = labelled.filter((item) => item.retrieved_sources.some((source) => item.relevant_sources.includes(source)))
  const precisions = questions.flatMap((item) => (item.precision === null ? [] : [item.precision]))
  const recalls = questions.flatMap((item) => (item.recall === null ? [] : [item.recall]))
  const unsupported = questions.filter((item) => item.unsupported).length

  const report: EvaluationReport = {
    num_questions: questions.length,
    hallucination_rate: questions.length === 0 ? 0 : roundTo(unsupported / questions.length, 3),
    retrieval_precision: rounded(mean(precisions)),
    retrieval_recall: rounded(mean(recalls)),
    retrieval_hit_rate: labelled.length === 0 ? null : roundTo(hits.length / labelled.length, 3),
    latency_ms: summarizeLatency(questions.map((item) => item.latency_ms)),
    questions,
  }

  log.info("evaluation finished", {
    questions: report.num_questions,
    hallucination_rate: report.hallucination_rate,
    precision: report.retrieval_precision,
    recall: report.retrieval_recall,
  })
  return report
}
