import type { AskResponse } from "@/supervisor"
import { roundTo } from "@/util/text"

export type LatencySummary = {
  avg: number
  min: number
  max: number
}

export function retrievedSources(response: AskResponse) {
  return new Set(response.top_chunks.map((chunk) => chunk.source))
}

/**
 * An answer counts as unsupported when it claims something (non-empty text,
 * confidence above 0) without citing any source that retrieval returned.
 * Refusals carry confidence 0 and are not counted.
 */
export function isUnsupported(response: AskResponse) {
  if (response.answer.trim().length === 0 || response.confidence_score <= 0) {
    return false
  }
  const retrieved = retrievedSources(response)
  return !response.evidence_used.some((entry) => retrieved.has(entry.source))
}

/** Undefined when nothing was retrieved or nothing is labelled relevant. */
export function precisionRecall(retrieved: ReadonlySet<string>, relevant: ReadonlySet<string>) {
  if (retrieved.size === 0 || relevant.size === 0) {
    return undefined
  }
  let hits = 0
  for (const source of retrieved) {
    if (relevant.has(source)) hits += 1
  }
  return {
    precision: hits / retrieved.size,
    recall: hits / relevant.size,
  }
}

export function mean(values: number[]) {
  if (values.length === 0) return undefined
  return values.reduce((sum, value) => sum + value, 0) / values.length
}

export function summarizeLatency(samples: number[]): LatencySummary {
  if (samples.length === 0) {
    return { avg: 0, min: 0, max: 0 }
  }
  return {
    avg: roundTo(mean(samples) ?? 0, 3),
    min: roundTo(Math.min(...samples), 3),
    max: roundTo(Math.max(...samples), 3),
  }
}
