import type { Candidate } from "@/search/types"
import { roundTo } from "@/util/text"

export function clampConfidence(value: number) {
  if (!Number.isFinite(value)) return 0
  return roundTo(Math.min(1, Math.max(0, value)), 3)
}

/**
 * Fallback confidence. With retrieval scores: mean relevance weighted at 0.85
 * plus up to 0.15 for corroborating volume. Without: volume alone, capped at
 * 0.85.
 */
export function heuristicConfidence(candidates: Candidate[]) {
  const count = candidates.length
  if (count === 0) return 0

  const scores = candidates.flatMap((candidate) => (candidate.score === null ? [] : [candidate.score]))
  if (scores.length > 0) {
    const mean = scores.reduce((sum, score) => sum + score, 0) / scores.length
    const clamped = Math.min(1, Math.max(0, mean))
    return clampConfidence(clamped * 0.85 + Math.min(0.15, 0.03 * count))
  }
  return clampConfidence(Math.min(0.85, 0.25 + 0.05 * count))
}
