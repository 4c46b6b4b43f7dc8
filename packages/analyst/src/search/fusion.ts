import type { Candidate } from "./types"

function prefer(current: Candidate, next: Candidate) {
  if (next.score === null) return current
  if (current.score === null) return next
  return next.score > current.score ? next : current
}

/**
 * Merges both candidate lists into one set keyed by exact chunk text. Lexical
 * hits may describe the same passage under another id, so ids are not used.
 * The output order follows first appearance and is not a ranking.
 */
export function fuseCandidates(lexical: Candidate[], dense: Candidate[]) {
  const byText = new Map<string, Candidate>()
  for (const candidate of [...dense, ...lexical]) {
    const key = candidate.chunk.text
    const current = byText.get(key)
    byText.set(key, current ? prefer(current, candidate) : candidate)
  }
  return Array.from(byText.values())
}
