import { z } from "zod"
import { clampConfidence } from "./confidence"
import type { EvidenceEntry } from "./types"

const FIELD_ALIASES = {
  answer: ["answer", "answer_text", "final_answer", "Answer"],
  evidence: ["evidence_used", "evidence", "citations", "Evidence Used", "Evidence"],
  missing: ["missing_information", "missing_info", "missing", "Missing Information"],
  confidence: ["confidence_score", "confidence", "Confidence Score", "Confidence"],
} as const

const EvidenceObject = z.object({
  source: z.string().optional(),
  excerpt: z.string().optional(),
  snippet: z.string().optional(),
  quote: z.string().optional(),
  text: z.string().optional(),
  score: z.number().finite().optional(),
})

export type NormalizedAnswer = {
  answer: string
  evidence: EvidenceEntry[]
  missing_information: string
  confidence: number
}

function pick(record: Record<string, unknown>, keys: readonly string[]) {
  for (const key of keys) {
    const value = record[key]
    if (value !== undefined && value !== null) return value
  }
  return undefined
}

function toMissing(value: unknown) {
  if (typeof value === "string") return value.trim()
  if (Array.isArray(value)) {
    return value
      .filter((item): item is string => typeof item === "string" && item.trim().length > 0)
      .map((item) => item.trim())
      .join("; ")
  }
  return ""
}

function toConfidence(value: unknown) {
  if (typeof value === "number") return clampConfidence(value)
  if (typeof value === "string" && value.trim().length > 0) {
    return clampConfidence(Number(value.trim()))
  }
  return 0
}

function toEvidence(value: unknown): EvidenceEntry[] {
  if (!Array.isArray(value)) return []
  return value.flatMap((item): EvidenceEntry[] => {
    if (typeof item === "string") {
      const source = item.trim()
      return source ? [{ source, excerpt: "", score: null }] : []
    }
    const parsed = EvidenceObject.safeParse(item)
    if (!parsed.success) return []
    const source = parsed.data.source?.trim()
    if (!source) return []
    return [
      {
        source,
        excerpt: (parsed.data.excerpt ?? parsed.data.snippet ?? parsed.data.quote ?? parsed.data.text ?? "").trim(),
        score: parsed.data.score ?? null,
      },
    ]
  })
}

/**
 * Maps the field-name variants models produce (`evidence` for
 * `evidence_used`, `confidence` for `confidence_score`, a list for
 * `missing_information`) onto one schema. Undefined when there is no answer.
 */
export function normalizeAnswerFields(record: Record<string, unknown>): NormalizedAnswer | undefined {
  const answer = pick(record, FIELD_ALIASES.answer)
  if (typeof answer !== "string" || answer.trim().length === 0) {
    return undefined
  }
  return {
    answer: answer.trim(),
    evidence: toEvidence(pick(record, FIELD_ALIASES.evidence)),
    missing_information: toMissing(pick(record, FIELD_ALIASES.missing)),
    confidence: toConfidence(pick(record, FIELD_ALIASES.confidence)),
  }
}

/** Accepts `manualA`, `manualA#3` or `[manualA#3]` for a known source. */
export function resolveSource(source: string, known: ReadonlySet<string>) {
  const bare = source.trim().replace(/^\[/, "").replace(/\]$/, "")
  if (known.has(bare)) return bare
  const hash = bare.lastIndexOf("#")
  if (hash > 0) {
    const prefix = bare.slice(0, hash)
    if (known.has(prefix)) return prefix
  }
  return undefined
}

/** Keeps evidence citing known sources only, up to `limit` entries. */
export function restrictEvidence(evidence: EvidenceEntry[], known: ReadonlySet<string>, limit: number) {
  const kept: EvidenceEntry[] = []
  for (const entry of evidence) {
    if (kept.length >= limit) break
    const source = resolveSource(entry.source, known)
    if (source) kept.push({ ...entry, source })
  }
  return kept
}
