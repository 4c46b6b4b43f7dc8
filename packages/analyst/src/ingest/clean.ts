import { roundTo } from "@/util/text"

const NOISE_LINE_RE = /(^[\s.-]{3,}$)|(\.{4,})|(^page\s*\d+\b)|(^\d+\s*\/\s*\d+\b)/i
const ALNUM_RE = /[\p{L}\p{N}]/u
const SENTENCE_END_RE = /(?<=[.!?])\s+/
const SUMMARY_MIN_SENTENCE_CHARS = 20
const SUMMARY_FALLBACK_CHARS = 200

function countAlnum(input: string) {
  let count = 0
  for (const char of input) {
    if (ALNUM_RE.test(char)) count += 1
  }
  return count
}

/**
 * Drops table-of-contents leaders, page counters and near-empty lines, then
 * joins what is left into one whitespace-collapsed string.
 */
export function cleanChunkText(input: string) {
  const kept: string[] = []
  for (const line of input.split(/\r?\n/)) {
    const trimmed = line.trim()
    if (!trimmed) continue
    if (NOISE_LINE_RE.test(trimmed)) continue
    if (trimmed.length < 8 && countAlnum(trimmed) < 2) continue
    kept.push(trimmed)
  }
  return kept.join(" ").replace(/\s+/g, " ").trim()
}

/** First sentences longer than 20 characters, else the first 200 characters. */
export function chunkSummary(input: string, maxSentences = 2) {
  if (!input) return ""
  const sentences = input
    .split(SENTENCE_END_RE)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > SUMMARY_MIN_SENTENCE_CHARS)
  if (sentences.length === 0) {
    return input.slice(0, SUMMARY_FALLBACK_CHARS).trim()
  }
  return sentences.slice(0, maxSentences).join(" ")
}

/** Share of letters and digits, rounded to 3 decimals. */
export function textQuality(input: string) {
  const chars = Array.from(input)
  if (chars.length === 0) return 0
  return roundTo(countAlnum(input) / chars.length, 3)
}
