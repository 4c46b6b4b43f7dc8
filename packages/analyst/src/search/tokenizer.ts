const WORD_TOKEN_RE = /[\p{L}\p{N}_]+/gu
const CJK_RE = /\p{Script=Han}/u
const CJK_RUN_RE = /\p{Script=Han}+/gu

function splitCJKBigrams(input: string) {
  const chars = Array.from(input)
  if (chars.length === 1) return chars
  const result: string[] = []
  for (let i = 0; i < chars.length - 1; i += 1) {
    result.push(chars[i] + chars[i + 1])
  }
  return result
}

/**
 * Lower-cased word tokens. Runs of CJK characters carry no spaces, so they
 * become overlapping bigrams instead.
 */
export function tokenize(input: string) {
  const normalized = input.toLowerCase().normalize("NFKC")
  const words: string[] = []
  const bigrams: string[] = []

  for (const match of normalized.matchAll(WORD_TOKEN_RE)) {
    const token = match[0]
    if (!CJK_RE.test(token)) {
      words.push(token)
      continue
    }
    for (const part of token.split(CJK_RUN_RE)) {
      if (part.length > 0) words.push(part)
    }
    for (const run of token.match(CJK_RUN_RE) ?? []) {
      bigrams.push(...splitCJKBigrams(run))
    }
  }

  return [...words, ...bigrams]
}

/** Text the lexical index sees for a chunk: the summary when present. */
export function lexicalText(chunk: { summary?: string; text: string }) {
  const summary = chunk.summary?.trim() ?? ""
  return summary.length > 0 ? summary : chunk.text
}
