const SENTENCE_END_RE = /(?<=[.!?])\s+/

export function clipText(input: string, limit: number) {
  if (input.length <= limit) {
    return input
  }
  return input.slice(0, Math.max(0, limit))
}

export function collapseWhitespace(input: string) {
  return input.replace(/\s+/g, " ").trim()
}

/**
 * Collapses whitespace and, when the result is longer than `width`, drops
 * whole trailing words so that the kept words plus `placeholder` fit.
 */
export function shorten(input: string, width: number, placeholder = "...") {
  const flat = collapseWhitespace(input)
  if (flat.length <= width) {
    return flat
  }

  const budget = width - placeholder.length
  let kept = ""
  for (const word of flat.split(" ")) {
    const next = kept.length === 0 ? word : `${kept} ${word}`
    if (next.length > budget) break
    kept = next
  }
  return kept.length > 0 ? `${kept}${placeholder}` : placeholder.slice(0, width)
}

export function firstSentence(input: string) {
  const flat = collapseWhitespace(input)
  return flat.split(SENTENCE_END_RE)[0] ?? ""
}

export function roundTo(value: number, digits: number) {
  const factor = 10 ** digits
  return Math.round(value * factor) / factor
}
