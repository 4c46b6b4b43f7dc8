const SENTENCE_END_RE = /(?<=[.!?])\s+/

export const CHUNK_MIN_WORDS = 40
export const CHUNK_MAX_WORDS = 160
export const CHUNK_OVERLAP_WORDS = 30

export type ChunkingOptions = {
  minWords?: number
  maxWords?: number
  overlapWords?: number
}

function wordCount(input: string) {
  return input.split(/\s+/).filter(Boolean).length
}

export function splitSentences(input: string) {
  return input
    .split(SENTENCE_END_RE)
    .map((sentence) => sentence.trim())
    .filter(Boolean)
}

/**
 * Packs whole sentences into windows of up to `maxWords`. A window closes
 * only once it holds `minWords`; the next one starts with trailing sentences
 * of the previous window worth at most `overlapWords`.
 */
export function chunkText(input: string, options: ChunkingOptions = {}) {
  const maxWords = Math.max(1, options.maxWords ?? CHUNK_MAX_WORDS)
  const minWords = Math.min(maxWords, Math.max(0, options.minWords ?? CHUNK_MIN_WORDS))
  const overlapWords = Math.max(0, Math.min(maxWords - 1, options.overlapWords ?? CHUNK_OVERLAP_WORDS))

  const chunks: string[] = []
  let current: string[] = []
  let currentWords = 0

  for (const sentence of splitSentences(input)) {
    const words = wordCount(sentence)
    if (current.length > 0 && currentWords + words > maxWords && currentWords >= minWords) {
      chunks.push(current.join(" "))
      const carried: string[] = []
      let carriedWords = 0
      for (let index = current.length - 1; index >= 0; index--) {
        const previous = current[index] ?? ""
        const previousWords = wordCount(previous)
        if (carriedWords + previousWords > overlapWords) break
        carried.unshift(previous)
        carriedWords += previousWords
      }
      current = carried
      currentWords = carriedWords
    }
    current.push(sentence)
    currentWords += words
  }

  if (current.length > 0) {
    chunks.push(current.join(" "))
  }
  return chunks
}
