import { readFileSync } from "node:fs"
import { fileURLToPath } from "node:url"
import type { Candidate } from "@/search/types"
import { clipText } from "@/util/text"
import { CONTEXT_CANDIDATE_LIMIT, CONTEXT_CHAR_LIMIT } from "./types"

const ANSWER_PROMPT_TEMPLATE = readFileSync(
  fileURLToPath(new URL("./answer-prompt.txt", import.meta.url)),
  "utf8",
)

export function citationLabel(candidate: Candidate) {
  return `[${candidate.chunk.source}#${candidate.chunk.chunk_index}]`
}

export function buildContextBlock(
  candidates: Candidate[],
  limit = CONTEXT_CANDIDATE_LIMIT,
  charLimit = CONTEXT_CHAR_LIMIT,
) {
  return candidates
    .slice(0, limit)
    .map((candidate) => `${citationLabel(candidate)} ${clipText(candidate.chunk.text.trim(), charLimit)}`)
    .join("\n\n---\n\n")
}

export function buildAnswerPrompt(queryText: string, candidates: Candidate[]) {
  const context = candidates.slice(0, CONTEXT_CANDIDATE_LIMIT)
  return ANSWER_PROMPT_TEMPLATE
    .replaceAll("{{COUNT}}", String(context.length))
    .replaceAll("{{QUESTION}}", () => queryText.trim())
    .replaceAll("{{CONTEXT}}", () => buildContextBlock(context))
}
