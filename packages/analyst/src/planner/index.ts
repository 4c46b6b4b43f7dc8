import { z } from "zod"
import { RetrievalStrategy } from "@/search/types"
import { Log } from "@/util/log"

const log = Log.create({ service: "planner" })

export const Intent = z.enum(["factual", "reasoning", "comparison", "multi-hop", "missing_data"])
export type Intent = z.infer<typeof Intent>

export const RetrievalPlan = z.object({
  intent: Intent,
  strategy: RetrievalStrategy,
  chunk_budget: z.number().int().min(1),
  query_text: z.string(),
})
export type RetrievalPlan = z.infer<typeof RetrievalPlan>

type IntentRule = {
  intent: Exclude<Intent, "factual">
  keywords: readonly string[]
  chunkBudget: number
}

/** Evaluated in order; the first rule with a matching keyword wins. */
export const INTENT_RULES: readonly IntentRule[] = [
  {
    intent: "comparison",
    keywords: ["compare", "compared", "comparison", "versus", "vs", "difference", "differences", "which is better"],
    chunkBudget: 8,
  },
  {
    intent: "reasoning",
    keywords: ["why", "how", "explain", "cause", "causes", "reason", "reasons"],
    chunkBudget: 12,
  },
  {
    intent: "multi-hop",
    keywords: ["multi-step", "multi hop", "multi-hop", "chain"],
    chunkBudget: 15,
  },
  {
    intent: "missing_data",
    keywords: ["missing", "not contained", "unknown"],
    chunkBudget: 10,
  },
]

const SHORT_QUESTION_WORDS = 8
const SHORT_FACTUAL_BUDGET = 5
const LONG_FACTUAL_BUDGET = 8

/** Lower-cased words separated by single spaces, padded for whole-word lookups. */
function searchable(question: string) {
  const words = question
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s-]+/gu, " ")
    .split(/\s+/)
    .filter(Boolean)
  return { text: ` ${words.join(" ")} `, wordCount: words.length }
}

export function defaultPlan(queryText = ""): RetrievalPlan {
  return {
    intent: "factual",
    strategy: "hybrid",
    chunk_budget: SHORT_FACTUAL_BUDGET,
    query_text: queryText,
  }
}

/**
 * Classifies a question with the keyword table. The plan always carries the
 * question verbatim as its query text.
 */
export function analyze(question: string): RetrievalPlan {
  if (question.trim().length === 0) {
    log.warn("empty question, using default plan")
    return defaultPlan()
  }

  const { text, wordCount } = searchable(question)
  const rule = INTENT_RULES.find((candidate) => candidate.keywords.some((keyword) => text.includes(` ${keyword} `)))
  const plan: RetrievalPlan = rule
    ? { intent: rule.intent, strategy: "hybrid", chunk_budget: rule.chunkBudget, query_text: question }
    : {
        intent: "factual",
        strategy: "hybrid",
        chunk_budget: wordCount < SHORT_QUESTION_WORDS ? SHORT_FACTUAL_BUDGET : LONG_FACTUAL_BUDGET,
        query_text: question,
      }

  log.debug("planned", { intent: plan.intent, budget: plan.chunk_budget })
  return plan
}
