export { createAnalyst, createAnalystFromEnv } from "./analyst"
export type { Analyst, AnalystOptions } from "./analyst"
export * from "./answer"
export * from "./evaluation"
export * from "./ingest"
export { analyze, defaultPlan, Intent, INTENT_RULES, RetrievalPlan } from "./planner"
export * from "./search"
export * from "./supervisor"
export * from "./vectorstore"
export { createCrossEncoder, createEmbedder, createGenerator, createHashEmbedder } from "./llm/adapters"
export { createApp } from "./server/route"
