export {
  AnswerSynthesizer,
  emptyAnswer,
  evidenceFromCandidates,
  fallbackAnswer,
  pickTopCandidate,
  rankingScore,
  NO_MATCH_ANSWER,
  NO_MATCH_NOTE,
  PARSE_FAILURE_NOTE,
  THIN_EVIDENCE_NOTE,
} from "./synthesizer"
export type { AnswerSynthesizerOptions } from "./synthesizer"
export { clampConfidence, heuristicConfidence } from "./confidence"
export { normalizeAnswerFields, resolveSource, restrictEvidence } from "./normalize"
export type { NormalizedAnswer } from "./normalize"
export { balancedBlock, extractStructured, isRecord, repairQuotes } from "./parse"
export type { StructuredMethod, StructuredOutput } from "./parse"
export { buildAnswerPrompt, buildContextBlock, citationLabel } from "./prompt"
export * from "./types"
