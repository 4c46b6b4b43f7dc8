export { DEFAULT_LABELS_PATH, EvalLabel, EvalLabels, EvaluationError, loadLabels, parseLabels } from "./labels"
export type { EvaluationErrorCode } from "./labels"
export { isUnsupported, mean, precisionRecall, retrievedSources, summarizeLatency } from "./metrics"
export type { LatencySummary } from "./metrics"
export { runEvaluation } from "./runner"
export type { Asker, EvaluationOptions, EvaluationReport, QuestionReport } from "./runner"
