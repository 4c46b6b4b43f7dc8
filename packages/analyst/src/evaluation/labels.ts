import { readFile } from "node:fs/promises"
import { fileURLToPath } from "node:url"
import { z } from "zod"

export const DEFAULT_LABELS_PATH = fileURLToPath(new URL("../../data/eval-labels.json", import.meta.url))

export const EvalLabel = z.object({
  question: z.string().trim().min(1),
  answer: z.string().optional(),
  relevant_sources: z.array(z.string().min(1)).default([]),
})
export type EvalLabel = z.infer<typeof EvalLabel>

export const EvalLabels = z.array(EvalLabel)

export type EvaluationErrorCode = "LABELS_NOT_FOUND" | "LABELS_INVALID" | "LABELS_EMPTY"

export class EvaluationError extends Error {
  constructor(
    public readonly code: EvaluationErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = "EvaluationError"
  }
}

function isMissingFile(error: unknown) {
  return error instanceof Error && "code" in error && error.code === "ENOENT"
}

export function parseLabels(input: unknown) {
  const parsed = EvalLabels.safeParse(input)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new EvaluationError("LABELS_INVALID", `Invalid labels at ${issue?.path.join(".") ?? "?"}: ${issue?.message ?? "unknown"}`, {
      cause: parsed.error,
    })
  }
  if (parsed.data.length === 0) {
    throw new EvaluationError("LABELS_EMPTY", "The labels file has no questions")
  }
  return parsed.data
}

/** Reads `[{ question, answer?, relevant_sources }]` from a JSON file. */
export async function loadLabels(path = DEFAULT_LABELS_PATH) {
  let text: string
  try {
    text = await readFile(path, "utf8")
  } catch (error) {
    if (isMissingFile(error)) {
      throw new EvaluationError("LABELS_NOT_FOUND", `Labels file not found: ${path}`, { cause: error })
    }
    throw error
  }

  let data: unknown
  try {
    data = JSON.parse(text)
  } catch (error) {
    throw new EvaluationError("LABELS_INVALID", `Labels file is not valid JSON: ${path}`, { cause: error })
  }
  return parseLabels(data)
}
