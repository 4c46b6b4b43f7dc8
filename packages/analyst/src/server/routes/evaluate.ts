import type { Hono } from "hono"
import { loadLabels } from "@/evaluation/labels"
import { runEvaluation } from "@/evaluation/runner"
import type { Supervisor } from "@/supervisor"
import { evaluationErrorResponse } from "../errors"
import { evaluateInput } from "../schemas"

export function registerEvaluateRoutes(app: Hono, supervisor: Supervisor, options: { labelsPath?: string }) {
  app.get("/api/evaluate", async (c) => {
    const parsed = evaluateInput.safeParse(c.req.query())
    if (!parsed.success) {
      return c.json({ error: "Invalid request", issues: parsed.error.issues }, 400)
    }

    try {
      const labels = await loadLabels(options.labelsPath)
      const report = await runEvaluation(supervisor, labels, { limit: parsed.data.limit })
      return c.json(report)
    } catch (error) {
      return evaluationErrorResponse(c, error)
    }
  })
}
