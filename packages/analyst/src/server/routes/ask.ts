import type { Hono } from "hono"
import type { Supervisor } from "@/supervisor"
import { askInput } from "../schemas"

export function registerAskRoutes(app: Hono, supervisor: Supervisor) {
  app.post("/api/ask", async (c) => {
    let body: unknown
    try {
      body = await c.req.json()
    } catch {
      return c.json({ error: "Invalid JSON body" }, 400)
    }

    const parsed = askInput.safeParse(body)
    if (!parsed.success) {
      return c.json({ error: "Invalid request", issues: parsed.error.issues }, 400)
    }

    const result = await supervisor.ask(parsed.data.question, { signal: c.req.raw.signal })
    return c.json(result)
  })
}
