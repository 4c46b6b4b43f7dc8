import type { Hono } from "hono"
import type { Ingestor } from "@/ingest/service"
import { ingestErrorResponse } from "../errors"
import { documentInput } from "../schemas"

export function registerDocumentRoutes(app: Hono, ingestor: Ingestor) {
  app.post("/api/documents", async (c) => {
    let body: unknown
    try {
      body = await c.req.json()
    } catch {
      return c.json({ error: "Invalid JSON body" }, 400)
    }

    const parsed = documentInput.safeParse(body)
    if (!parsed.success) {
      return c.json({ error: "Invalid request", issues: parsed.error.issues }, 400)
    }

    try {
      const result = await ingestor.ingestDocument(parsed.data)
      return c.json(result, 201)
    } catch (error) {
      return ingestErrorResponse(c, error)
    }
  })

  app.delete("/api/documents", async (c) => {
    try {
      await ingestor.clear()
      return c.json({ ok: true })
    } catch (error) {
      return ingestErrorResponse(c, error)
    }
  })
}
