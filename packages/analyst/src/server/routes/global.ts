import type { Hono } from "hono"

export const API_TOKEN_HEADER = "x-analyst-token"

export function registerGlobalRoutes(app: Hono, options: { apiToken: string }) {
  app.get("/healthz", (c) => c.json({ status: "ok" }))

  app.use("/api/*", async (c, next) => {
    const incomingToken = c.req.header(API_TOKEN_HEADER)?.trim() ?? ""
    if (!incomingToken || incomingToken !== options.apiToken) {
      return c.json({ error: "Unauthorized request" }, 401)
    }
    return next()
  })
}
