import { Hono } from "hono"
import type { Analyst } from "@/analyst"
import { Log } from "@/util/log"
import { errorMessage } from "./errors"
import { registerAskRoutes } from "./routes/ask"
import { registerDocumentRoutes } from "./routes/documents"
import { registerEvaluateRoutes } from "./routes/evaluate"
import { registerGlobalRoutes } from "./routes/global"

const log = Log.create({ service: "server" })

export type AppOptions = {
  analyst: Analyst
  apiToken: string
  labelsPath?: string
}

export function setupRoutes(app: Hono, options: AppOptions) {
  registerGlobalRoutes(app, { apiToken: options.apiToken })
  registerAskRoutes(app, options.analyst.supervisor)
  registerDocumentRoutes(app, options.analyst.ingestor)
  registerEvaluateRoutes(app, options.analyst.supervisor, { labelsPath: options.labelsPath })

  app.notFound((c) => c.json({ error: "Not found" }, 404))
  app.onError((error, c) => {
    log.error("unhandled request error", { path: c.req.path, error })
    return c.json({ error: errorMessage(error) }, 500)
  })
  return app
}

export function createApp(options: AppOptions) {
  return setupRoutes(new Hono(), options)
}
