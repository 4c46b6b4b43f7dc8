import { serve } from "@hono/node-server"
import { createAnalystFromEnv } from "@/analyst"
import { Log } from "@/util/log"
import { resolveApiToken, resolveEvalLabelsPath, resolveLogLevelEnv, resolvePort, validateServerEnv } from "./env"
import { createApp } from "./route"

async function main() {
  const isDev = process.env.NODE_ENV !== "production"
  const levelResult = Log.Level.safeParse(resolveLogLevelEnv())
  await Log.init({
    print: isDev,
    dev: isDev,
    level: levelResult.success ? levelResult.data : undefined,
  })

  validateServerEnv()

  const analyst = createAnalystFromEnv()
  await analyst.init()

  const app = createApp({
    analyst,
    apiToken: resolveApiToken(),
    labelsPath: resolveEvalLabelsPath(),
  })
  const log = Log.create({ service: "server" })
  const port = resolvePort()
  const server = serve({ port, fetch: app.fetch }, (info) => {
    log.info("Started server.", { url: `http://localhost:${info.port}` })
  })

  const shutdown = (signal: string) => {
    log.info("Shutting down server", { signal })
    server.close(() => {
      analyst
        .teardown()
        .then(() => Log.close())
        .catch((error: unknown) => {
          console.error(error)
          process.exitCode = 1
        })
    })
  }

  process.on("SIGINT", () => shutdown("SIGINT"))
  process.on("SIGTERM", () => shutdown("SIGTERM"))
}

main().catch((error) => {
  console.error(error)
  process.exit(1)
})
