import { getEnv } from "../src/config/config"
import { resolveApiToken } from "../src/server/env"
import { API_TOKEN_HEADER } from "../src/server/routes/global"

const DEFAULT_SERVER_URL = "http://localhost:3000"

export function serverURL() {
  return getEnv("ANALYST_SERVER_URL", DEFAULT_SERVER_URL).replace(/\/+$/, "")
}

export async function requestJSON(method: string, route: string, body?: unknown): Promise<unknown> {
  const response = await fetch(`${serverURL()}${route}`, {
    method,
    headers: {
      "content-type": "application/json",
      [API_TOKEN_HEADER]: resolveApiToken(),
    },
    body: body === undefined ? undefined : JSON.stringify(body),
  })
  const text = await response.text()
  let payload: unknown = text
  try {
    payload = JSON.parse(text)
  } catch {
    payload = { error: text }
  }
  if (!response.ok) {
    throw new Error(`${method} ${route} failed with ${response.status}: ${JSON.stringify(payload)}`)
  }
  return payload
}
