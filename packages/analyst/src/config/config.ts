import { existsSync } from "node:fs"
import path from "node:path"
import { fileURLToPath } from "node:url"
import { config as loadEnv } from "dotenv"

function findEnv(start: string) {
  let dir = start
  while (true) {
    const file = path.join(dir, ".env")
    if (existsSync(file)) return file
    const parent = path.dirname(dir)
    if (parent === dir) return
    dir = parent
  }
}

const explicitPath = process.env.ANALYST_ENV_PATH?.trim() || undefined
const packageRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..")
const envPath = explicitPath ?? findEnv(process.cwd()) ?? findEnv(packageRoot)

// Values already present in process.env win over the file.
const loaded = envPath ? loadEnv({ path: envPath, override: false }) : undefined

/** Misconfiguration found at startup; aborts the process. */
export class ConfigError extends Error {
  constructor(
    public readonly key: string,
    message: string,
  ) {
    super(message)
    this.name = "ConfigError"
  }
}

export function getEnv(key: string): string | undefined
export function getEnv(key: string, fallback: string): string
export function getEnv(key: string, fallback?: string) {
  const raw = process.env[key]?.trim()
  if (raw) return raw
  return fallback
}

export function getIntEnv(key: string, fallback: number, bounds: { min: number; max: number }) {
  const raw = getEnv(key)
  if (raw === undefined) return fallback
  const parsed = Number(raw)
  if (!Number.isInteger(parsed) || parsed < bounds.min || parsed > bounds.max) {
    throw new ConfigError(key, `${key} must be an integer in [${bounds.min}, ${bounds.max}], got: ${raw}`)
  }
  return parsed
}

export const config = {
  envPath,
  loadedKeys: Object.keys(loaded?.parsed ?? {}),
}
