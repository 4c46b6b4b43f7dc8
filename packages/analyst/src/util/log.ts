import { createWriteStream, type WriteStream } from "node:fs"
import fs from "node:fs/promises"
import path from "node:path"
import { Global } from "@/global"
import z from "zod"

export const LogLevel = z.enum(["DEBUG", "INFO", "WARN", "ERROR"])
export type LogLevel = z.infer<typeof LogLevel>

const levelPriority: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
}
const KEEP_LOG_FILES = 10
const LOG_FILE_RE = /^\d{4}-\d{2}-\d{2}T\d{6}\.log$/
const MAX_CAUSE_DEPTH = 10

type LogExtra = Record<string, unknown>

export type Logger = {
  debug(message?: unknown, extra?: LogExtra): void
  info(message?: unknown, extra?: LogExtra): void
  warn(message?: unknown, extra?: LogExtra): void
  error(message?: unknown, extra?: LogExtra): void
}

export interface LogOptions {
  /** Write to stderr instead of a file under the log directory. */
  print: boolean
  dev?: boolean
  level?: LogLevel
}

let level: LogLevel = "INFO"
let stream: WriteStream | undefined
let write = (line: string) => {
  process.stderr.write(line)
}
const loggers = new Map<string, Logger>()

export async function init(options: LogOptions) {
  if (options.level) level = options.level
  await close()
  if (options.print) {
    write = (line) => {
      process.stderr.write(line)
    }
    return
  }

  await Global.ensureGlobalDirs()
  await cleanup(Global.Path.log)
  const name = options.dev ? "dev.log" : `${new Date().toISOString().split(".")[0]?.replace(/:/g, "")}.log`
  const next = createWriteStream(path.join(Global.Path.log, name), { flags: "w" })
  stream = next
  write = (line) => {
    next.write(line)
  }
}

export async function close() {
  const current = stream
  stream = undefined
  if (!current) return
  await new Promise<void>((resolve) => current.end(resolve))
}

async function cleanup(dir: string) {
  const files = (await fs.readdir(dir)).filter((name) => LOG_FILE_RE.test(name)).sort()
  const stale = files.slice(0, Math.max(0, files.length - KEEP_LOG_FILES))
  await Promise.all(stale.map((name) => fs.rm(path.join(dir, name), { force: true })))
}

function formatError(error: Error, depth = 0): string {
  if (error.cause instanceof Error && depth < MAX_CAUSE_DEPTH) {
    return `${error.message} Caused by: ${formatError(error.cause, depth + 1)}`
  }
  return error.message
}

export function formatValue(value: unknown): string {
  if (value instanceof Error) return formatError(value)
  if (typeof value === "object" && value !== null) {
    try {
      return JSON.stringify(value)
    } catch {
      return "[unserializable]"
    }
  }
  return String(value)
}

/** `LEVEL timestamp key=value... message`, one line per entry. */
export function formatLine(entryLevel: LogLevel, tags: LogExtra, message: unknown, at = new Date()) {
  const fields = Object.entries(tags)
    .filter(([, value]) => value !== undefined && value !== null)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
  const text = message === undefined || message === null ? "" : formatValue(message)
  return [entryLevel.padEnd(5), at.toISOString().split(".")[0], ...fields, text]
    .filter((part) => part.length > 0)
    .join(" ") + "\n"
}

/** One logger per service tag; later calls with the same service share it. */
export function create(tags: LogExtra = {}) {
  const service = typeof tags.service === "string" ? tags.service : undefined
  const cached = service ? loggers.get(service) : undefined
  if (cached) return cached

  const emit = (entryLevel: LogLevel) => (message?: unknown, extra?: LogExtra) => {
    if (levelPriority[entryLevel] < levelPriority[level]) return
    write(formatLine(entryLevel, { ...tags, ...extra }, message))
  }
  const logger: Logger = {
    debug: emit("DEBUG"),
    info: emit("INFO"),
    warn: emit("WARN"),
    error: emit("ERROR"),
  }
  if (service) loggers.set(service, logger)
  return logger
}

export const Log = {
  Level: LogLevel,
  init,
  close,
  create,
}
