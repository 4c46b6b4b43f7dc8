import { afterEach, expect, test, vi } from "vitest"
import { Log, formatLine, formatValue } from "@/util/log"

afterEach(() => {
  vi.restoreAllMocks()
})

test("formatLine writes level, timestamp, tags and message", () => {
  const at = new Date("2026-01-02T03:04:05.678Z")
  expect(formatLine("WARN", { service: "search.dense", dropped: 2, missing: undefined }, "dropped matches", at)).toBe(
    "WARN  2026-01-02T03:04:05 service=search.dense dropped=2 dropped matches\n",
  )
  expect(formatLine("ERROR", {}, undefined, at)).toBe("ERROR 2026-01-02T03:04:05\n")
})

test("formatValue follows error causes and serializes objects", () => {
  expect(formatValue(new Error("outer", { cause: new Error("inner") }))).toBe("outer Caused by: inner")
  expect(formatValue({ a: 1 })).toBe('{"a":1}')
  const circular: Record<string, unknown> = {}
  circular.self = circular
  expect(formatValue(circular)).toBe("[unserializable]")
})

test("loggers are shared per service and honour the level", () => {
  const writes: string[] = []
  vi.spyOn(process.stderr, "write").mockImplementation((chunk: unknown) => {
    writes.push(String(chunk))
    return true
  })

  const logger = Log.create({ service: "test.log" })
  expect(Log.create({ service: "test.log" })).toBe(logger)

  logger.debug("hidden")
  logger.info("shown", { count: 1 })

  expect(writes).toHaveLength(1)
  expect(writes[0]).toMatch(/^INFO  \S+ service=test\.log count=1 shown\n$/)
})
