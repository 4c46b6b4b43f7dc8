import { afterEach, expect, test } from "vitest"
import { ConfigError, getEnv, getIntEnv } from "@/config/config"
import {
  isPineconeEnabled,
  resolveApiToken,
  resolveDenseOversample,
  resolveGenerationTimeoutMs,
  resolvePineconeEnv,
  validatePineconeEnv,
} from "@/server/env"

const KEYS = [
  "NODE_ENV",
  "ANALYST_API_TOKEN",
  "PINECONE_API_KEY",
  "ANALYST_PINECONE_INDEX",
  "ANALYST_PINECONE_NAMESPACE",
  "OPENAI_API_KEY",
  "ANALYST_GENERATION_TIMEOUT_MS",
  "ANALYST_DENSE_OVERSAMPLE",
  "ANALYST_TEST_INT",
]
const saved = new Map(KEYS.map((key) => [key, process.env[key]]))

function clearEnv() {
  for (const key of KEYS) delete process.env[key]
}

afterEach(() => {
  for (const [key, value] of saved) {
    if (value === undefined) delete process.env[key]
    else process.env[key] = value
  }
})

test("getEnv trims and falls back", () => {
  clearEnv()
  process.env.ANALYST_API_TOKEN = "  test-secret  "
  expect(getEnv("ANALYST_API_TOKEN")).toBe("test-secret")
  process.env.ANALYST_API_TOKEN = "   "
  expect(getEnv("ANALYST_API_TOKEN")).toBeUndefined()
  expect(getEnv("ANALYST_API_TOKEN", "fallback")).toBe("fallback")
})

test("getIntEnv enforces integer bounds", () => {
  clearEnv()
  expect(getIntEnv("ANALYST_TEST_INT", 7, { min: 1, max: 10 })).toBe(7)
  process.env.ANALYST_TEST_INT = "4"
  expect(getIntEnv("ANALYST_TEST_INT", 7, { min: 1, max: 10 })).toBe(4)
  process.env.ANALYST_TEST_INT = "2.5"
  expect(() => getIntEnv("ANALYST_TEST_INT", 7, { min: 1, max: 10 })).toThrow(ConfigError)
  process.env.ANALYST_TEST_INT = "11"
  expect(() => getIntEnv("ANALYST_TEST_INT", 7, { min: 1, max: 10 })).toThrow(
    "ANALYST_TEST_INT must be an integer in [1, 10], got: 11",
  )
})

test("the api token has a development default but is required in production", () => {
  clearEnv()
  expect(resolveApiToken()).toBe("dev-analyst-api-token")
  process.env.NODE_ENV = "production"
  expect(() => resolveApiToken()).toThrow("ANALYST_API_TOKEN is required in production")
  process.env.ANALYST_API_TOKEN = "test-secret"
  expect(resolveApiToken()).toBe("test-secret")
})

test("pinecone settings must come together with an embedding key", () => {
  clearEnv()
  expect(isPineconeEnabled()).toBe(false)
  expect(resolvePineconeEnv().namespace).toBe("documents")
  expect(() => validatePineconeEnv()).not.toThrow()

  process.env.PINECONE_API_KEY = "test-secret"
  expect(() => validatePineconeEnv()).toThrow("must be configured together")

  process.env.ANALYST_PINECONE_INDEX = "analyst-test"
  expect(isPineconeEnabled()).toBe(true)
  expect(() => validatePineconeEnv()).toThrow("OPENAI_API_KEY is required when Pinecone is enabled")

  process.env.OPENAI_API_KEY = "test-secret"
  expect(() => validatePineconeEnv()).not.toThrow()
})

test("tuning values are read within bounds", () => {
  clearEnv()
  expect(resolveGenerationTimeoutMs()).toBe(30_000)
  expect(resolveDenseOversample()).toBe(3)
  process.env.ANALYST_DENSE_OVERSAMPLE = "5"
  expect(resolveDenseOversample()).toBe(5)
  process.env.ANALYST_GENERATION_TIMEOUT_MS = "10"
  expect(() => resolveGenerationTimeoutMs()).toThrow(ConfigError)
})
