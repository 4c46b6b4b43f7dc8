import { ConfigError, getEnv, getIntEnv } from "@/config/config"
import { DEFAULT_GENERATION_TIMEOUT_MS } from "@/answer/types"
import { DENSE_OVERSAMPLE } from "@/search/types"

const DEFAULT_DEV_API_TOKEN = "dev-analyst-api-token"
const DEFAULT_PINECONE_NAMESPACE = "documents"
const DEFAULT_PORT = 3000

export function isProduction() {
  return process.env.NODE_ENV === "production"
}

export function resolveApiToken() {
  const token = getEnv("ANALYST_API_TOKEN")
  if (token) {
    return token
  }
  if (isProduction()) {
    throw new ConfigError("ANALYST_API_TOKEN", "ANALYST_API_TOKEN is required in production")
  }
  return DEFAULT_DEV_API_TOKEN
}

export function resolveLogLevelEnv() {
  return getEnv("ANALYST_LOG_LEVEL", "")
}

export function resolvePineconeEnv() {
  return {
    apiKey: getEnv("PINECONE_API_KEY", ""),
    indexName: getEnv("ANALYST_PINECONE_INDEX", ""),
    namespace: getEnv("ANALYST_PINECONE_NAMESPACE", DEFAULT_PINECONE_NAMESPACE),
  }
}

export function isPineconeEnabled() {
  const config = resolvePineconeEnv()
  return Boolean(config.apiKey && config.indexName)
}

export function isOpenAIEnabled() {
  return Boolean(getEnv("OPENAI_API_KEY"))
}

export function validatePineconeEnv() {
  const config = resolvePineconeEnv()
  if ((config.apiKey && !config.indexName) || (!config.apiKey && config.indexName)) {
    throw new ConfigError("ANALYST_PINECONE_INDEX", "PINECONE_API_KEY and ANALYST_PINECONE_INDEX must be configured together")
  }
  if (config.apiKey && !isOpenAIEnabled()) {
    throw new ConfigError("OPENAI_API_KEY", "OPENAI_API_KEY is required when Pinecone is enabled")
  }
}

export function resolveGenerationTimeoutMs() {
  return getIntEnv("ANALYST_GENERATION_TIMEOUT_MS", DEFAULT_GENERATION_TIMEOUT_MS, { min: 1_000, max: 600_000 })
}

export function resolveDenseOversample() {
  return getIntEnv("ANALYST_DENSE_OVERSAMPLE", DENSE_OVERSAMPLE, { min: 1, max: 20 })
}

export function resolveEvalLabelsPath() {
  return getEnv("ANALYST_EVAL_LABELS")
}

export function resolvePort() {
  return getIntEnv("PORT", DEFAULT_PORT, { min: 1, max: 65_535 })
}

export function validateServerEnv() {
  resolveApiToken()
  validatePineconeEnv()
  resolveGenerationTimeoutMs()
  resolveDenseOversample()
  resolvePort()
}
