import type { LLMSceneDefinitions } from "./types"

export const LLM_SCENE_DEFINITIONS: LLMSceneDefinitions = {
  language: {
    "answer.generate": {
      providerId: "openai",
      modelId: "gpt-4o-mini",
      defaults: {
        temperature: 0.2,
        maxOutputTokens: 800,
      },
    },
    "rerank.score": {
      providerId: "openai",
      modelId: "gpt-4o-mini",
      defaults: {
        temperature: 0,
        maxOutputTokens: 600,
      },
    },
  },
  embedding: {
    "retrieval.embedding": {
      providerId: "openai",
      modelId: "text-embedding-3-small",
    },
  },
}
