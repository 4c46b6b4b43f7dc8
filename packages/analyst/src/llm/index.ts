import { createOpenAI } from "@ai-sdk/openai"
import { embedMany as sdkEmbedMany, generateText as sdkGenerateText } from "ai"
import { LLM_SCENE_DEFINITIONS } from "./scenes"
import type {
  EmbeddingSceneClient,
  EmbeddingSceneId,
  LanguageSceneClient,
  LanguageSceneId,
  LLMSceneId,
  LLMService,
  SceneBindingOptions,
} from "./types"

export type * from "./types"
export { LLM_SCENE_DEFINITIONS } from "./scenes"

type OpenAIProvider = ReturnType<typeof createOpenAI>

let openAIProviderCache: OpenAIProvider | undefined

function getOrCreateOpenAIProvider() {
  if (openAIProviderCache) {
    return openAIProviderCache
  }

  const apiKey = process.env.OPENAI_API_KEY?.trim()
  if (!apiKey) {
    throw new Error("OPENAI_API_KEY is not set")
  }

  const baseURL = process.env.OPENAI_BASE_URL?.trim() || undefined
  openAIProviderCache = createOpenAI({
    apiKey,
    baseURL,
  })
  return openAIProviderCache
}

export function resetLLMProvider() {
  openAIProviderCache = undefined
}

function createLanguageSceneClient(
  sceneId: LanguageSceneId,
  options?: SceneBindingOptions,
): LanguageSceneClient {
  const sceneDefinition = LLM_SCENE_DEFINITIONS.language[sceneId]
  const modelId = options?.modelId ?? sceneDefinition.modelId
  const model = getOrCreateOpenAIProvider()(modelId)
  const defaults = sceneDefinition.defaults ?? {}

  return {
    sceneId,
    modelId,
    async generateText(input) {
      const result = await sdkGenerateText({
        model,
        system: input.system,
        prompt: input.prompt,
        temperature: input.temperature ?? defaults.temperature,
        maxOutputTokens: input.maxOutputTokens ?? defaults.maxOutputTokens,
        abortSignal: input.abortSignal,
      })
      return { text: result.text }
    },
  }
}

function createEmbeddingSceneClient(
  sceneId: EmbeddingSceneId,
  options?: SceneBindingOptions,
): EmbeddingSceneClient {
  const sceneDefinition = LLM_SCENE_DEFINITIONS.embedding[sceneId]
  const modelId = options?.modelId ?? sceneDefinition.modelId
  const model = getOrCreateOpenAIProvider().textEmbeddingModel(modelId)

  return {
    sceneId,
    modelId,
    async embedMany(input) {
      const result = await sdkEmbedMany({
        model,
        values: input.values,
        abortSignal: input.abortSignal,
      })
      return { embeddings: result.embeddings }
    },
  }
}

function isLanguageSceneId(id: LLMSceneId): id is LanguageSceneId {
  return id in LLM_SCENE_DEFINITIONS.language
}

function isEmbeddingSceneId(id: LLMSceneId): id is EmbeddingSceneId {
  return id in LLM_SCENE_DEFINITIONS.embedding
}

function bindScene(sceneId: LanguageSceneId, options?: SceneBindingOptions): LanguageSceneClient
function bindScene(sceneId: EmbeddingSceneId, options?: SceneBindingOptions): EmbeddingSceneClient
function bindScene(sceneId: LLMSceneId, options?: SceneBindingOptions): LanguageSceneClient | EmbeddingSceneClient {
  if (isLanguageSceneId(sceneId)) {
    return createLanguageSceneClient(sceneId, options)
  }
  if (isEmbeddingSceneId(sceneId)) {
    return createEmbeddingSceneClient(sceneId, options)
  }
  throw new Error(`Unknown scene ID: ${sceneId}`)
}

export const LLM: LLMService = {
  for: bindScene,
  available() {
    return (process.env.OPENAI_API_KEY?.trim() ?? "").length > 0
  },
}
