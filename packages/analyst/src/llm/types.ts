export type LanguageSceneId =
  | "answer.generate"
  | "rerank.score"

export type EmbeddingSceneId =
  | "retrieval.embedding"

export type LLMSceneId = LanguageSceneId | EmbeddingSceneId

export type LanguageCallDefaults = {
  temperature?: number
  maxOutputTokens?: number
}

export type LanguageSceneDefinition = {
  providerId: "openai"
  modelId: string
  defaults?: LanguageCallDefaults
}

export type EmbeddingSceneDefinition = {
  providerId: "openai"
  modelId: string
}

export type LLMSceneDefinitions = {
  language: Record<LanguageSceneId, LanguageSceneDefinition>
  embedding: Record<EmbeddingSceneId, EmbeddingSceneDefinition>
}

export type SceneBindingOptions = {
  modelId?: string
}

export type GenerateTextInput = {
  system?: string
  prompt: string
  maxOutputTokens?: number
  temperature?: number
  abortSignal?: AbortSignal
}

export type EmbedManyInput = {
  values: string[]
  abortSignal?: AbortSignal
}

export type LanguageSceneClient = {
  sceneId: LanguageSceneId
  modelId: string
  generateText(input: GenerateTextInput): Promise<{ text: string }>
}

export type EmbeddingSceneClient = {
  sceneId: EmbeddingSceneId
  modelId: string
  embedMany(input: EmbedManyInput): Promise<{ embeddings: number[][] }>
}

export interface LLMService {
  for(sceneId: LanguageSceneId, options?: SceneBindingOptions): LanguageSceneClient
  for(sceneId: EmbeddingSceneId, options?: SceneBindingOptions): EmbeddingSceneClient
  available(): boolean
}
