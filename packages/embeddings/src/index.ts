export type {
  IModelProvider,
  ProviderKind,
  EmbedCallOptions,
  GenerateTextOptions,
} from "./model-provider.interface.js";
export { OllamaProvider } from "./ollama-provider.js";
export type { OllamaProviderConfig } from "./ollama-provider.js";
export { OpenAIProvider } from "./openai-provider.js";
export type { OpenAIProviderConfig } from "./openai-provider.js";
export { GeminiProvider } from "./gemini-provider.js";
export type { GeminiProviderConfig } from "./gemini-provider.js";
export { CohereProvider } from "./cohere-provider.js";
export type { CohereProviderConfig } from "./cohere-provider.js";
export { createProviderRegistry, API_KEY_VARIABLES } from "./factory.js";
export type { ProviderRegistry, ProviderRegistryConfig } from "./factory.js";
export { EmbeddingGateway, zeroVectors } from "./embedding-gateway.js";
export type {
  EmbeddingBatch,
  EmbeddingGatewayOptions,
  EmbedOptions,
  GatewayTextOptions,
  ProviderDescription,
} from "./embedding-gateway.js";
export { parseRetryAfter, errorForStatus, toProviderError } from "./provider-errors.js";
