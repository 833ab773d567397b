import type { AppConfig, ProviderName } from "@docweave/types";
import type { IModelProvider } from "./model-provider.interface.js";
import { OllamaProvider } from "./ollama-provider.js";
import { OpenAIProvider } from "./openai-provider.js";
import { GeminiProvider } from "./gemini-provider.js";
import { CohereProvider } from "./cohere-provider.js";

export type ProviderRegistry = ReadonlyMap<ProviderName, IModelProvider>;

export type ProviderRegistryConfig = Pick<
  AppConfig,
  "embeddings" | "ollama" | "openai" | "gemini" | "cohere"
>;

/** Environment variable holding each remote provider's credentials. */
export const API_KEY_VARIABLES: Record<Exclude<ProviderName, "ollama">, string> = {
  openai: "OPENAI_API_KEY",
  gemini: "GOOGLE_API_KEY",
  cohere: "COHERE_API_KEY",
};

/**
 * Builds every provider the configuration can serve. Ollama is always
 * registered; a remote provider only when its API key is set.
 */
export function createProviderRegistry(config: ProviderRegistryConfig): ProviderRegistry {
  const { dimensions } = config.embeddings;
  const registry = new Map<ProviderName, IModelProvider>();

  registry.set(
    "ollama",
    new OllamaProvider({
      baseUrl: config.ollama.baseUrl,
      model: config.ollama.embedModel,
      llmModel: config.ollama.llmModel,
      dimensions,
    }),
  );

  if (config.openai.apiKey) {
    registry.set(
      "openai",
      new OpenAIProvider({
        apiKey: config.openai.apiKey,
        model: config.openai.embedModel,
        llmModel: config.openai.llmModel,
        dimensions,
      }),
    );
  }

  if (config.gemini.apiKey) {
    registry.set(
      "gemini",
      new GeminiProvider({
        apiKey: config.gemini.apiKey,
        model: config.gemini.embedModel,
        llmModel: config.gemini.llmModel,
        dimensions,
      }),
    );
  }

  if (config.cohere.apiKey) {
    registry.set(
      "cohere",
      new CohereProvider({
        apiKey: config.cohere.apiKey,
        model: config.cohere.embedModel,
        llmModel: config.cohere.llmModel,
        dimensions: config.cohere.embedDimensions,
      }),
    );
  }

  return registry;
}
