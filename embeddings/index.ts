import type { ResolvedConfig } from "../config.js";
import { OllamaEmbeddingProvider } from "./ollama.js";
import { OpenAIEmbeddingProvider } from "./openai.js";
import type { EmbeddingProvider } from "./provider.js";

export type { EmbeddingProvider } from "./provider.js";
export { OllamaEmbeddingProvider } from "./ollama.js";
export { OpenAIEmbeddingProvider } from "./openai.js";

/**
 * Build the embedding provider selected by `embedding.provider`.
 */
export function createEmbeddingProvider(config: ResolvedConfig["embedding"]): EmbeddingProvider {
  switch (config.provider) {
    case "openai":
      return new OpenAIEmbeddingProvider({
        apiKey: config.apiKey ?? "",
        model: config.model,
        baseUrl: config.url,
        dimensions: config.dimensions,
        timeoutMs: config.timeoutMs,
      });
    case "ollama":
      return new OllamaEmbeddingProvider({
        url: config.url,
        model: config.model,
        dimensions: config.dimensions,
        timeoutMs: config.timeoutMs,
      });
  }
}
