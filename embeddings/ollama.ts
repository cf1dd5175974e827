/**
 * Ollama embedding provider. Talks to a local Ollama server.
 * Default model: nomic-embed-text (768 dimensions)
 */

import { z } from "zod";
import type { EmbeddingProvider } from "./provider.js";
import { EmbeddingUnavailableError, errorMessage } from "../core/errors.js";

const DEFAULT_URL = "http://localhost:11434";
const DEFAULT_MODEL = "nomic-embed-text";
const DEFAULT_DIMENSIONS = 768;
const DEFAULT_TIMEOUT_MS = 30000;

const MODEL_DIMENSIONS: Record<string, number> = {
  "nomic-embed-text": 768,
  "mxbai-embed-large": 1024,
  "all-minilm": 384,
};

export interface OllamaEmbeddingConfig {
  /** Ollama server URL (default: http://localhost:11434) */
  url?: string;
  model?: string;
  dimensions?: number;
  timeoutMs?: number;
}

const OllamaEmbeddingSchema = z.object({
  embedding: z.array(z.number()).min(1),
});

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  private readonly url: string;
  private readonly model: string;
  private readonly dimensions: number;
  private readonly timeoutMs: number;

  constructor(config: OllamaEmbeddingConfig = {}) {
    this.url = (config.url ?? DEFAULT_URL).replace(/\/+$/, "");
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? MODEL_DIMENSIONS[this.model] ?? DEFAULT_DIMENSIONS;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async embed(text: string): Promise<number[]> {
    let response: Response;
    try {
      response = await fetch(`${this.url}/api/embeddings`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ model: this.model, prompt: text }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new EmbeddingUnavailableError("ollama", errorMessage(error));
    }

    if (!response.ok) {
      throw new EmbeddingUnavailableError("ollama", `HTTP ${response.status}`);
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw new EmbeddingUnavailableError("ollama", `invalid JSON response: ${errorMessage(error)}`);
    }

    const parsed = OllamaEmbeddingSchema.safeParse(data);
    if (!parsed.success) {
      throw new EmbeddingUnavailableError("ollama", "response has no embedding");
    }
    return parsed.data.embedding;
  }

  /**
   * Ollama's /api/embeddings takes one prompt per request, so texts are
   * embedded sequentially.
   */
  async embedBatch(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (const text of texts) {
      vectors.push(await this.embed(text));
    }
    return vectors;
  }

  getDimensions(): number {
    return this.dimensions;
  }

  getModelName(): string {
    return this.model;
  }
}
