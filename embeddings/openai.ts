/**
 * OpenAI embedding provider for cloud-based vector generation.
 * Default model: text-embedding-3-small (1536 dimensions)
 */

import { z } from "zod";
import type { EmbeddingProvider } from "./provider.js";
import { EmbeddingUnavailableError, errorMessage } from "../core/errors.js";

const DEFAULT_MODEL = "text-embedding-3-small";
const DEFAULT_DIMENSIONS = 1536;
const DEFAULT_BASE_URL = "https://api.openai.com/v1";
const DEFAULT_TIMEOUT_MS = 30000;

// Model dimension mapping for OpenAI embedding models
const MODEL_DIMENSIONS: Record<string, number> = {
  "text-embedding-3-small": 1536,
  "text-embedding-3-large": 3072,
  "text-embedding-ada-002": 1536,
};

/**
 * Configuration options for the OpenAI embedding provider.
 */
export interface OpenAIEmbeddingConfig {
  /** OpenAI API key. Required for authentication. */
  apiKey: string;
  /** Defaults to text-embedding-3-small */
  model?: string;
  /** API base URL, for OpenAI-compatible servers */
  baseUrl?: string;
  /** Overrides the dimension table lookup */
  dimensions?: number;
  timeoutMs?: number;
}

const EmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number(),
      embedding: z.array(z.number()),
    })
  ),
});

const ErrorResponseSchema = z.object({
  error: z.object({ message: z.string() }),
});

type EmbeddingResponse = z.infer<typeof EmbeddingResponseSchema>;

/**
 * OpenAI embedding provider for cloud-based embeddings.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly dimensions: number;
  private readonly timeoutMs: number;

  constructor(config: OpenAIEmbeddingConfig) {
    if (!config.apiKey) {
      throw new EmbeddingUnavailableError("openai", "API key is required");
    }

    this.apiKey = config.apiKey;
    this.model = config.model ?? DEFAULT_MODEL;
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.dimensions = config.dimensions ?? MODEL_DIMENSIONS[this.model] ?? DEFAULT_DIMENSIONS;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Make a request to the embeddings endpoint.
   */
  private async request(input: string | string[]): Promise<EmbeddingResponse> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/embeddings`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({ model: this.model, input }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new EmbeddingUnavailableError("openai", errorMessage(error));
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw new EmbeddingUnavailableError("openai", `invalid JSON response: ${errorMessage(error)}`);
    }

    if (!response.ok) {
      const parsedError = ErrorResponseSchema.safeParse(data);
      const detail = parsedError.success ? parsedError.data.error.message : response.statusText;
      switch (response.status) {
        case 401:
          throw new EmbeddingUnavailableError("openai", `authentication failed: ${detail}`);
        case 429:
          throw new EmbeddingUnavailableError("openai", `rate limit exceeded: ${detail}`);
        default:
          throw new EmbeddingUnavailableError("openai", `HTTP ${response.status}: ${detail}`);
      }
    }

    const parsed = EmbeddingResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new EmbeddingUnavailableError("openai", "unexpected response shape");
    }
    return parsed.data;
  }

  async embed(text: string): Promise<number[]> {
    const response = await this.request(text);
    if (response.data.length === 0) {
      throw new EmbeddingUnavailableError("openai", "empty embedding data");
    }
    return response.data[0].embedding;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const response = await this.request(texts);
    if (response.data.length !== texts.length) {
      throw new EmbeddingUnavailableError(
        "openai",
        `returned ${response.data.length} embeddings, expected ${texts.length}`
      );
    }

    // OpenAI may return items out of order
    const sorted = response.data.slice().sort((a, b) => a.index - b.index);
    return sorted.map((item) => item.embedding);
  }

  getDimensions(): number {
    return this.dimensions;
  }

  getModelName(): string {
    return this.model;
  }
}
