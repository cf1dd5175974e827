/**
 * Embedding provider abstraction for vector generation.
 * Implemented by a local Ollama server and the OpenAI embeddings API.
 */

/**
 * Interface for embedding providers that generate vector representations of text.
 * Implementations throw EmbeddingUnavailableError on any failure.
 */
export interface EmbeddingProvider {
  /**
   * Generate an embedding vector for a single text input.
   */
  embed(text: string): Promise<number[]>;

  /**
   * Generate embedding vectors for multiple texts, in input order.
   */
  embedBatch(texts: string[]): Promise<number[][]>;

  /**
   * Dimensionality of the vectors this provider produces.
   */
  getDimensions(): number;

  /**
   * Model identifier (e.g. 'nomic-embed-text', 'text-embedding-3-small').
   */
  getModelName(): string;
}
