/**
 * Language model abstraction consumed by the orchestrator.
 */

export interface InvokeOptions {
  maxTokens: number;
  temperature: number;
}

/**
 * A remote language model taking a single prompt and answering with text.
 * Implementations reject with LLMUnavailableError on any failure,
 * including an empty answer.
 */
export interface LanguageModel {
  invoke(prompt: string, options: InvokeOptions): Promise<string>;
}
