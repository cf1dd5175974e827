/**
 * HTTP language model client.
 *
 * Works with chat endpoints that take `{messages, max_tokens, temperature,
 * stream}` and answer in one of the common shapes: a bare `{response}`,
 * OpenAI-style `{choices: [{message: {content}}]}`, or `{content}`.
 */

import { z } from "zod";
import type { InvokeOptions, LanguageModel } from "./provider.js";
import { LLMUnavailableError, errorMessage } from "../core/errors.js";

const DEFAULT_TIMEOUT_MS = 120_000;

export interface HttpLanguageModelConfig {
  endpoint: string;
  apiKey?: string;
  /** Sent as `model` when set */
  model?: string;
  timeoutMs?: number;
}

const ChatResponseSchema = z.union([
  z.object({ response: z.string() }),
  z.object({
    choices: z
      .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
      .min(1),
  }),
  z.object({ content: z.string() }),
]);

/**
 * Pull the answer text out of any accepted response shape.
 * @returns null when the body matches none of them
 */
export function extractResponseText(data: unknown): string | null {
  const parsed = ChatResponseSchema.safeParse(data);
  if (!parsed.success) {
    return null;
  }
  const body = parsed.data;
  if ("response" in body) {
    return body.response;
  }
  if ("choices" in body) {
    return body.choices[0].message.content ?? "";
  }
  return body.content;
}

export class HttpLanguageModel implements LanguageModel {
  private readonly endpoint: string;
  private readonly apiKey?: string;
  private readonly model?: string;
  private readonly timeoutMs: number;

  constructor(config: HttpLanguageModelConfig) {
    this.endpoint = config.endpoint;
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async invoke(prompt: string, options: InvokeOptions): Promise<string> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (this.apiKey) {
      headers["Authorization"] = `Bearer ${this.apiKey}`;
    }

    const body: Record<string, unknown> = {
      messages: [{ role: "user", content: prompt }],
      max_tokens: options.maxTokens,
      temperature: options.temperature,
      stream: false,
    };
    if (this.model) {
      body.model = this.model;
    }

    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: "POST",
        headers,
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new LLMUnavailableError(errorMessage(error));
    }

    if (!response.ok) {
      throw new LLMUnavailableError(`endpoint returned status ${response.status}`, response.status);
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw new LLMUnavailableError(`invalid JSON response: ${errorMessage(error)}`, response.status);
    }

    const text = extractResponseText(data);
    if (text === null) {
      throw new LLMUnavailableError("unexpected response format", response.status);
    }
    if (text.trim() === "") {
      throw new LLMUnavailableError("empty response", response.status);
    }
    return text;
  }
}
