/**
 * Web capability: fetch a URL's body as text.
 */

import { Type } from "@sinclair/typebox";
import type { Capability } from "../core/registry.js";

export interface WebToolOptions {
  /** Default maximum characters returned */
  maxLength?: number;
  timeoutMs?: number;
}

export function createFetchUrlCapability(options: WebToolOptions = {}) {
  const FetchUrlParams = Type.Object({
    url: Type.String({ pattern: "^https?://", description: "URL to fetch" }),
    max_length: Type.Integer({ minimum: 1, default: options.maxLength ?? 10000, description: "Max content length" }),
  });

  const capability: Capability<typeof FetchUrlParams> = {
    name: "fetch_url",
    description: "Fetch content from a specific URL.",
    parameters: FetchUrlParams,
    returns: "content, HTTP status code, whether it was truncated, and the url",
    category: "web",
    execute: async ({ url, max_length }) => {
      const response = await fetch(url, { signal: AbortSignal.timeout(options.timeoutMs ?? 10000) });
      const text = await response.text();
      return {
        content: text.slice(0, max_length),
        status_code: response.status,
        truncated: text.length > max_length,
        url,
      };
    },
  };
  return capability;
}
