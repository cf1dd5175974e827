/**
 * Tests for the HTTP language model client
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import { HttpLanguageModel, extractResponseText } from "../llm/http.js";
import { LLMUnavailableError } from "../core/errors.js";

type FetchFn = typeof fetch;

const OPTIONS = { maxTokens: 256, temperature: 0.5 };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("extractResponseText", () => {
  it("should read every accepted shape", () => {
    expect(extractResponseText({ response: "plain" })).toBe("plain");
    expect(extractResponseText({ choices: [{ message: { content: "openai" } }] })).toBe("openai");
    expect(extractResponseText({ content: "bare" })).toBe("bare");
  });

  it("should treat a null choice content as empty", () => {
    expect(extractResponseText({ choices: [{ message: { content: null } }] })).toBe("");
  });

  it("should return null for anything else", () => {
    expect(extractResponseText({ choices: [] })).toBeNull();
    expect(extractResponseText({ text: "nope" })).toBeNull();
    expect(extractResponseText("string")).toBeNull();
  });
});

describe("HttpLanguageModel", () => {
  let fetchMock: Mock<FetchFn>;

  beforeEach(() => {
    fetchMock = vi.fn<FetchFn>();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should post the prompt as a single user message", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ response: "Hello there" }));
    const llm = new HttpLanguageModel({ endpoint: "http://localhost:8080/chat", apiKey: "test-secret", model: "local" });

    expect(await llm.invoke("Say hi", OPTIONS)).toBe("Hello there");

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://localhost:8080/chat");
    expect(init?.method).toBe("POST");
    expect(new Headers(init?.headers).get("Authorization")).toBe("Bearer test-secret");
    expect(JSON.parse(String(init?.body))).toEqual({
      messages: [{ role: "user", content: "Say hi" }],
      max_tokens: 256,
      temperature: 0.5,
      stream: false,
      model: "local",
    });
  });

  it("should omit authorization and model when not configured", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ content: "ok" }));
    const llm = new HttpLanguageModel({ endpoint: "http://localhost:8080/chat" });

    await llm.invoke("x", OPTIONS);

    const [, init] = fetchMock.mock.calls[0];
    expect(new Headers(init?.headers).has("Authorization")).toBe(false);
    expect(JSON.parse(String(init?.body))).not.toHaveProperty("model");
  });

  it("should reject on a non-OK status", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ error: "busy" }, 503));
    const llm = new HttpLanguageModel({ endpoint: "http://localhost:8080/chat" });

    const error = await llm.invoke("x", OPTIONS).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(LLMUnavailableError);
    expect(error).toMatchObject({ status: 503, code: "LLM_UNAVAILABLE", retryable: true });
    expect(String(error)).toContain("endpoint returned status 503");
  });

  it("should reject when the endpoint cannot be reached", async () => {
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));
    const llm = new HttpLanguageModel({ endpoint: "http://localhost:8080/chat" });

    await expect(llm.invoke("x", OPTIONS)).rejects.toThrow("Language model unavailable: fetch failed");
  });

  it("should reject invalid JSON", async () => {
    fetchMock.mockResolvedValueOnce(new Response("not json", { status: 200 }));
    const llm = new HttpLanguageModel({ endpoint: "http://localhost:8080/chat" });

    await expect(llm.invoke("x", OPTIONS)).rejects.toThrow("invalid JSON response");
  });

  it("should reject an unknown response shape", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ text: "hi" }));
    const llm = new HttpLanguageModel({ endpoint: "http://localhost:8080/chat" });

    await expect(llm.invoke("x", OPTIONS)).rejects.toThrow("unexpected response format");
  });

  it("should reject an empty answer", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ response: "   " }));
    const llm = new HttpLanguageModel({ endpoint: "http://localhost:8080/chat" });

    await expect(llm.invoke("x", OPTIONS)).rejects.toThrow("empty response");
  });
});
