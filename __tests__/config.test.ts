/**
 * Tests for configuration parsing, defaults and environment loading
 */

import { describe, it, expect } from "vitest";
import { homedir } from "node:os";
import { join } from "node:path";
import {
  configFromEnv,
  getDefaultConfig,
  loadConfigFromEnv,
  parseConfig,
  resolveConfig,
  safeParseConfig,
} from "../config.js";

describe("getDefaultConfig", () => {
  it("should fill every default", () => {
    const config = getDefaultConfig();

    expect(config.dbPath).toBe(join(homedir(), ".kindred", "kindred.db"));
    expect(config.llm).toEqual({
      endpoint: "http://localhost:8080/chat",
      apiKey: undefined,
      model: undefined,
      maxTokens: 4096,
      temperature: 0.7,
      timeoutMs: 120000,
    });
    expect(config.embedding).toMatchObject({
      provider: "ollama",
      url: "http://localhost:11434",
      model: "nomic-embed-text",
      timeoutMs: 30000,
    });
    expect(config.recall).toEqual({ nResults: 5, minImportance: 5, maxDistance: 0.7 });
    expect(config.conversation).toEqual({ historyFetchLimit: 10, historyRenderLimit: 10, retention: 50 });
    expect(config.tools).toEqual({
      timeoutMs: 30000,
      journalDir: join(homedir(), ".kindred", "journals"),
      workspaceDir: process.cwd(),
      fetchMaxLength: 10000,
    });
    expect(config.heartbeat).toEqual({ intervalMinutes: 60, sessionId: "heartbeat" });
    expect(config.logLevel).toBe("info");
  });
});

describe("resolveConfig", () => {
  it("should use the chosen provider's defaults", () => {
    const config = resolveConfig(parseConfig({ embedding: { provider: "openai", apiKey: "test-key" } }));
    expect(config.embedding).toMatchObject({
      provider: "openai",
      url: "https://api.openai.com/v1",
      model: "text-embedding-3-small",
      apiKey: "test-key",
    });
  });

  it("should keep explicit values", () => {
    const config = resolveConfig(
      parseConfig({ recall: { nResults: 3, maxDistance: 0.5 }, conversation: { retention: 20 } })
    );
    expect(config.recall).toEqual({ nResults: 3, minImportance: 5, maxDistance: 0.5 });
    expect(config.conversation.retention).toBe(20);
  });
});

describe("parseConfig", () => {
  it("should accept undefined as an empty config", () => {
    expect(parseConfig(undefined)).toEqual({});
  });

  it("should reject out-of-range values", () => {
    expect(() => parseConfig({ recall: { maxDistance: 2 } })).toThrow();
    expect(() => parseConfig({ recall: { minImportance: 11 } })).toThrow();
    expect(() => parseConfig({ embedding: { provider: "cohere" } })).toThrow();
  });

  it("should report failures without throwing through safeParseConfig", () => {
    expect(safeParseConfig({ llm: { endpoint: "not a url" } }).success).toBe(false);
    expect(safeParseConfig({ logLevel: "debug" }).success).toBe(true);
  });
});

describe("environment", () => {
  it("should map variables and ignore empty ones", () => {
    const config = configFromEnv({
      KINDRED_DB_PATH: "/tmp/kindred-test.db",
      KINDRED_LLM_URL: "",
      KINDRED_LLM_MODEL: "local-model",
      KINDRED_EMBEDDING_PROVIDER: "openai",
      OPENAI_API_KEY: "test-key",
      KINDRED_HEARTBEAT_MINUTES: "15",
      KINDRED_HEARTBEAT_SESSION: "ana",
      KINDRED_LOG_LEVEL: "warn",
    });

    expect(config.dbPath).toBe("/tmp/kindred-test.db");
    expect(config.llm.endpoint).toBe("http://localhost:8080/chat");
    expect(config.llm.model).toBe("local-model");
    expect(config.embedding.provider).toBe("openai");
    expect(config.embedding.apiKey).toBe("test-key");
    expect(config.heartbeat).toEqual({ intervalMinutes: 15, sessionId: "ana" });
    expect(config.logLevel).toBe("warn");
  });

  it("should leave unset variables undefined", () => {
    expect(loadConfigFromEnv({})).toEqual({
      dbPath: undefined,
      llm: { endpoint: undefined, apiKey: undefined, model: undefined },
      embedding: { provider: undefined, url: undefined, model: undefined, apiKey: undefined },
      tools: { journalDir: undefined },
      heartbeat: { intervalMinutes: undefined, sessionId: undefined },
      logLevel: undefined,
    });
  });

  it("should reject invalid values", () => {
    expect(() => configFromEnv({ KINDRED_EMBEDDING_PROVIDER: "cohere" })).toThrow();
    expect(() => configFromEnv({ KINDRED_HEARTBEAT_MINUTES: "often" })).toThrow();
  });
});
