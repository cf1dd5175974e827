/**
 * Configuration schema for the companion engine.
 * Uses Zod for validation; every section is optional and resolved against defaults.
 */

import { z } from "zod";
import { homedir } from "node:os";
import { join } from "node:path";

/**
 * Supported embedding providers
 */
export const EmbeddingProviderSchema = z.enum(["ollama", "openai"]);
export type EmbeddingProviderName = z.infer<typeof EmbeddingProviderSchema>;

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

/**
 * Language model endpoint settings
 */
export const LLMConfigSchema = z.object({
  /** Chat endpoint accepting {messages, max_tokens, temperature, stream} */
  endpoint: z.string().url().optional(),
  /** Bearer token, if the endpoint needs one */
  apiKey: z.string().optional(),
  /** Model name sent with each request */
  model: z.string().optional(),
  maxTokens: z.number().int().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  /** Per-call timeout in milliseconds (default 120000) */
  timeoutMs: z.number().int().min(1).optional(),
});

/**
 * Embedding configuration options
 */
export const EmbeddingConfigSchema = z.object({
  /** Which embedding provider to use */
  provider: EmbeddingProviderSchema.optional(),
  /** Ollama server URL, or an OpenAI-compatible base URL */
  url: z.string().url().optional(),
  /** Model identifier for the embedding provider */
  model: z.string().optional(),
  /** API key for OpenAI */
  apiKey: z.string().optional(),
  /** Vector length; defaults per model */
  dimensions: z.number().int().min(1).optional(),
  timeoutMs: z.number().int().min(1).optional(),
});

/**
 * Recall defaults used by the orchestrator for every turn
 */
export const RecallConfigSchema = z.object({
  nResults: z.number().int().min(1).optional(),
  minImportance: z.number().int().min(1).max(10).optional(),
  /** Distance cutoff (0 to 1); importance 9+ memories bypass it */
  maxDistance: z.number().min(0).max(1).optional(),
});

/**
 * Conversation history and retention
 */
export const ConversationConfigSchema = z.object({
  /** Turns fetched from the log per prompt */
  historyFetchLimit: z.number().int().min(0).optional(),
  /** Turns rendered into the prompt, taken from the end of the fetched ones */
  historyRenderLimit: z.number().int().min(0).optional(),
  /** Turns kept per session after pruning */
  retention: z.number().int().min(1).optional(),
});

/**
 * Built-in capability settings
 */
export const ToolsConfigSchema = z.object({
  /** Per-dispatch timeout in milliseconds */
  timeoutMs: z.number().int().min(1).optional(),
  /** Directory holding daily journal files */
  journalDir: z.string().optional(),
  /** Root that file capabilities are confined to */
  workspaceDir: z.string().optional(),
  /** Maximum characters returned by fetch_url */
  fetchMaxLength: z.number().int().min(1).optional(),
});

/**
 * Heartbeat (autonomous reflection) schedule
 */
export const HeartbeatConfigSchema = z.object({
  intervalMinutes: z.number().min(1).optional(),
  sessionId: z.string().min(1).optional(),
});

/**
 * Default database path
 */
const DEFAULT_DB_PATH = join(homedir(), ".kindred", "kindred.db");

/**
 * Complete configuration schema
 */
export const KindredConfigSchema = z.object({
  /** Path to the SQLite database file */
  dbPath: z.string().optional(),
  llm: LLMConfigSchema.optional(),
  embedding: EmbeddingConfigSchema.optional(),
  recall: RecallConfigSchema.optional(),
  conversation: ConversationConfigSchema.optional(),
  tools: ToolsConfigSchema.optional(),
  heartbeat: HeartbeatConfigSchema.optional(),
  logLevel: LogLevelSchema.optional(),
});

export type KindredConfig = z.infer<typeof KindredConfigSchema>;

/**
 * Resolved configuration with all defaults applied
 */
export interface ResolvedConfig {
  dbPath: string;
  llm: {
    endpoint: string;
    apiKey?: string;
    model?: string;
    maxTokens: number;
    temperature: number;
    timeoutMs: number;
  };
  embedding: {
    provider: EmbeddingProviderName;
    url: string;
    model: string;
    apiKey?: string;
    dimensions?: number;
    timeoutMs: number;
  };
  recall: { nResults: number; minImportance: number; maxDistance: number };
  conversation: { historyFetchLimit: number; historyRenderLimit: number; retention: number };
  tools: { timeoutMs: number; journalDir: string; workspaceDir: string; fetchMaxLength: number };
  heartbeat: { intervalMinutes: number; sessionId: string };
  logLevel: z.infer<typeof LogLevelSchema>;
}

/**
 * Default configuration values
 */
const DEFAULTS = {
  dbPath: DEFAULT_DB_PATH,
  llm: {
    endpoint: "http://localhost:8080/chat",
    maxTokens: 4096,
    temperature: 0.7,
    timeoutMs: 120000,
  },
  embedding: {
    provider: "ollama" as const,
    timeoutMs: 30000,
    ollama: { url: "http://localhost:11434", model: "nomic-embed-text" },
    openai: { url: "https://api.openai.com/v1", model: "text-embedding-3-small" },
  },
  recall: { nResults: 5, minImportance: 5, maxDistance: 0.7 },
  conversation: { historyFetchLimit: 10, historyRenderLimit: 10, retention: 50 },
  tools: {
    timeoutMs: 30000,
    journalDir: join(homedir(), ".kindred", "journals"),
    fetchMaxLength: 10000,
  },
  heartbeat: { intervalMinutes: 60, sessionId: "heartbeat" },
  logLevel: "info" as const,
} as const;

/**
 * Apply defaults to parsed config, filling in missing values
 */
export function resolveConfig(config: KindredConfig): ResolvedConfig {
  const provider = config.embedding?.provider ?? DEFAULTS.embedding.provider;
  const providerDefaults = DEFAULTS.embedding[provider];

  return {
    dbPath: config.dbPath ?? DEFAULTS.dbPath,
    llm: {
      endpoint: config.llm?.endpoint ?? DEFAULTS.llm.endpoint,
      apiKey: config.llm?.apiKey,
      model: config.llm?.model,
      maxTokens: config.llm?.maxTokens ?? DEFAULTS.llm.maxTokens,
      temperature: config.llm?.temperature ?? DEFAULTS.llm.temperature,
      timeoutMs: config.llm?.timeoutMs ?? DEFAULTS.llm.timeoutMs,
    },
    embedding: {
      provider,
      url: config.embedding?.url ?? providerDefaults.url,
      model: config.embedding?.model ?? providerDefaults.model,
      apiKey: config.embedding?.apiKey,
      dimensions: config.embedding?.dimensions,
      timeoutMs: config.embedding?.timeoutMs ?? DEFAULTS.embedding.timeoutMs,
    },
    recall: {
      nResults: config.recall?.nResults ?? DEFAULTS.recall.nResults,
      minImportance: config.recall?.minImportance ?? DEFAULTS.recall.minImportance,
      maxDistance: config.recall?.maxDistance ?? DEFAULTS.recall.maxDistance,
    },
    conversation: {
      historyFetchLimit:
        config.conversation?.historyFetchLimit ?? DEFAULTS.conversation.historyFetchLimit,
      historyRenderLimit:
        config.conversation?.historyRenderLimit ?? DEFAULTS.conversation.historyRenderLimit,
      retention: config.conversation?.retention ?? DEFAULTS.conversation.retention,
    },
    tools: {
      timeoutMs: config.tools?.timeoutMs ?? DEFAULTS.tools.timeoutMs,
      journalDir: config.tools?.journalDir ?? DEFAULTS.tools.journalDir,
      workspaceDir: config.tools?.workspaceDir ?? process.cwd(),
      fetchMaxLength: config.tools?.fetchMaxLength ?? DEFAULTS.tools.fetchMaxLength,
    },
    heartbeat: {
      intervalMinutes: config.heartbeat?.intervalMinutes ?? DEFAULTS.heartbeat.intervalMinutes,
      sessionId: config.heartbeat?.sessionId ?? DEFAULTS.heartbeat.sessionId,
    },
    logLevel: config.logLevel ?? DEFAULTS.logLevel,
  };
}

/**
 * Parse configuration with validation
 */
export function parseConfig(input: unknown): KindredConfig {
  return KindredConfigSchema.parse(input ?? {});
}

/**
 * Safely parse configuration without throwing
 */
export function safeParseConfig(
  input: unknown
): { success: true; data: KindredConfig } | { success: false; error: z.ZodError } {
  return KindredConfigSchema.safeParse(input ?? {});
}

/**
 * Get default configuration (fully resolved)
 */
export function getDefaultConfig(): ResolvedConfig {
  return resolveConfig(KindredConfigSchema.parse({}));
}

function numberFromEnv(value: string | undefined): number | undefined {
  return value === undefined || value === "" ? undefined : Number(value);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === "" ? undefined : value;
}

/**
 * Build (unvalidated) configuration input from environment variables.
 * Unset or empty variables leave the corresponding field undefined.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const heartbeatMinutes = numberFromEnv(env.KINDRED_HEARTBEAT_MINUTES);
  return {
    dbPath: nonEmpty(env.KINDRED_DB_PATH),
    llm: {
      endpoint: nonEmpty(env.KINDRED_LLM_URL),
      apiKey: nonEmpty(env.KINDRED_LLM_API_KEY),
      model: nonEmpty(env.KINDRED_LLM_MODEL),
    },
    embedding: {
      provider: nonEmpty(env.KINDRED_EMBEDDING_PROVIDER),
      url: nonEmpty(env.KINDRED_EMBEDDING_URL),
      model: nonEmpty(env.KINDRED_EMBEDDING_MODEL),
      apiKey: nonEmpty(env.OPENAI_API_KEY),
    },
    tools: {
      journalDir: nonEmpty(env.KINDRED_JOURNAL_DIR),
    },
    heartbeat: {
      intervalMinutes: heartbeatMinutes,
      sessionId: nonEmpty(env.KINDRED_HEARTBEAT_SESSION),
    },
    logLevel: nonEmpty(env.KINDRED_LOG_LEVEL),
  };
}

/**
 * Load, validate and resolve configuration from the environment.
 * @throws ZodError when a variable holds an invalid value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ResolvedConfig {
  return resolveConfig(parseConfig(loadConfigFromEnv(env)));
}
