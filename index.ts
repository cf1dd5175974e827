/**
 * kindred
 *
 * A companion engine: long-term memory with importance-weighted semantic
 * recall, per-session conversation logs, model-invoked tools and a
 * scheduled reflection loop, on a single SQLite file.
 */

import { Database } from "./db/sqlite.js";
import { VectorHelper } from "./db/vectors.js";
import { SqliteConversationLog } from "./db/conversation.js";
import { SqliteStateStore } from "./db/state.js";
import { createEmbeddingProvider } from "./embeddings/index.js";
import type { EmbeddingProvider } from "./embeddings/provider.js";
import { HttpLanguageModel } from "./llm/http.js";
import type { LanguageModel } from "./llm/provider.js";
import type { ResolvedConfig } from "./config.js";
import { MemoryEngine } from "./core/memory.js";
import { CapabilityRegistry } from "./core/registry.js";
import { ConversationOrchestrator } from "./core/orchestrator.js";
import { DEFAULT_SYSTEM_FRAMING } from "./core/prompt.js";
import { registerDefaultCapabilities } from "./tools/index.js";
import { HeartbeatService, type DeliverMessage } from "./services/heartbeat.js";
import { createConsoleLogger, type Logger } from "./utils/logger.js";

export * from "./core/types.js";
export * from "./core/errors.js";
export * from "./config.js";
export { MemoryEngine, formatMemoriesForPrompt, clampImportance, RECALL_DEFAULTS } from "./core/memory.js";
export type { SaveMemoryInput, RecallOptions, UpdateMemoryInput } from "./core/memory.js";
export { rankCandidates, recallScore, passesRecallFilter, IMPORTANCE_BYPASS_THRESHOLD } from "./core/scorer.js";
export { parseToolCalls, parseToolArguments, coerceToolValue } from "./core/tool-parser.js";
export { CapabilityRegistry, type Capability, type CapabilityDescriptor } from "./core/registry.js";
export { parseMemoryDecision, type MemoryDecision } from "./core/memory-decision.js";
export {
  ConversationOrchestrator,
  TurnState,
  NO_RESPONSE_MESSAGE,
  extractOutgoingMessage,
  type ProcessMessageParams,
  type TurnResult,
  type ReflectionResult,
} from "./core/orchestrator.js";
export { Database } from "./db/sqlite.js";
export { VectorHelper } from "./db/vectors.js";
export { SqliteConversationLog, type ConversationLog } from "./db/conversation.js";
export { SqliteStateStore, type StateStore, type StateValue } from "./db/state.js";
export { createEmbeddingProvider, OllamaEmbeddingProvider, OpenAIEmbeddingProvider } from "./embeddings/index.js";
export type { EmbeddingProvider } from "./embeddings/provider.js";
export { HttpLanguageModel } from "./llm/http.js";
export type { LanguageModel, InvokeOptions } from "./llm/provider.js";
export { registerDefaultCapabilities } from "./tools/index.js";
export { HeartbeatService, type HeartbeatOutcome, type DeliverMessage } from "./services/heartbeat.js";
export { createConsoleLogger, silentLogger, type Logger, type LogLevel } from "./utils/logger.js";

export interface EngineOptions {
  logger?: Logger;
  /** Replaces the HTTP language model built from `config.llm` */
  llm?: LanguageModel;
  /** Replaces the provider built from `config.embedding` */
  embeddings?: EmbeddingProvider;
  /** Persona framing placed at the top of every turn prompt */
  systemFraming?: string;
  /** Clock for tools that report time */
  now?: () => Date;
}

export interface Engine {
  config: ResolvedConfig;
  logger: Logger;
  database: Database;
  embeddings: EmbeddingProvider;
  llm: LanguageModel;
  memory: MemoryEngine;
  conversation: SqliteConversationLog;
  state: SqliteStateStore;
  registry: CapabilityRegistry;
  orchestrator: ConversationOrchestrator;
  /** Build a heartbeat for `config.heartbeat`; it is not started */
  createHeartbeat(deliver: DeliverMessage): HeartbeatService;
  close(): void;
}

/**
 * Open the database and wire every component from a resolved configuration.
 */
export function createEngine(config: ResolvedConfig, options: EngineOptions = {}): Engine {
  const logger = options.logger ?? createConsoleLogger({ level: config.logLevel });

  const database = new Database(config.dbPath);
  const vectors = new VectorHelper(database.getDb());
  const embeddings = options.embeddings ?? createEmbeddingProvider(config.embedding);
  const llm =
    options.llm ??
    new HttpLanguageModel({
      endpoint: config.llm.endpoint,
      apiKey: config.llm.apiKey,
      model: config.llm.model,
      timeoutMs: config.llm.timeoutMs,
    });

  const memory = new MemoryEngine({ db: database, vectors, embeddings, logger: logger.child("memory") });
  const conversation = new SqliteConversationLog(database);
  const state = new SqliteStateStore(database);

  const registry = new CapabilityRegistry({ timeoutMs: config.tools.timeoutMs, logger: logger.child("tools") });
  registerDefaultCapabilities(registry, {
    memory,
    journalDir: config.tools.journalDir,
    workspaceDir: config.tools.workspaceDir,
    fetchMaxLength: config.tools.fetchMaxLength,
    now: options.now,
  });

  const orchestrator = new ConversationOrchestrator({
    memory,
    conversation,
    registry,
    llm,
    logger: logger.child("turn"),
    settings: {
      systemFraming: options.systemFraming ?? DEFAULT_SYSTEM_FRAMING,
      recall: config.recall,
      conversation: config.conversation,
      llm: { maxTokens: config.llm.maxTokens, temperature: config.llm.temperature },
    },
  });

  logger.debug("Engine ready", {
    dbPath: config.dbPath,
    embedding: `${config.embedding.provider}/${embeddings.getModelName()}`,
    tools: registry.list().length,
  });

  return {
    config,
    logger,
    database,
    embeddings,
    llm,
    memory,
    conversation,
    state,
    registry,
    orchestrator,
    createHeartbeat: (deliver) =>
      new HeartbeatService({
        orchestrator,
        state,
        sessionId: config.heartbeat.sessionId,
        intervalMinutes: config.heartbeat.intervalMinutes,
        deliver,
        logger: logger.child("heartbeat"),
      }),
    close: () => database.close(),
  };
}
