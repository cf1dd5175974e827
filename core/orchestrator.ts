/**
 * ConversationOrchestrator - the per-turn pipeline.
 *
 *   Received -> Recalling -> ContextAssembled -> AwaitingPrimaryResponse
 *     -> [ParsingTools -> Dispatching -> AwaitingFollowupResponse]
 *     -> EvaluatingMemory -> Persisting -> Pruned -> Done
 *
 * At most one tool round runs per turn; the follow-up answer is never
 * parsed for tools. Every remote failure degrades in place, so the only
 * error processMessage throws is InvalidInputError.
 */

import type { ConversationLog } from "../db/conversation.js";
import type { LanguageModel } from "../llm/provider.js";
import { InvalidInputError, errorMessage } from "./errors.js";
import type { MemoryEngine } from "./memory.js";
import { parseMemoryDecision } from "./memory-decision.js";
import {
  DEFAULT_SYSTEM_FRAMING,
  buildFollowupPrompt,
  buildMemoryEvaluationPrompt,
  buildReflectionPrompt,
  buildTurnPrompt,
} from "./prompt.js";
import type { CapabilityRegistry } from "./registry.js";
import { parseToolCalls } from "./tool-parser.js";
import type { ConversationTurn, MemoryRecord, ToolInvocation, ToolResult } from "./types.js";
import { silentLogger, type Logger } from "../utils/logger.js";

/**
 * Reply returned when the primary model call fails
 */
export const NO_RESPONSE_MESSAGE = "Error: No response from LLM";

export enum TurnState {
  Received = "Received",
  Recalling = "Recalling",
  ContextAssembled = "ContextAssembled",
  AwaitingPrimaryResponse = "AwaitingPrimaryResponse",
  ParsingTools = "ParsingTools",
  Dispatching = "Dispatching",
  AwaitingFollowupResponse = "AwaitingFollowupResponse",
  EvaluatingMemory = "EvaluatingMemory",
  Persisting = "Persisting",
  Pruned = "Pruned",
  Done = "Done",
}

/**
 * Whether the tool round runs: tools enabled and at least one call parsed.
 */
export function shouldRunToolRound(enableTools: boolean, invocations: ToolInvocation[]): boolean {
  return enableTools && invocations.length > 0;
}

/**
 * Whether the memory evaluation call runs: enabled and the model answered.
 */
export function shouldEvaluateMemory(enableMemorySave: boolean, primaryOk: boolean): boolean {
  return enableMemorySave && primaryOk;
}

const OUTGOING_MESSAGE_PATTERN = /\[(?:SEND )?MESSAGE\](.*?)(?:\[|$)/s;

/**
 * Text following a `[SEND MESSAGE]` or `[MESSAGE]` marker, up to the next
 * `[` or the end. Null when there is no marker or the text is blank.
 */
export function extractOutgoingMessage(thought: string): string | null {
  const match = OUTGOING_MESSAGE_PATTERN.exec(thought);
  if (!match) {
    return null;
  }
  const message = match[1].trim();
  return message === "" ? null : message;
}

/**
 * The memory operations the orchestrator uses
 */
export type MemoryStore = Pick<MemoryEngine, "recall" | "save" | "getRecent">;

export interface OrchestratorSettings {
  systemFraming: string;
  recall: { nResults: number; minImportance: number; maxDistance: number };
  conversation: { historyFetchLimit: number; historyRenderLimit: number; retention: number };
  llm: { maxTokens: number; temperature: number };
  /** Turns and memories shown to autonomous reflection */
  reflection: { turns: number; memories: number };
}

export const DEFAULT_ORCHESTRATOR_SETTINGS: OrchestratorSettings = {
  systemFraming: DEFAULT_SYSTEM_FRAMING,
  recall: { nResults: 5, minImportance: 5, maxDistance: 0.7 },
  conversation: { historyFetchLimit: 10, historyRenderLimit: 10, retention: 50 },
  llm: { maxTokens: 4096, temperature: 0.7 },
  reflection: { turns: 5, memories: 3 },
};

export interface OrchestratorDeps {
  memory: MemoryStore;
  conversation: ConversationLog;
  registry: CapabilityRegistry;
  llm: LanguageModel;
  logger?: Logger;
  settings?: Partial<OrchestratorSettings>;
}

export interface ProcessMessageParams {
  message: string;
  sessionId: string;
  /** Display name of the sender (default: "User") */
  userName?: string;
  /** Free-form key/values rendered into the prompt */
  context?: Record<string, unknown>;
  /** default: true */
  enableTools?: boolean;
  /** default: true */
  enableMemorySave?: boolean;
}

export interface TurnResult {
  response: string;
  toolCalls: ToolInvocation[];
  toolResults: ToolResult[];
  memorySaved: boolean;
  memoriesRecalled: number;
  processingTimeSeconds: number;
  /** States visited, in order */
  trace: TurnState[];
}

export interface ReflectionResult {
  thought: string;
  toolCalls: ToolInvocation[];
  toolResults: ToolResult[];
  /** Outgoing message marked in the thought, if any */
  message: string | null;
}

export class ConversationOrchestrator {
  private readonly memory: MemoryStore;
  private readonly conversation: ConversationLog;
  private readonly registry: CapabilityRegistry;
  private readonly llm: LanguageModel;
  private readonly logger: Logger;
  private readonly settings: OrchestratorSettings;

  constructor(deps: OrchestratorDeps) {
    this.memory = deps.memory;
    this.conversation = deps.conversation;
    this.registry = deps.registry;
    this.llm = deps.llm;
    this.logger = deps.logger ?? silentLogger;
    this.settings = { ...DEFAULT_ORCHESTRATOR_SETTINGS, ...deps.settings };
  }

  /**
   * Run one turn.
   * @throws InvalidInputError for an empty message or session id
   */
  async processMessage(params: ProcessMessageParams): Promise<TurnResult> {
    const started = performance.now();
    const trace: TurnState[] = [];
    const enter = (state: TurnState): void => {
      trace.push(state);
      this.logger.debug(`-> ${state}`, { sessionId: params.sessionId });
    };

    enter(TurnState.Received);
    const message = params.message.trim();
    if (message === "") {
      throw new InvalidInputError("message", "message cannot be empty");
    }
    if (params.sessionId.trim() === "") {
      throw new InvalidInputError("sessionId", "session id cannot be empty");
    }
    const { sessionId } = params;
    const userName = params.userName ?? "User";
    const enableTools = params.enableTools ?? true;
    const enableMemorySave = params.enableMemorySave ?? true;

    enter(TurnState.Recalling);
    const memories = await this.recall(message);

    enter(TurnState.ContextAssembled);
    const history = await this.readHistory(sessionId, this.settings.conversation.historyFetchLimit);
    const prompt = buildTurnPrompt({
      systemFraming: this.settings.systemFraming,
      manifest: enableTools ? this.registry.renderManifest() : "",
      memories,
      history,
      historyRenderLimit: this.settings.conversation.historyRenderLimit,
      context: params.context,
      userName,
      message,
    });

    enter(TurnState.AwaitingPrimaryResponse);
    let response = await this.invoke(prompt, "primary");
    const primaryOk = response !== null;

    let toolCalls: ToolInvocation[] = [];
    let toolResults: ToolResult[] = [];
    if (response !== null && enableTools) {
      enter(TurnState.ParsingTools);
      const parsed = parseToolCalls(response);
      if (shouldRunToolRound(enableTools, parsed)) {
        enter(TurnState.Dispatching);
        toolCalls = parsed;
        toolResults = await this.dispatchAll(parsed);

        enter(TurnState.AwaitingFollowupResponse);
        const followup = await this.invoke(buildFollowupPrompt(prompt, response, toolResults), "follow-up");
        // A failed follow-up keeps the primary answer
        if (followup !== null) {
          response = followup;
        }
      }
    }

    let memorySaved = false;
    if (response !== null && shouldEvaluateMemory(enableMemorySave, primaryOk)) {
      enter(TurnState.EvaluatingMemory);
      memorySaved = await this.evaluateAndSave(sessionId, userName, message, response);
    }

    enter(TurnState.Persisting);
    await this.persist(sessionId, userName, message, response);

    enter(TurnState.Pruned);
    await this.prune(sessionId);

    enter(TurnState.Done);
    return {
      response: response ?? NO_RESPONSE_MESSAGE,
      toolCalls,
      toolResults,
      memorySaved,
      memoriesRecalled: memories.length,
      processingTimeSeconds: (performance.now() - started) / 1000,
      trace,
    };
  }

  /**
   * Scheduled, message-less reflection. Tools may run; nothing is persisted.
   */
  async autonomousReflection(sessionId: string): Promise<ReflectionResult> {
    const recentTurns = await this.readHistory(sessionId, this.settings.reflection.turns);
    let recentMemories: MemoryRecord[] = [];
    try {
      recentMemories = this.memory.getRecent(this.settings.reflection.memories);
    } catch (error) {
      this.logger.warn("Recent memories unavailable", { error: errorMessage(error) });
    }

    const prompt = buildReflectionPrompt({
      manifest: this.registry.renderManifest(),
      recentTurns,
      recentMemories,
    });

    const thought = await this.invoke(prompt, "reflection");
    if (thought === null) {
      return { thought: "", toolCalls: [], toolResults: [], message: null };
    }

    const toolCalls = parseToolCalls(thought);
    const toolResults = await this.dispatchAll(toolCalls);
    return { thought, toolCalls, toolResults, message: extractOutgoingMessage(thought) };
  }

  /**
   * Persist an assistant message produced outside a turn (e.g. a heartbeat
   * message that was delivered), then prune.
   * @returns The assigned index
   */
  async recordAssistantMessage(
    sessionId: string,
    content: string,
    metadata: Record<string, unknown> = {}
  ): Promise<number> {
    const index = await this.conversation.append(sessionId, "assistant", content, metadata);
    await this.prune(sessionId);
    return index;
  }

  private async recall(message: string): Promise<MemoryRecord[]> {
    try {
      return await this.memory.recall(message, this.settings.recall);
    } catch (error) {
      this.logger.warn("Recall failed, continuing without memories", { error: errorMessage(error) });
      return [];
    }
  }

  private async readHistory(sessionId: string, limit: number): Promise<ConversationTurn[]> {
    try {
      return await this.conversation.read(sessionId, limit);
    } catch (error) {
      this.logger.warn("Conversation history unavailable", { sessionId, error: errorMessage(error) });
      return [];
    }
  }

  /**
   * @returns The model's text, or null if the call failed
   */
  private async invoke(prompt: string, label: string): Promise<string | null> {
    try {
      return await this.llm.invoke(prompt, this.settings.llm);
    } catch (error) {
      this.logger.warn(`Language model call (${label}) failed`, { error: errorMessage(error) });
      return null;
    }
  }

  /**
   * Dispatch sequentially; results line up with invocations.
   */
  private async dispatchAll(invocations: ToolInvocation[]): Promise<ToolResult[]> {
    const results: ToolResult[] = [];
    for (const invocation of invocations) {
      try {
        results.push(await this.registry.execute(invocation.name, invocation.arguments));
      } catch (error) {
        results.push({ status: "error", error: errorMessage(error) });
      }
    }
    return results;
  }

  private async evaluateAndSave(
    sessionId: string,
    userName: string,
    message: string,
    response: string
  ): Promise<boolean> {
    try {
      const raw = await this.llm.invoke(buildMemoryEvaluationPrompt(userName, message, response), this.settings.llm);
      const decision = parseMemoryDecision(raw);
      if (!decision.save) {
        this.logger.debug("Not saving exchange", { reason: decision.reason });
        return false;
      }
      await this.memory.save({
        content: decision.description,
        category: decision.category,
        importance: decision.importance,
        tags: decision.tags,
        metadata: {
          session_id: sessionId,
          user_name: userName,
          user_message: message.slice(0, 200),
          response: response.slice(0, 200),
        },
      });
      return true;
    } catch (error) {
      this.logger.warn("Memory evaluation failed, not saving", { error: errorMessage(error) });
      return false;
    }
  }

  /**
   * User turn first, then the assistant turn (a placeholder when the model failed).
   */
  private async persist(sessionId: string, userName: string, message: string, response: string | null): Promise<void> {
    try {
      await this.conversation.append(sessionId, "user", message, { user_name: userName });
      if (response === null) {
        await this.conversation.append(sessionId, "assistant", "", { degraded: true });
      } else {
        await this.conversation.append(sessionId, "assistant", response);
      }
    } catch (error) {
      this.logger.warn("Failed to persist turn", { sessionId, error: errorMessage(error) });
    }
  }

  private async prune(sessionId: string): Promise<void> {
    try {
      const removed = await this.conversation.prune(sessionId, this.settings.conversation.retention);
      if (removed > 0) {
        this.logger.debug(`Pruned ${removed} turns`, { sessionId });
      }
    } catch (error) {
      this.logger.warn("Failed to prune conversation", { sessionId, error: errorMessage(error) });
    }
  }
}
