/**
 * Core type definitions for the companion engine
 */

/**
 * Categories a memory can be filed under.
 * Category filtering only matches these labels.
 */
export enum MemoryCategory {
  /** Stable facts about people, places and things */
  fact = "fact",
  /** Emotional states and significant relationship moments */
  emotion = "emotion",
  /** Realisations and observations about needs or patterns */
  insight = "insight",
  /** Appointments, commitments and promises */
  plan = "plan",
  /** Likes, dislikes and routines */
  preference = "preference",
}

export const MEMORY_CATEGORIES: readonly MemoryCategory[] = Object.values(MemoryCategory);

/**
 * Narrow an arbitrary string to a known memory category.
 */
export function isMemoryCategory(value: string): value is MemoryCategory {
  return MEMORY_CATEGORIES.some((category) => category === value);
}

/**
 * Whether a memory's embedding was computed or substituted with a zero vector
 */
export type EmbeddingStatus = "ok" | "degraded";

/**
 * A long-term memory record
 */
export interface MemoryRecord {
  /** Time-derived identifier (mem_<ms>) */
  id: string;
  /** Description of what is remembered */
  content: string;
  category: MemoryCategory;
  /** Importance from 1 (trivial) to 10 (critical) */
  importance: number;
  tags: string[];
  /** Open key/value bag (session id, author, source snippets) */
  metadata: Record<string, unknown>;
  embeddingStatus: EmbeddingStatus;
  /** When the memory was saved (ISO 8601) */
  createdAt: string;
  /** When the memory was last updated (ISO 8601), null if never */
  updatedAt: string | null;
}

/**
 * A memory returned by recall, with its scoring components
 */
export interface ScoredMemory extends MemoryRecord {
  /** Cosine distance to the query (0 = identical) */
  distance: number;
  /** 1 - distance */
  relevance: number;
  /** importance * relevance */
  score: number;
}

/**
 * Aggregate counts over the whole memory set
 */
export interface MemoryStats {
  total: number;
  byCategory: Record<string, number>;
  /** Keys 1..10 are always present */
  byImportance: Record<number, number>;
  /** Records stored with a substituted zero vector */
  degradedEmbeddings: number;
}

export type TurnRole = "user" | "assistant" | "system";

/**
 * One persisted message in a session's conversation log
 */
export interface ConversationTurn {
  sessionId: string;
  /** Assigned by the log; strictly increasing by one per session */
  messageIndex: number;
  role: TurnRole;
  content: string;
  metadata: Record<string, unknown>;
  /** Wall-clock insertion time (ISO 8601) */
  timestamp: string;
}

/**
 * Summary of a single conversation session
 */
export interface SessionSummary {
  sessionId: string;
  messageCount: number;
  startedAt: string | null;
  lastActivity: string | null;
}

/**
 * A scalar tool argument, tagged by the kind the parser coerced it to.
 */
export type ToolValue =
  | { kind: "int"; value: number }
  | { kind: "float"; value: number }
  | { kind: "bool"; value: boolean }
  | { kind: "string"; value: string };

export type ToolArguments = Record<string, ToolValue>;

/**
 * A tool call extracted from model output
 */
export interface ToolInvocation {
  name: string;
  arguments: ToolArguments;
}

/**
 * Uniform result envelope of a capability dispatch
 */
export type ToolResult =
  | { status: "success"; result: unknown }
  | { status: "error"; error: string };

/**
 * Unwrap a tagged tool value into its plain scalar.
 */
export function toolValueToPlain(value: ToolValue): string | number | boolean {
  switch (value.kind) {
    case "int":
    case "float":
      return value.value;
    case "bool":
      return value.value;
    case "string":
      return value.value;
  }
}

/**
 * Unwrap every argument of an invocation into a plain object.
 */
export function toolArgumentsToPlain(args: ToolArguments): Record<string, string | number | boolean> {
  const plain: Record<string, string | number | boolean> = {};
  for (const [key, value] of Object.entries(args)) {
    plain[key] = toolValueToPlain(value);
  }
  return plain;
}
