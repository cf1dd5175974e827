/**
 * Prompt assembly. Pure string construction: identical inputs always
 * produce identical prompts.
 */

import { formatMemoriesForPrompt } from "./memory.js";
import type { ConversationTurn, MemoryRecord, ToolResult } from "./types.js";

/**
 * Default system framing. Persona text is supplied by the embedding
 * application through `systemFraming`.
 */
export const DEFAULT_SYSTEM_FRAMING =
  "You are a long-term companion. You remember what matters, use tools when they help, and answer directly.";

export interface TurnPromptInput {
  systemFraming: string;
  /** Rendered capability manifest, "" when tools are disabled or none exist */
  manifest: string;
  memories: MemoryRecord[];
  /** Fetched history, oldest first */
  history: ConversationTurn[];
  /** Number of turns rendered from the end of `history` */
  historyRenderLimit: number;
  context?: Record<string, unknown>;
  userName: string;
  message: string;
}

function renderTurn(turn: ConversationTurn): string {
  const userName = turn.metadata.user_name;
  if (turn.role === "user" && typeof userName === "string" && userName !== "") {
    return `${userName}: ${turn.content}`;
  }
  return `${turn.role.toUpperCase()}: ${turn.content}`;
}

function renderContextValue(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

/**
 * Build the primary prompt for one turn.
 */
export function buildTurnPrompt(input: TurnPromptInput): string {
  const parts: string[] = ["[SYSTEM]", input.systemFraming, ""];

  if (input.manifest !== "") {
    parts.push(input.manifest, "");
  }

  const memoryText = formatMemoriesForPrompt(input.memories);
  if (memoryText !== "") {
    parts.push(memoryText, "");
  }

  const rendered = input.historyRenderLimit > 0 ? input.history.slice(-input.historyRenderLimit) : [];
  if (rendered.length > 0) {
    parts.push("[RECENT CONVERSATION]");
    for (const turn of rendered) {
      parts.push(renderTurn(turn));
    }
    parts.push("[END CONVERSATION]", "");
  }

  const contextEntries = Object.entries(input.context ?? {});
  if (contextEntries.length > 0) {
    parts.push("[ADDITIONAL CONTEXT]");
    for (const [key, value] of contextEntries) {
      parts.push(`${key}: ${renderContextValue(value)}`);
    }
    parts.push("[END CONTEXT]", "");
  }

  parts.push("[CURRENT MESSAGE]", `${input.userName}: ${input.message}`, "");
  return parts.join("\n");
}

/**
 * Build the follow-up prompt: the original exchange plus every tool result,
 * in dispatch order.
 */
export function buildFollowupPrompt(
  originalPrompt: string,
  originalResponse: string,
  results: ToolResult[]
): string {
  const parts: string[] = [originalPrompt, "[YOUR RESPONSE]", originalResponse, "", "[TOOL EXECUTION RESULTS]", ""];
  results.forEach((result, i) => {
    parts.push(`Tool ${i + 1} result:`, JSON.stringify(result, null, 2), "");
  });
  parts.push("[END TOOL RESULTS]", "", "Now provide your final response incorporating these tool results:", "");
  return parts.join("\n");
}

/**
 * Build the memory evaluation prompt for a completed exchange.
 */
export function buildMemoryEvaluationPrompt(userName: string, userMessage: string, response: string): string {
  return `[MEMORY EVALUATION]

You just had this exchange:
${userName}: "${userMessage}"
You: "${response}"

Should this be saved to long-term memory?

SAVE if it contains:
- Important facts about ${userName} (preferences, schedule, health, feelings)
- Significant moments in your relationship
- Plans, commitments, or promises made
- New insights about their needs
- Context that will matter tomorrow, next week or next month

DON'T SAVE if it's just:
- Greetings or small talk
- Routine check-ins with no new information
- Something you already know
- Temporary or irrelevant details

Respond with ONLY valid JSON (no markdown, no backticks):
{
  "save": true,
  "description": "Clear, searchable description of what to remember",
  "category": "fact | emotion | insight | plan | preference",
  "importance": 8,
  "tags": ["tag1", "tag2"],
  "reason": "Why saving"
}

Or if not worth saving:
{
  "save": false,
  "reason": "Why not saving"
}

Evaluate:`;
}

export interface ReflectionPromptInput {
  /** Rendered capability manifest, may be "" */
  manifest: string;
  /** Recent turns, oldest first; the last 3 are rendered */
  recentTurns: ConversationTurn[];
  recentMemories: MemoryRecord[];
}

const REFLECTION_TURNS = 3;
const REFLECTION_SNIPPET = 100;

/**
 * Build the self-directed prompt used when nobody has sent a message.
 */
export function buildReflectionPrompt(input: ReflectionPromptInput): string {
  const parts: string[] = [
    "[AUTONOMOUS REFLECTION]",
    "",
    "This is your scheduled reflection time. No one has messaged you.",
    "Use this moment to:",
    "- Reflect on recent conversations",
    "- Check in with the people you talk to (if needed)",
    "- Write in your journal",
    "- Look into something you're curious about",
    "- Or simply observe",
    "",
    "To send someone a message, write [SEND MESSAGE] followed by the message.",
    "",
  ];

  const turns = input.recentTurns.slice(-REFLECTION_TURNS);
  if (turns.length > 0) {
    parts.push("[RECENT CONVERSATION]");
    for (const turn of turns) {
      parts.push(`${turn.role.toUpperCase()}: ${turn.content.slice(0, REFLECTION_SNIPPET)}`);
    }
    parts.push("[END CONVERSATION]", "");
  }

  if (input.recentMemories.length > 0) {
    parts.push("[RECENT MEMORIES]");
    for (const memory of input.recentMemories) {
      parts.push(`- ${memory.content.slice(0, REFLECTION_SNIPPET)}`);
    }
    parts.push("[END MEMORIES]", "");
  }

  if (input.manifest !== "") {
    parts.push(input.manifest, "");
  }

  parts.push("What's on your mind? What action (if any) do you want to take?", "");
  return parts.join("\n");
}
