/**
 * CLI chat command - Run one conversational turn.
 * Command: kindred chat <message>
 * Options: --session <id>, --user <name>, --no-tools, --no-memory, --json
 */

import type { ConversationOrchestrator, TurnResult } from "../core/orchestrator.js";
import { toolArgumentsToPlain } from "../core/types.js";

/**
 * CLI chat command options
 */
export interface ChatOptions {
  /** Session id (default: "cli") */
  session?: string;
  /** Display name of the sender (default: "User") */
  user?: string;
  /** Allow tool calls (default: true) */
  tools?: boolean;
  /** Allow saving the exchange to memory (default: true) */
  memory?: boolean;
  /** Output as JSON */
  json?: boolean;
}

export const DEFAULT_CLI_SESSION = "cli";

/**
 * Format a turn for CLI text output
 */
function formatTextOutput(result: TurnResult): string {
  const lines: string[] = [result.response, ""];

  if (result.toolCalls.length > 0) {
    const outcomes = result.toolCalls.map((call, i) => {
      const status = result.toolResults[i]?.status ?? "error";
      return `${call.name} (${status})`;
    });
    lines.push(`Tools: ${outcomes.join(", ")}`);
  }
  lines.push(
    `Memories recalled: ${result.memoriesRecalled} | Memory saved: ${result.memorySaved ? "yes" : "no"} | ${result.processingTimeSeconds.toFixed(2)}s`
  );

  return lines.join("\n");
}

/**
 * ChatCommand sends one message through the orchestrator.
 */
export class ChatCommand {
  private orchestrator: Pick<ConversationOrchestrator, "processMessage">;

  constructor(orchestrator: Pick<ConversationOrchestrator, "processMessage">) {
    this.orchestrator = orchestrator;
  }

  /**
   * Execute the chat command
   * @returns Formatted output string
   */
  async execute(message: string, options: ChatOptions = {}): Promise<string> {
    const result = await this.orchestrator.processMessage({
      message,
      sessionId: options.session ?? DEFAULT_CLI_SESSION,
      userName: options.user,
      enableTools: options.tools ?? true,
      enableMemorySave: options.memory ?? true,
    });

    if (options.json) {
      return JSON.stringify(
        {
          response: result.response,
          toolCalls: result.toolCalls.map((call) => ({ name: call.name, arguments: toolArgumentsToPlain(call.arguments) })),
          toolResults: result.toolResults,
          memorySaved: result.memorySaved,
          memoriesRecalled: result.memoriesRecalled,
          processingTimeSeconds: result.processingTimeSeconds,
        },
        null,
        2
      );
    }

    return formatTextOutput(result);
  }
}

export default ChatCommand;
