/**
 * CLI reflect command - Run one autonomous reflection without the scheduler.
 * Command: kindred reflect
 * Options: --session <id>, --json
 */

import type { ConversationOrchestrator, ReflectionResult } from "../core/orchestrator.js";
import { toolArgumentsToPlain } from "../core/types.js";

export interface ReflectOptions {
  /** Session whose recent turns are shown to the model */
  session?: string;
  /** Output as JSON */
  json?: boolean;
}

function formatTextOutput(result: ReflectionResult): string {
  if (result.thought === "") {
    return "No reflection (language model unavailable).";
  }

  const lines: string[] = ["Reflection", "==========", "", result.thought, ""];
  if (result.toolCalls.length > 0) {
    lines.push("Tools:");
    result.toolCalls.forEach((call, i) => {
      lines.push(`  ${call.name}: ${result.toolResults[i]?.status ?? "error"}`);
    });
    lines.push("");
  }
  lines.push(result.message === null ? "No outgoing message." : `Outgoing message: ${result.message}`);
  return lines.join("\n");
}

/**
 * ReflectCommand runs autonomousReflection once. The outgoing message is
 * shown, not delivered or recorded.
 */
export class ReflectCommand {
  private orchestrator: Pick<ConversationOrchestrator, "autonomousReflection">;
  private defaultSession: string;

  constructor(orchestrator: Pick<ConversationOrchestrator, "autonomousReflection">, defaultSession: string) {
    this.orchestrator = orchestrator;
    this.defaultSession = defaultSession;
  }

  async execute(options: ReflectOptions = {}): Promise<string> {
    const result = await this.orchestrator.autonomousReflection(options.session ?? this.defaultSession);

    if (options.json) {
      return JSON.stringify(
        {
          thought: result.thought,
          toolCalls: result.toolCalls.map((call) => ({ name: call.name, arguments: toolArgumentsToPlain(call.arguments) })),
          toolResults: result.toolResults,
          message: result.message,
        },
        null,
        2
      );
    }
    return formatTextOutput(result);
  }
}

export default ReflectCommand;
