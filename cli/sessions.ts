/**
 * CLI sessions command - List conversation sessions.
 * Command: kindred sessions
 */

import type { ConversationLog } from "../db/conversation.js";
import type { SessionSummary } from "../core/types.js";

export interface SessionsOptions {
  /** Output as JSON */
  json?: boolean;
}

function formatTextOutput(sessions: SessionSummary[]): string {
  if (sessions.length === 0) {
    return "No conversation sessions.";
  }

  const lines: string[] = [`Sessions: ${sessions.length}`, ""];
  for (const session of sessions) {
    lines.push(
      `${session.sessionId}  ${session.messageCount} message(s)  last activity ${session.lastActivity ?? "-"}`
    );
  }
  return lines.join("\n");
}

/**
 * SessionsCommand lists sessions, latest activity first.
 */
export class SessionsCommand {
  private conversation: Pick<ConversationLog, "listSessions">;

  constructor(conversation: Pick<ConversationLog, "listSessions">) {
    this.conversation = conversation;
  }

  async execute(options: SessionsOptions = {}): Promise<string> {
    const sessions = await this.conversation.listSessions();
    if (options.json) {
      return JSON.stringify(sessions, null, 2);
    }
    return formatTextOutput(sessions);
  }
}

export default SessionsCommand;
