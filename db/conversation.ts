/**
 * Conversation log: an append-only, per-session ordered list of turns.
 */

import type { Database } from "./sqlite.js";
import type { ConversationTurn, SessionSummary, TurnRole } from "../core/types.js";

/**
 * Storage-agnostic conversation log consumed by the orchestrator.
 */
export interface ConversationLog {
  /**
   * Append a turn; the log assigns the next message index for the session.
   * @returns The assigned index
   */
  append(
    sessionId: string,
    role: TurnRole,
    content: string,
    metadata?: Record<string, unknown>
  ): Promise<number>;

  /** Latest `limit` turns of a session, oldest first */
  read(sessionId: string, limit: number): Promise<ConversationTurn[]>;

  /**
   * Keep only the latest `keepLatest` turns of a session.
   * @returns Number of turns deleted
   */
  prune(sessionId: string, keepLatest: number): Promise<number>;

  /** All sessions, most recently active first */
  listSessions(): Promise<SessionSummary[]>;

  summary(sessionId: string): Promise<SessionSummary>;

  /** @returns Number of turns deleted */
  deleteSession(sessionId: string): Promise<number>;
}

interface TurnRow {
  session_id: string;
  message_index: number;
  role: TurnRole;
  content: string;
  metadata: string;
  timestamp: string;
}

interface SummaryRow {
  session_id: string;
  message_count: number;
  started_at: string | null;
  last_activity: string | null;
}

/**
 * ConversationLog backed by the `conversation_turns` table.
 */
export class SqliteConversationLog implements ConversationLog {
  constructor(private readonly database: Database) {}

  async append(
    sessionId: string,
    role: TurnRole,
    content: string,
    metadata: Record<string, unknown> = {}
  ): Promise<number> {
    const db = this.database.getDb();
    const nextIndex = db.prepare<[string], { next: number }>(`
      SELECT COALESCE(MAX(message_index) + 1, 0) AS next
      FROM conversation_turns WHERE session_id = ?
    `);
    const insert = db.prepare<[string, number, TurnRole, string, string, string]>(`
      INSERT INTO conversation_turns (session_id, message_index, role, content, metadata, timestamp)
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    // Index lookup and insert share one IMMEDIATE transaction
    return this.database.transaction(() => {
      const index = nextIndex.get(sessionId)?.next ?? 0;
      insert.run(sessionId, index, role, content, JSON.stringify(metadata), new Date().toISOString());
      return index;
    });
  }

  async read(sessionId: string, limit: number): Promise<ConversationTurn[]> {
    if (limit <= 0) {
      return [];
    }
    const rows = this.database.withRetry(() =>
      this.database
        .getDb()
        .prepare<[string, number], TurnRow>(`
          SELECT session_id, message_index, role, content, metadata, timestamp
          FROM conversation_turns
          WHERE session_id = ?
          ORDER BY message_index DESC
          LIMIT ?
        `)
        .all(sessionId, limit)
    );
    return rows.reverse().map(rowToTurn);
  }

  async prune(sessionId: string, keepLatest: number): Promise<number> {
    const keep = Math.max(0, Math.floor(keepLatest));
    const result = this.database.withRetry(() =>
      this.database
        .getDb()
        .prepare<[string, string, number]>(`
          DELETE FROM conversation_turns
          WHERE session_id = ?
            AND message_index NOT IN (
              SELECT message_index FROM conversation_turns
              WHERE session_id = ?
              ORDER BY message_index DESC
              LIMIT ?
            )
        `)
        .run(sessionId, sessionId, keep)
    );
    return result.changes;
  }

  async listSessions(): Promise<SessionSummary[]> {
    const rows = this.database.withRetry(() =>
      this.database
        .getDb()
        .prepare<[], SummaryRow>(`
          SELECT session_id,
                 COUNT(*) AS message_count,
                 MIN(timestamp) AS started_at,
                 MAX(timestamp) AS last_activity
          FROM conversation_turns
          GROUP BY session_id
          ORDER BY last_activity DESC, session_id
        `)
        .all()
    );
    return rows.map(rowToSummary);
  }

  async summary(sessionId: string): Promise<SessionSummary> {
    const row = this.database.withRetry(() =>
      this.database
        .getDb()
        .prepare<[string], Omit<SummaryRow, "session_id">>(`
          SELECT COUNT(*) AS message_count,
                 MIN(timestamp) AS started_at,
                 MAX(timestamp) AS last_activity
          FROM conversation_turns
          WHERE session_id = ?
        `)
        .get(sessionId)
    );
    return {
      sessionId,
      messageCount: row?.message_count ?? 0,
      startedAt: row?.started_at ?? null,
      lastActivity: row?.last_activity ?? null,
    };
  }

  async deleteSession(sessionId: string): Promise<number> {
    const result = this.database.withRetry(() =>
      this.database
        .getDb()
        .prepare<[string]>(`DELETE FROM conversation_turns WHERE session_id = ?`)
        .run(sessionId)
    );
    return result.changes;
  }
}

function rowToTurn(row: TurnRow): ConversationTurn {
  return {
    sessionId: row.session_id,
    messageIndex: row.message_index,
    role: row.role,
    content: row.content,
    metadata: parseJsonObject(row.metadata),
    timestamp: row.timestamp,
  };
}

function rowToSummary(row: SummaryRow): SessionSummary {
  return {
    sessionId: row.session_id,
    messageCount: row.message_count,
    startedAt: row.started_at,
    lastActivity: row.last_activity,
  };
}

/**
 * Parse a stored JSON object column; anything else becomes an empty object.
 */
export function parseJsonObject(raw: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return {};
  }
  return isPlainObject(parsed) ? parsed : {};
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
