/**
 * SQLite database wrapper with schema initialization.
 * Uses better-sqlite3 for synchronous operations with WAL mode for concurrency.
 * Holds memories, their vectors, conversation turns and the key-value state.
 */

import BetterSqlite3 from "better-sqlite3";
import type { Database as SqliteDb } from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { withRetrySync, type RetryConfig } from "./retry.js";

/**
 * Database wrapper class providing schema initialization and retrying access.
 */
export class Database {
  private db: SqliteDb;
  private retryConfig: RetryConfig;

  /**
   * Create a new Database instance.
   * @param dbPath - Path to the SQLite database file, or ":memory:"
   * @param retryConfig - Optional retry configuration for lock handling
   */
  constructor(dbPath: string, retryConfig?: RetryConfig) {
    this.retryConfig = { ...retryConfig };
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new BetterSqlite3(dbPath);
    this.initialize();
  }

  /**
   * Initialize database schema, WAL mode, and indexes.
   */
  private initialize(): void {
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    // Let SQLite itself wait briefly before reporting SQLITE_BUSY
    this.db.pragma("busy_timeout = 1000");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS memories (
        id TEXT PRIMARY KEY,
        content TEXT NOT NULL,
        category TEXT NOT NULL,
        importance INTEGER NOT NULL CHECK (importance BETWEEN 1 AND 10),
        tags TEXT NOT NULL DEFAULT '[]',
        metadata TEXT NOT NULL DEFAULT '{}',
        embedding_status TEXT NOT NULL DEFAULT 'ok' CHECK (embedding_status IN ('ok', 'degraded')),
        created_at TEXT NOT NULL,
        updated_at TEXT
      )
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_memories_category ON memories(category);
      CREATE INDEX IF NOT EXISTS idx_memories_created_at ON memories(created_at);
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS memory_vectors (
        memory_id TEXT PRIMARY KEY,
        embedding BLOB NOT NULL,
        FOREIGN KEY (memory_id) REFERENCES memories(id) ON DELETE CASCADE
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS conversation_turns (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT NOT NULL,
        message_index INTEGER NOT NULL,
        role TEXT NOT NULL CHECK (role IN ('user', 'assistant', 'system')),
        content TEXT NOT NULL,
        metadata TEXT NOT NULL DEFAULT '{}',
        timestamp TEXT NOT NULL,
        UNIQUE (session_id, message_index)
      )
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_turns_session
        ON conversation_turns(session_id, message_index DESC);
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS core_state (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        value_type TEXT NOT NULL,
        updated_at TEXT NOT NULL
      )
    `);
  }

  /**
   * Get the underlying better-sqlite3 database instance.
   */
  getDb(): SqliteDb {
    return this.db;
  }

  /**
   * Close the database connection.
   */
  close(): void {
    this.db.close();
  }

  /**
   * Check if the database is open.
   */
  isOpen(): boolean {
    return this.db.open;
  }

  /**
   * Execute a database operation with automatic retry on lock errors.
   * @throws DatabaseLockedError if all retries are exhausted
   */
  withRetry<T>(operation: () => T): T {
    return withRetrySync(operation, this.retryConfig);
  }

  /**
   * Run `fn` inside an IMMEDIATE transaction, retrying on lock errors.
   * The write lock is taken up front, so reads inside `fn` cannot be
   * invalidated by another writer before the transaction commits.
   */
  transaction<T>(fn: () => T): T {
    const tx = this.db.transaction(fn);
    return this.withRetry(() => tx.immediate());
  }
}

export default Database;
