/**
 * Key-value state store for values that outlive a single turn
 * (heartbeat bookkeeping, last reflection, counters).
 */

import type { Database } from "./sqlite.js";

/**
 * JSON-serialisable value
 */
export type StateValue =
  | string
  | number
  | boolean
  | null
  | StateValue[]
  | { [key: string]: StateValue };

/**
 * Storage-agnostic key-value store.
 */
export interface StateStore {
  set(key: string, value: StateValue): Promise<void>;
  get(key: string): Promise<StateValue | undefined>;
  get(key: string, defaultValue: StateValue): Promise<StateValue>;
  /** @returns true if the key existed */
  delete(key: string): Promise<boolean>;
  keys(): Promise<string[]>;
  export(): Promise<Record<string, StateValue>>;
  /** Write every entry of `state`, overwriting existing keys */
  import(state: Record<string, StateValue>): Promise<void>;
}

/**
 * Name of the JS type of a state value, as recorded in `value_type`.
 */
export function stateValueType(value: StateValue): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

/**
 * StateStore backed by the `core_state` table.
 */
export class SqliteStateStore implements StateStore {
  constructor(private readonly database: Database) {}

  async set(key: string, value: StateValue): Promise<void> {
    this.database.withRetry(() =>
      this.database
        .getDb()
        .prepare<[string, string, string, string]>(`
          INSERT INTO core_state (key, value, value_type, updated_at)
          VALUES (?, ?, ?, ?)
          ON CONFLICT(key) DO UPDATE SET
            value = excluded.value,
            value_type = excluded.value_type,
            updated_at = excluded.updated_at
        `)
        .run(key, JSON.stringify(value), stateValueType(value), new Date().toISOString())
    );
  }

  get(key: string): Promise<StateValue | undefined>;
  get(key: string, defaultValue: StateValue): Promise<StateValue>;
  async get(key: string, defaultValue?: StateValue): Promise<StateValue | undefined> {
    const row = this.database.withRetry(() =>
      this.database
        .getDb()
        .prepare<[string], { value: string }>(`SELECT value FROM core_state WHERE key = ?`)
        .get(key)
    );
    return row ? parseStateValue(row.value) : defaultValue;
  }

  async delete(key: string): Promise<boolean> {
    const result = this.database.withRetry(() =>
      this.database.getDb().prepare<[string]>(`DELETE FROM core_state WHERE key = ?`).run(key)
    );
    return result.changes > 0;
  }

  async keys(): Promise<string[]> {
    const rows = this.database.withRetry(() =>
      this.database
        .getDb()
        .prepare<[], { key: string }>(`SELECT key FROM core_state ORDER BY key`)
        .all()
    );
    return rows.map((row) => row.key);
  }

  async export(): Promise<Record<string, StateValue>> {
    const rows = this.database.withRetry(() =>
      this.database
        .getDb()
        .prepare<[], { key: string; value: string }>(`SELECT key, value FROM core_state ORDER BY key`)
        .all()
    );
    const state: Record<string, StateValue> = {};
    for (const row of rows) {
      state[row.key] = parseStateValue(row.value);
    }
    return state;
  }

  async import(state: Record<string, StateValue>): Promise<void> {
    const entries = Object.entries(state);
    this.database.transaction(() => {
      const stmt = this.database.getDb().prepare<[string, string, string, string]>(`
        INSERT OR REPLACE INTO core_state (key, value, value_type, updated_at)
        VALUES (?, ?, ?, ?)
      `);
      const now = new Date().toISOString();
      for (const [key, value] of entries) {
        stmt.run(key, JSON.stringify(value), stateValueType(value), now);
      }
    });
  }
}

function parseStateValue(raw: string): StateValue {
  // Only this module writes the column, always via JSON.stringify
  const parsed: StateValue = JSON.parse(raw);
  return parsed;
}
