/**
 * MemoryEngine - long-term memory with importance-weighted semantic recall.
 *
 * Records are written by explicit save/update/delete calls only and never
 * expire; recall filters by importance and distance instead. Read paths
 * degrade to empty results on backend faults so a turn never fails on them.
 */

import type { Database } from "../db/sqlite.js";
import type { VectorHelper } from "../db/vectors.js";
import { parseJsonObject } from "../db/conversation.js";
import type { EmbeddingProvider } from "../embeddings/provider.js";
import { InvalidInputError, errorMessage } from "./errors.js";
import { rankCandidates, type RecallCandidate } from "./scorer.js";
import {
  isMemoryCategory,
  type EmbeddingStatus,
  type MemoryCategory,
  type MemoryRecord,
  type MemoryStats,
  type ScoredMemory,
} from "./types.js";
import { silentLogger, type Logger } from "../utils/logger.js";

/**
 * Input for saving a memory
 */
export interface SaveMemoryInput {
  /** Description of what to remember */
  content: string;
  /** One of the known memory categories */
  category: string;
  /** 1-10; out-of-range values are clamped */
  importance: number;
  tags?: string[];
  metadata?: Record<string, unknown>;
}

/**
 * Recall options; omitted fields use the engine defaults
 */
export interface RecallOptions {
  /** Maximum results (default: 10) */
  nResults?: number;
  /** Minimum importance (default: 5) */
  minImportance?: number;
  /** Only search this category */
  category?: string;
  /** Distance cutoff, 0 to 1 (default: 0.7) */
  maxDistance?: number;
}

export interface UpdateMemoryInput {
  content?: string;
  importance?: number;
  tags?: string[];
}

export interface MemoryEngineDeps {
  db: Database;
  vectors: VectorHelper;
  embeddings: EmbeddingProvider;
  logger?: Logger;
}

export const RECALL_DEFAULTS = {
  nResults: 10,
  minImportance: 5,
  maxDistance: 0.7,
} as const;

const LIST_DEFAULT_LIMIT = 20;

interface MemoryRow {
  id: string;
  content: string;
  category: string;
  importance: number;
  tags: string;
  metadata: string;
  embedding_status: EmbeddingStatus;
  created_at: string;
  updated_at: string | null;
}

const SELECT_COLUMNS = `id, content, category, importance, tags, metadata, embedding_status, created_at, updated_at`;

/**
 * Clamp an importance to the integer range 1..10.
 */
export function clampImportance(importance: number): number {
  if (!Number.isFinite(importance)) {
    return 5;
  }
  return Math.min(10, Math.max(1, Math.round(importance)));
}

export class MemoryEngine {
  private readonly db: Database;
  private readonly vectors: VectorHelper;
  private readonly embeddings: EmbeddingProvider;
  private readonly logger: Logger;
  private lastIdMs = 0;

  constructor(deps: MemoryEngineDeps) {
    this.db = deps.db;
    this.vectors = deps.vectors;
    this.embeddings = deps.embeddings;
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Save a memory and its embedding.
   * An embedding failure stores a zero vector and marks the record degraded.
   * @returns The new memory id
   */
  async save(input: SaveMemoryInput): Promise<string> {
    const content = input.content.trim();
    if (content.length === 0) {
      throw new InvalidInputError("content", "memory content cannot be empty");
    }
    if (!isMemoryCategory(input.category)) {
      throw new InvalidInputError("category", `unknown category '${input.category}'`);
    }

    const importance = clampImportance(input.importance);
    const tags = input.tags ?? [];
    const { embedding, status } = await this.embedOrDegrade(content);

    const id = this.db.transaction(() => {
      const newId = this.nextId();
      this.db
        .getDb()
        .prepare<[string, string, string, number, string, string, EmbeddingStatus, string]>(`
          INSERT INTO memories (id, content, category, importance, tags, metadata, embedding_status, created_at)
          VALUES (?, ?, ?, ?, ?, ?, ?, ?)
        `)
        .run(
          newId,
          content,
          input.category,
          importance,
          JSON.stringify(tags),
          JSON.stringify(input.metadata ?? {}),
          status,
          new Date().toISOString()
        );
      this.vectors.storeEmbedding(newId, embedding);
      return newId;
    });

    this.logger.info(`Saved memory [${input.category}] importance=${importance}`, { id });
    return id;
  }

  /**
   * Semantic recall with importance filtering and combined scoring.
   * Any failure (embedding or storage) yields an empty list.
   */
  async recall(query: string, options: RecallOptions = {}): Promise<ScoredMemory[]> {
    const nResults = options.nResults ?? RECALL_DEFAULTS.nResults;
    const minImportance = options.minImportance ?? RECALL_DEFAULTS.minImportance;
    const maxDistance = options.maxDistance ?? RECALL_DEFAULTS.maxDistance;

    let queryEmbedding: number[];
    try {
      queryEmbedding = await this.embeddings.embed(query);
    } catch (error) {
      this.logger.warn("Recall skipped: query embedding failed", { error: errorMessage(error) });
      return [];
    }

    try {
      const neighbors = this.db.withRetry(() =>
        this.vectors.nearest(queryEmbedding, nResults * 2, options.category)
      );
      if (neighbors.length === 0) {
        return [];
      }

      const records = new Map(this.getMany(neighbors.map((n) => n.id)).map((r) => [r.id, r]));
      const candidates: RecallCandidate[] = [];
      for (const neighbor of neighbors) {
        const record = records.get(neighbor.id);
        if (record) {
          candidates.push({ record, distance: neighbor.distance });
        }
      }

      const selected = rankCandidates(candidates, { nResults, minImportance, maxDistance });
      this.logger.debug(`Recalled ${selected.length} memories from ${neighbors.length} candidates`);
      return selected;
    } catch (error) {
      this.logger.warn("Recall failed", { error: errorMessage(error) });
      return [];
    }
  }

  /**
   * Fetch one memory by id.
   */
  get(id: string): MemoryRecord | null {
    try {
      const row = this.db.withRetry(() =>
        this.db
          .getDb()
          .prepare<[string], MemoryRow>(`SELECT ${SELECT_COLUMNS} FROM memories WHERE id = ?`)
          .get(id)
      );
      return row ? rowToRecord(row) : null;
    } catch (error) {
      this.logger.warn("Memory lookup failed", { id, error: errorMessage(error) });
      return null;
    }
  }

  /**
   * Memories carrying `tag`, newest first.
   */
  getByTag(tag: string, limit: number = LIST_DEFAULT_LIMIT): MemoryRecord[] {
    return this.list(
      "by tag",
      `SELECT ${SELECT_COLUMNS} FROM memories
       WHERE EXISTS (SELECT 1 FROM json_each(memories.tags) WHERE json_each.value = ?)
       ORDER BY created_at DESC, id DESC LIMIT ?`,
      [tag, limit]
    );
  }

  /**
   * Memories in `category` with at least `minImportance`, newest first.
   */
  getByCategory(category: string, limit: number = LIST_DEFAULT_LIMIT, minImportance = 0): MemoryRecord[] {
    return this.list(
      "by category",
      `SELECT ${SELECT_COLUMNS} FROM memories
       WHERE category = ? AND importance >= ?
       ORDER BY created_at DESC, id DESC LIMIT ?`,
      [category, minImportance, limit]
    );
  }

  /**
   * Most recently saved memories. Order among equal timestamps is unspecified.
   */
  getRecent(limit: number = LIST_DEFAULT_LIMIT): MemoryRecord[] {
    return this.list(
      "recent",
      `SELECT ${SELECT_COLUMNS} FROM memories ORDER BY created_at DESC, id DESC LIMIT ?`,
      [limit]
    );
  }

  /**
   * Partial update. A content change re-embeds the record.
   * @returns false if the memory does not exist
   */
  async update(id: string, changes: UpdateMemoryInput): Promise<boolean> {
    const existing = this.get(id);
    if (!existing) {
      return false;
    }

    const content = changes.content?.trim();
    if (content !== undefined && content.length === 0) {
      throw new InvalidInputError("content", "memory content cannot be empty");
    }

    const contentChanged = content !== undefined && content !== existing.content;
    const reembedded = contentChanged ? await this.embedOrDegrade(content) : null;

    return this.db.transaction(() => {
      const result = this.db
        .getDb()
        .prepare<[string, number, string, EmbeddingStatus, string, string]>(`
          UPDATE memories
          SET content = ?, importance = ?, tags = ?, embedding_status = ?, updated_at = ?
          WHERE id = ?
        `)
        .run(
          content ?? existing.content,
          changes.importance === undefined ? existing.importance : clampImportance(changes.importance),
          JSON.stringify(changes.tags ?? existing.tags),
          reembedded?.status ?? existing.embeddingStatus,
          new Date().toISOString(),
          id
        );
      if (result.changes === 0) {
        return false;
      }
      if (reembedded) {
        this.vectors.storeEmbedding(id, reembedded.embedding);
      }
      return true;
    });
  }

  /**
   * Delete a memory and its vector.
   * @returns false if it did not exist
   */
  delete(id: string): boolean {
    return this.db.transaction(() => {
      this.vectors.deleteEmbedding(id);
      const result = this.db
        .getDb()
        .prepare<[string]>(`DELETE FROM memories WHERE id = ?`)
        .run(id);
      return result.changes > 0;
    });
  }

  /**
   * Aggregate counts over every stored record, degraded ones included.
   */
  stats(): MemoryStats {
    const byImportance: Record<number, number> = {};
    for (let i = 1; i <= 10; i++) {
      byImportance[i] = 0;
    }
    const stats: MemoryStats = { total: 0, byCategory: {}, byImportance, degradedEmbeddings: 0 };

    try {
      const db = this.db.getDb();
      this.db.withRetry(() => {
        for (const row of db
          .prepare<[], { category: string; count: number }>(
            `SELECT category, COUNT(*) AS count FROM memories GROUP BY category ORDER BY category`
          )
          .all()) {
          stats.byCategory[row.category] = row.count;
          stats.total += row.count;
        }
        for (const row of db
          .prepare<[], { importance: number; count: number }>(
            `SELECT importance, COUNT(*) AS count FROM memories GROUP BY importance`
          )
          .all()) {
          stats.byImportance[row.importance] = row.count;
        }
        stats.degradedEmbeddings =
          db
            .prepare<[], { count: number }>(
              `SELECT COUNT(*) AS count FROM memories WHERE embedding_status = 'degraded'`
            )
            .get()?.count ?? 0;
      });
    } catch (error) {
      this.logger.warn("Memory stats failed", { error: errorMessage(error) });
    }

    return stats;
  }

  private async embedOrDegrade(content: string): Promise<{ embedding: number[]; status: EmbeddingStatus }> {
    try {
      return { embedding: await this.embeddings.embed(content), status: "ok" };
    } catch (error) {
      this.logger.warn("Embedding failed, storing zero vector", { error: errorMessage(error) });
      return { embedding: new Array<number>(this.embeddings.getDimensions()).fill(0), status: "degraded" };
    }
  }

  /**
   * Time-derived id, strictly increasing within this engine and unused in the table.
   * Must run inside a transaction.
   */
  private nextId(): string {
    let ms = Math.max(Date.now(), this.lastIdMs + 1);
    const exists = this.db
      .getDb()
      .prepare<[string], { found: number }>(`SELECT 1 AS found FROM memories WHERE id = ?`);
    while (exists.get(`mem_${ms}`)) {
      ms++;
    }
    this.lastIdMs = ms;
    return `mem_${ms}`;
  }

  private getMany(ids: string[]): MemoryRecord[] {
    if (ids.length === 0) {
      return [];
    }
    const placeholders = ids.map(() => "?").join(", ");
    const rows = this.db
      .getDb()
      .prepare<string[], MemoryRow>(`SELECT ${SELECT_COLUMNS} FROM memories WHERE id IN (${placeholders})`)
      .all(...ids);
    return rows.map(rowToRecord);
  }

  private list(label: string, sql: string, params: Array<string | number>): MemoryRecord[] {
    try {
      const rows = this.db.withRetry(() =>
        this.db.getDb().prepare<Array<string | number>, MemoryRow>(sql).all(...params)
      );
      return rows.map(rowToRecord);
    } catch (error) {
      this.logger.warn(`Memory listing (${label}) failed`, { error: errorMessage(error) });
      return [];
    }
  }
}

function rowToRecord(row: MemoryRow): MemoryRecord {
  return {
    id: row.id,
    content: row.content,
    category: toCategory(row.category),
    importance: row.importance,
    tags: parseTags(row.tags),
    metadata: parseJsonObject(row.metadata),
    embeddingStatus: row.embedding_status,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toCategory(value: string): MemoryCategory {
  // Rows are only written through save(), which validates the category
  if (isMemoryCategory(value)) {
    return value;
  }
  throw new Error(`Stored memory has unknown category '${value}'`);
}

function parseTags(raw: string): string[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return [];
  }
  return Array.isArray(parsed) ? parsed.filter((tag): tag is string => typeof tag === "string") : [];
}

/**
 * Render recalled memories for the prompt, grouped by category in
 * first-seen order. Empty input renders "".
 */
export function formatMemoriesForPrompt(memories: MemoryRecord[]): string {
  if (memories.length === 0) {
    return "";
  }

  const byCategory = new Map<string, MemoryRecord[]>();
  for (const memory of memories) {
    const group = byCategory.get(memory.category);
    if (group) {
      group.push(memory);
    } else {
      byCategory.set(memory.category, [memory]);
    }
  }

  const lines = ["[RELEVANT MEMORIES]", ""];
  for (const [category, group] of byCategory) {
    lines.push(`## ${category.toUpperCase()}`);
    for (const memory of group) {
      const stars = "★".repeat(Math.min(3, Math.floor((memory.importance + 2) / 3)));
      lines.push(`${stars} [${memory.createdAt.slice(0, 10)}] ${memory.content}`);
    }
    lines.push("");
  }
  lines.push("[END MEMORIES]");
  return lines.join("\n");
}
