/**
 * Vector storage and nearest-neighbour search over memory embeddings.
 * Embeddings are stored as Float32 blobs; similarity is computed in process.
 */

import type { Database as SqliteDb } from "better-sqlite3";

/**
 * One nearest-neighbour hit.
 */
export interface VectorNeighbor {
  /** Memory ID */
  id: string;
  /** Cosine distance, 0 (identical) to 1 (orthogonal or opposed) */
  distance: number;
}

interface EmbeddingRow {
  id: string;
  embedding: Buffer;
}

/**
 * Vector helper class providing embedding storage and similarity search.
 */
export class VectorHelper {
  private db: SqliteDb;

  /**
   * Create a new VectorHelper instance.
   * @param db - The better-sqlite3 database instance (schema already created)
   */
  constructor(db: SqliteDb) {
    this.db = db;
  }

  /**
   * Store an embedding vector for a memory, replacing any previous one.
   */
  storeEmbedding(memoryId: string, embedding: number[]): void {
    const buffer = Buffer.from(new Float32Array(embedding).buffer);
    this.db
      .prepare<[string, Buffer]>(`
        INSERT OR REPLACE INTO memory_vectors (memory_id, embedding)
        VALUES (?, ?)
      `)
      .run(memoryId, buffer);
  }

  /**
   * Delete an embedding vector for a memory.
   */
  deleteEmbedding(memoryId: string): void {
    this.db.prepare<[string]>(`DELETE FROM memory_vectors WHERE memory_id = ?`).run(memoryId);
  }

  /**
   * Get an embedding by memory ID.
   * @returns The embedding vector or null if not found
   */
  getEmbedding(memoryId: string): number[] | null {
    const row = this.db
      .prepare<[string], { embedding: Buffer }>(
        `SELECT embedding FROM memory_vectors WHERE memory_id = ?`
      )
      .get(memoryId);
    return row ? bufferToFloatArray(row.embedding) : null;
  }

  /**
   * Find the memories nearest to `queryEmbedding`, ascending by distance.
   * Equal distances keep insertion order.
   * @param limit - Maximum number of neighbours
   * @param category - Restrict candidates to one memory category
   */
  nearest(queryEmbedding: number[], limit: number, category?: string): VectorNeighbor[] {
    if (limit <= 0) {
      return [];
    }

    const rows =
      category === undefined
        ? this.db
            .prepare<[], EmbeddingRow>(`
              SELECT v.memory_id AS id, v.embedding
              FROM memory_vectors v
              JOIN memories m ON v.memory_id = m.id
              ORDER BY m.created_at, m.id
            `)
            .all()
        : this.db
            .prepare<[string], EmbeddingRow>(`
              SELECT v.memory_id AS id, v.embedding
              FROM memory_vectors v
              JOIN memories m ON v.memory_id = m.id
              WHERE m.category = ?
              ORDER BY m.created_at, m.id
            `)
            .all(category);

    const neighbors: VectorNeighbor[] = rows.map((row) => ({
      id: row.id,
      distance: cosineDistance(queryEmbedding, bufferToFloatArray(row.embedding)),
    }));

    neighbors.sort((a, b) => a.distance - b.distance);
    return neighbors.slice(0, limit);
  }

  /**
   * Get the number of stored embeddings.
   */
  getEmbeddingCount(): number {
    const row = this.db
      .prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM memory_vectors")
      .get();
    return row?.count ?? 0;
  }
}

/**
 * Convert a stored Float32 blob back to a number array.
 */
export function bufferToFloatArray(buffer: Buffer): number[] {
  // Copy first: the blob's byteOffset is not guaranteed to be 4-aligned
  const bytes = Uint8Array.from(buffer.subarray(0, buffer.byteLength - (buffer.byteLength % 4)));
  return Array.from(new Float32Array(bytes.buffer));
}

/**
 * Cosine distance `1 - clamp(cos, 0, 1)`.
 * A zero vector, or vectors of different length, are at distance 1.
 */
export function cosineDistance(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) {
    return 1;
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 1;
  }

  const similarity = dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
  return 1 - Math.max(0, Math.min(1, similarity));
}

export default VectorHelper;
