/**
 * Shared fixtures for the test suites: temporary databases, a
 * deterministic embedding provider and a scripted language model.
 */

import { randomUUID } from "crypto";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { Database } from "../db/sqlite.js";
import { VectorHelper } from "../db/vectors.js";
import { MemoryEngine } from "../core/memory.js";
import { EmbeddingUnavailableError, LLMUnavailableError } from "../core/errors.js";
import type { EmbeddingProvider } from "../embeddings/provider.js";
import type { InvokeOptions, LanguageModel } from "../llm/provider.js";

/**
 * Create a temporary database file path
 */
export function createTempDbPath(): string {
  return path.join(os.tmpdir(), `test-kindred-${randomUUID()}.db`);
}

/**
 * Close the database and remove its file, WAL and SHM.
 */
export function cleanupDb(db: Database | undefined, dbPath: string): void {
  if (db && db.isOpen()) {
    db.close();
  }
  for (const file of [dbPath, `${dbPath}-wal`, `${dbPath}-shm`]) {
    fs.rmSync(file, { force: true });
  }
}

/**
 * Embedding provider returning vectors registered per text.
 * Unregistered text gets `fallback`.
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly calls: string[] = [];
  failing = false;
  private readonly vectors = new Map<string, number[]>();

  constructor(
    private readonly dimensions = 3,
    private readonly fallback: number[] = [0, 0, 1]
  ) {}

  set(text: string, vector: number[]): this {
    this.vectors.set(text, vector);
    return this;
  }

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    if (this.failing) {
      throw new EmbeddingUnavailableError("fake", "offline");
    }
    return this.vectors.get(text) ?? this.fallback;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const result: number[][] = [];
    for (const text of texts) {
      result.push(await this.embed(text));
    }
    return result;
  }

  getDimensions(): number {
    return this.dimensions;
  }

  getModelName(): string {
    return "fake-embedding";
  }
}

/**
 * Language model answering from a queue. An Error entry rejects that call;
 * an exhausted queue rejects with LLMUnavailableError.
 */
export class ScriptedLanguageModel implements LanguageModel {
  readonly prompts: string[] = [];
  readonly options: InvokeOptions[] = [];
  private readonly script: Array<string | Error>;

  constructor(script: Array<string | Error> = []) {
    this.script = [...script];
  }

  push(...entries: Array<string | Error>): this {
    this.script.push(...entries);
    return this;
  }

  async invoke(prompt: string, options: InvokeOptions): Promise<string> {
    this.prompts.push(prompt);
    this.options.push(options);
    const next = this.script.shift();
    if (next === undefined) {
      throw new LLMUnavailableError("no scripted response");
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

export interface MemoryFixture {
  dbPath: string;
  db: Database;
  vectors: VectorHelper;
  embeddings: FakeEmbeddingProvider;
  memory: MemoryEngine;
}

/**
 * A MemoryEngine on a fresh temporary database.
 */
export function createMemoryFixture(): MemoryFixture {
  const dbPath = createTempDbPath();
  const db = new Database(dbPath);
  const vectors = new VectorHelper(db.getDb());
  const embeddings = new FakeEmbeddingProvider();
  const memory = new MemoryEngine({ db, vectors, embeddings });
  return { dbPath, db, vectors, embeddings, memory };
}

/**
 * Temporary directory removed by the returned cleanup function.
 */
export function createTempDir(): { dir: string; cleanup: () => void } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "test-kindred-"));
  return { dir, cleanup: () => fs.rmSync(dir, { recursive: true, force: true }) };
}
