/**
 * CLI stats command - Display memory statistics.
 * Command: kindred memory-stats
 * Shows counts by category and importance, degraded embeddings, DB size,
 * the embedding provider and the last heartbeat.
 */

import { existsSync, statSync } from "node:fs";
import type { MemoryEngine } from "../core/memory.js";
import type { MemoryStats } from "../core/types.js";
import type { StateStore } from "../db/state.js";
import { LAST_BEAT_KEY } from "../services/heartbeat.js";

/**
 * CLI stats command options
 */
export interface StatsOptions {
  /** Output as JSON */
  json?: boolean;
}

/**
 * Embedding provider information
 */
export interface EmbeddingInfo {
  provider: string;
  model: string;
  dimensions: number;
}

/**
 * Stats command result
 */
export interface StatsCommandResult {
  stats: MemoryStats;
  dbPath: string;
  dbFileSize: number;
  dbFileSizeFormatted: string;
  embeddingInfo: EmbeddingInfo;
  /** ISO timestamp of the last heartbeat, null if it never ran */
  lastHeartbeat: string | null;
}

function formatBytes(bytes: number): string {
  if (bytes === 0) return "0 B";
  const units = ["B", "KB", "MB", "GB"];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), units.length - 1);
  const size = bytes / Math.pow(1024, i);
  return `${size.toFixed(i === 0 ? 0 : 2)} ${units[i]}`;
}

function formatTextOutput(result: StatsCommandResult): string {
  const { stats } = result;
  const lines: string[] = ["Memory Statistics", "=================", ""];

  lines.push(`Total memories: ${stats.total}`);
  lines.push(`Degraded embeddings: ${stats.degradedEmbeddings}`);
  lines.push("");

  lines.push("By category:");
  const categories = Object.entries(stats.byCategory);
  if (categories.length === 0) {
    lines.push("  (none)");
  }
  for (const [category, count] of categories) {
    lines.push(`  ${category.padEnd(12)} ${count}`);
  }
  lines.push("");

  lines.push("By importance:");
  for (let importance = 10; importance >= 1; importance--) {
    const count = stats.byImportance[importance] ?? 0;
    const bar = "█".repeat(Math.min(count, 20));
    lines.push(`  ${String(importance).padStart(2)} ${String(count).padStart(4)} ${bar}`.trimEnd());
  }
  lines.push("");

  const { provider, model, dimensions } = result.embeddingInfo;
  lines.push(`Embedding: ${provider}/${model} (${dimensions} dimensions)`);
  lines.push(`Database: ${result.dbPath} (${result.dbFileSizeFormatted})`);
  lines.push(`Last heartbeat: ${result.lastHeartbeat ?? "never"}`);

  return lines.join("\n");
}

/**
 * MemoryStatsCommand reports aggregate memory counts.
 */
export class MemoryStatsCommand {
  private memory: Pick<MemoryEngine, "stats">;
  private state: StateStore;
  private dbPath: string;
  private embeddingInfo: EmbeddingInfo;

  constructor(memory: Pick<MemoryEngine, "stats">, state: StateStore, dbPath: string, embeddingInfo: EmbeddingInfo) {
    this.memory = memory;
    this.state = state;
    this.dbPath = dbPath;
    this.embeddingInfo = embeddingInfo;
  }

  async execute(options: StatsOptions = {}): Promise<string> {
    const lastBeat = await this.state.get(LAST_BEAT_KEY);
    const dbFileSize = this.getDbFileSize();

    const result: StatsCommandResult = {
      stats: this.memory.stats(),
      dbPath: this.dbPath,
      dbFileSize,
      dbFileSizeFormatted: formatBytes(dbFileSize),
      embeddingInfo: this.embeddingInfo,
      lastHeartbeat: typeof lastBeat === "string" ? lastBeat : null,
    };

    if (options.json) {
      return JSON.stringify(result, null, 2);
    }
    return formatTextOutput(result);
  }

  private getDbFileSize(): number {
    if (this.dbPath === ":memory:" || !existsSync(this.dbPath)) {
      return 0;
    }
    return statSync(this.dbPath).size;
  }
}

export default MemoryStatsCommand;
