/**
 * CLI search command - Semantic memory search from the command line.
 * Command: kindred memory-search <query>
 * Options: --limit <n>, --min-importance <n>, --category <category>, --json
 */

import type { MemoryEngine } from "../core/memory.js";
import { InvalidInputError } from "../core/errors.js";
import { isMemoryCategory, type ScoredMemory } from "../core/types.js";
import { isoDate, truncateText } from "./format.js";

/**
 * CLI search command options
 */
export interface SearchOptions {
  /** Maximum number of results (default: 10) */
  limit?: number;
  /** Minimum importance (default: 1) */
  minImportance?: number;
  /** Restrict to one category */
  category?: string;
  /** Output as JSON */
  json?: boolean;
}

/**
 * Search result with scoring components
 */
export interface SearchResult {
  id: string;
  /** Memory text (truncated in text output only) */
  content: string;
  category: string;
  importance: number;
  distance: number;
  score: number;
  createdAt: string;
}

/**
 * Search command result
 */
export interface SearchCommandResult {
  query: string;
  count: number;
  results: SearchResult[];
  categoryFilter?: string;
}

function toSearchResult(memory: ScoredMemory): SearchResult {
  return {
    id: memory.id,
    content: memory.content,
    category: memory.category,
    importance: memory.importance,
    distance: memory.distance,
    score: memory.score,
    createdAt: memory.createdAt,
  };
}

/**
 * Format a single search result for CLI output
 */
function formatResult(result: SearchResult): string {
  return [
    result.id,
    `  [${result.category}] importance ${result.importance} | score ${result.score.toFixed(3)} | ${isoDate(result.createdAt)}`,
    `  Text: ${truncateText(result.content)}`,
  ].join("\n");
}

function formatTextOutput(result: SearchCommandResult): string {
  const lines: string[] = [`Search results for: "${result.query}"`];
  if (result.categoryFilter) {
    lines.push(`Category filter: ${result.categoryFilter}`);
  }
  lines.push(`Found: ${result.count} result(s)`, "");

  if (result.results.length === 0) {
    lines.push("No memories found matching the query.");
  } else {
    for (const item of result.results) {
      lines.push(formatResult(item), "");
    }
  }

  return lines.join("\n").trimEnd();
}

/**
 * MemorySearchCommand runs a recall with CLI-friendly defaults.
 */
export class MemorySearchCommand {
  private memory: Pick<MemoryEngine, "recall">;

  constructor(memory: Pick<MemoryEngine, "recall">) {
    this.memory = memory;
  }

  /**
   * Execute the search command
   * @throws InvalidInputError for an empty query or unknown category
   */
  async execute(query: string, options: SearchOptions = {}): Promise<string> {
    const trimmedQuery = query.trim();
    if (trimmedQuery.length === 0) {
      throw new InvalidInputError("query", "search query cannot be empty");
    }
    if (options.category !== undefined && !isMemoryCategory(options.category)) {
      throw new InvalidInputError("category", `unknown category '${options.category}'`);
    }

    const memories = await this.memory.recall(trimmedQuery, {
      nResults: options.limit ?? 10,
      minImportance: options.minImportance ?? 1,
      category: options.category,
    });

    const result: SearchCommandResult = {
      query: trimmedQuery,
      count: memories.length,
      results: memories.map(toSearchResult),
      categoryFilter: options.category,
    };

    if (options.json) {
      return JSON.stringify(result, null, 2);
    }
    return formatTextOutput(result);
  }
}

export default MemorySearchCommand;
