/**
 * CLI list command - List stored memories, newest first.
 * Command: kindred memory-list
 * Options: --tag <tag>, --category <category>, --limit <n>, --json
 */

import type { MemoryEngine } from "../core/memory.js";
import { InvalidInputError } from "../core/errors.js";
import { isMemoryCategory, type MemoryRecord } from "../core/types.js";
import { isoDate, truncateText } from "./format.js";

/**
 * CLI list command options
 */
export interface ListOptions {
  /** Only memories carrying this tag */
  tag?: string;
  /** Only memories in this category */
  category?: string;
  /** Maximum number of results (default: 20) */
  limit?: number;
  /** Output as JSON */
  json?: boolean;
}

/**
 * Memory list item (simplified for display)
 */
export interface ListItem {
  id: string;
  content: string;
  category: string;
  importance: number;
  tags: string[];
  embeddingStatus: string;
  createdAt: string;
}

export interface ListCommandResult {
  count: number;
  filter: string | null;
  items: ListItem[];
}

function toListItem(memory: MemoryRecord): ListItem {
  return {
    id: memory.id,
    content: memory.content,
    category: memory.category,
    importance: memory.importance,
    tags: memory.tags,
    embeddingStatus: memory.embeddingStatus,
    createdAt: memory.createdAt,
  };
}

function formatItem(item: ListItem): string {
  const tags = item.tags.length > 0 ? ` | tags: ${item.tags.join(", ")}` : "";
  const degraded = item.embeddingStatus === "degraded" ? " [DEGRADED]" : "";
  return [
    `${item.id}${degraded}`,
    `  [${item.category}] importance ${item.importance} | ${isoDate(item.createdAt)}${tags}`,
    `  Text: ${truncateText(item.content)}`,
  ].join("\n");
}

function formatTextOutput(result: ListCommandResult): string {
  const lines: string[] = [`Memories: ${result.count}`];
  if (result.filter) {
    lines.push(`Filter: ${result.filter}`);
  }
  lines.push("");

  if (result.items.length === 0) {
    lines.push("No memories found.");
  } else {
    for (const item of result.items) {
      lines.push(formatItem(item), "");
    }
  }
  return lines.join("\n").trimEnd();
}

/**
 * MemoryListCommand lists memories by tag, by category, or most recent.
 */
export class MemoryListCommand {
  private memory: Pick<MemoryEngine, "getByTag" | "getByCategory" | "getRecent">;

  constructor(memory: Pick<MemoryEngine, "getByTag" | "getByCategory" | "getRecent">) {
    this.memory = memory;
  }

  /**
   * @throws InvalidInputError when both filters are given or the category is unknown
   */
  async execute(options: ListOptions = {}): Promise<string> {
    const limit = options.limit ?? 20;
    if (options.tag !== undefined && options.category !== undefined) {
      throw new InvalidInputError("filter", "use either --tag or --category, not both");
    }

    let memories: MemoryRecord[];
    let filter: string | null = null;
    if (options.tag !== undefined) {
      memories = this.memory.getByTag(options.tag, limit);
      filter = `tag=${options.tag}`;
    } else if (options.category !== undefined) {
      if (!isMemoryCategory(options.category)) {
        throw new InvalidInputError("category", `unknown category '${options.category}'`);
      }
      memories = this.memory.getByCategory(options.category, limit);
      filter = `category=${options.category}`;
    } else {
      memories = this.memory.getRecent(limit);
    }

    const result: ListCommandResult = {
      count: memories.length,
      filter,
      items: memories.map(toListItem),
    };

    if (options.json) {
      return JSON.stringify(result, null, 2);
    }
    return formatTextOutput(result);
  }
}

export default MemoryListCommand;
