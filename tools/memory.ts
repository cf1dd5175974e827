/**
 * Memory capabilities: let the model search its own long-term memory.
 */

import { Type } from "@sinclair/typebox";
import type { MemoryEngine } from "../core/memory.js";
import type { Capability } from "../core/registry.js";
import { MemoryCategory } from "../core/types.js";

const RecallParams = Type.Object({
  query: Type.String({ minLength: 1, description: "What to search for" }),
  limit: Type.Integer({ minimum: 1, maximum: 20, default: 5, description: "Maximum results" }),
  min_importance: Type.Integer({ minimum: 1, maximum: 10, default: 1, description: "Minimum importance (1-10)" }),
  category: Type.Optional(Type.Enum(MemoryCategory, { description: "Only search one category" })),
});

const StatsParams = Type.Object({});

export function createMemoryCapabilities(memory: MemoryEngine): {
  recall: Capability<typeof RecallParams>;
  stats: Capability<typeof StatsParams>;
} {
  return {
    recall: {
      name: "recall_memories",
      description: "Search your long-term memory for things related to a query.",
      parameters: RecallParams,
      returns: "memories with id, content, category, importance, date and score",
      category: "memory",
      execute: async ({ query, limit, min_importance, category }) => {
        const results = await memory.recall(query, {
          nResults: limit,
          minImportance: min_importance,
          category,
        });
        return {
          memories: results.map((m) => ({
            id: m.id,
            content: m.content,
            category: m.category,
            importance: m.importance,
            date: m.createdAt.slice(0, 10),
            score: Number(m.score.toFixed(3)),
          })),
          count: results.length,
        };
      },
    },
    stats: {
      name: "memory_stats",
      description: "Get statistics about your stored memories.",
      parameters: StatsParams,
      returns: "total, counts by category and by importance",
      category: "memory",
      execute: () => memory.stats(),
    },
  };
}
