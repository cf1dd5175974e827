/**
 * RecallScorer - importance-weighted relevance scoring for recall
 *
 * Score formula:
 *   score = importance * (1 - distance)
 *
 * Candidates below the minimum importance are dropped. Candidates farther
 * than the distance cutoff are dropped unless their importance is at least
 * IMPORTANCE_BYPASS_THRESHOLD: critical memories surface even when only
 * loosely related to the query.
 */

import type { MemoryRecord, ScoredMemory } from "./types.js";

/**
 * Importance at or above which the distance cutoff does not apply.
 * Not configurable.
 */
export const IMPORTANCE_BYPASS_THRESHOLD = 9;

/**
 * A nearest-neighbour candidate with its record, in neighbour order
 */
export interface RecallCandidate {
  record: MemoryRecord;
  distance: number;
}

export interface RecallFilter {
  nResults: number;
  minImportance: number;
  maxDistance: number;
}

/**
 * Whether a candidate survives the importance and distance filters.
 */
export function passesRecallFilter(
  importance: number,
  distance: number,
  filter: Pick<RecallFilter, "minImportance" | "maxDistance">
): boolean {
  if (importance < filter.minImportance) {
    return false;
  }
  return distance <= filter.maxDistance || importance >= IMPORTANCE_BYPASS_THRESHOLD;
}

/**
 * Combined recall score.
 */
export function recallScore(importance: number, distance: number): number {
  return importance * (1 - distance);
}

/**
 * Filter, score and rank candidates. Equal scores keep neighbour order
 * (Array.prototype.sort is stable).
 */
export function rankCandidates(candidates: RecallCandidate[], filter: RecallFilter): ScoredMemory[] {
  const scored: ScoredMemory[] = [];

  for (const { record, distance } of candidates) {
    if (!passesRecallFilter(record.importance, distance, filter)) {
      continue;
    }
    scored.push({
      ...record,
      distance,
      relevance: 1 - distance,
      score: recallScore(record.importance, distance),
    });
  }

  scored.sort((a, b) => b.score - a.score);
  return scored.slice(0, Math.max(0, filter.nResults));
}
