/**
 * Lenient reader for the model's answer to the memory evaluation prompt.
 */

import { z } from "zod";
import { MemoryDecisionUnparseableError } from "./errors.js";
import { clampImportance } from "./memory.js";
import { MemoryCategory, isMemoryCategory } from "./types.js";

/** "true"/"false" strings are read as booleans */
function toBoolean(value: unknown): unknown {
  if (typeof value !== "string") {
    return value;
  }
  const lower = value.trim().toLowerCase();
  return lower === "true" ? true : lower === "false" ? false : value;
}

/** Numeric strings become numbers; anything non-numeric is dropped */
function toOptionalNumber(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/** A lone string becomes a one-tag list; non-string entries are dropped */
function toTags(value: unknown): string[] | undefined {
  if (typeof value === "string") {
    return value.trim() === "" ? [] : [value.trim()];
  }
  if (Array.isArray(value)) {
    return value.filter((tag): tag is string => typeof tag === "string");
  }
  return undefined;
}

/** Non-string values (null, numbers) are dropped */
function toOptionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

const MemoryDecisionSchema = z.object({
  save: z.preprocess(toBoolean, z.boolean()),
  description: z.unknown().transform(toOptionalString),
  category: z.unknown().transform(toOptionalString),
  importance: z.unknown().transform(toOptionalNumber),
  tags: z.unknown().transform(toTags),
  reason: z.unknown().transform(toOptionalString),
});

export type MemoryDecision =
  | {
      save: true;
      description: string;
      category: MemoryCategory;
      importance: number;
      tags: string[];
      reason?: string;
    }
  | { save: false; reason: string };

/**
 * Remove markdown code fences (```json ... ```) around model output.
 */
export function stripCodeFences(text: string): string {
  return text.replace(/```(?:json)?\n?/gi, "").trim();
}

/**
 * First balanced `{...}` object in the text, or null.
 * Braces inside JSON strings are skipped.
 */
export function extractJsonObject(text: string): string | null {
  const start = text.indexOf("{");
  if (start === -1) {
    return null;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }
  return null;
}

/**
 * Parse a memory decision.
 * Unknown categories fall back to `fact`; importance is clamped to 1..10 and
 * defaults to 5 when missing or non-numeric; scalar fields given as strings
 * are coerced; a save without a description is treated as "do not save".
 * @throws MemoryDecisionUnparseableError when no valid decision object is found
 */
export function parseMemoryDecision(raw: string): MemoryDecision {
  const json = extractJsonObject(stripCodeFences(raw));
  if (json === null) {
    throw new MemoryDecisionUnparseableError(raw, "no JSON object found");
  }

  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    throw new MemoryDecisionUnparseableError(raw, error instanceof Error ? error.message : "invalid JSON");
  }

  const parsed = MemoryDecisionSchema.safeParse(data);
  if (!parsed.success) {
    throw new MemoryDecisionUnparseableError(raw, parsed.error.issues[0]?.message ?? "invalid decision");
  }

  const decision = parsed.data;
  if (!decision.save) {
    return { save: false, reason: decision.reason ?? "not worth saving" };
  }

  const description = decision.description?.trim() ?? "";
  if (description === "") {
    return { save: false, reason: "no description given" };
  }

  const category = decision.category?.trim().toLowerCase() ?? "";
  return {
    save: true,
    description,
    category: isMemoryCategory(category) ? category : MemoryCategory.fact,
    importance: clampImportance(decision.importance ?? 5),
    tags: decision.tags ?? [],
    reason: decision.reason,
  };
}
