/**
 * Parser for the textual tool-call syntax models embed in their answers:
 *
 *   [TOOL:tool_name(param1="value", param2=123)]
 *
 * Malformed pairs are skipped; nothing here throws.
 */

import type { ToolArguments, ToolInvocation, ToolValue } from "./types.js";

const TOOL_CALL_PATTERN = /\[TOOL:(\w+)\((.*?)\)\]/g;

const INTEGER_PATTERN = /^\d+$/;
// One decimal point and at least one digit, on either side
const FLOAT_PATTERN = /^(?:\d+\.\d*|\.\d+)$/;

/**
 * Strip one layer of surrounding quote characters.
 */
function stripQuotes(raw: string): string {
  return raw.replace(/^["']+|["']+$/g, "");
}

/**
 * Coerce a raw argument value: integer, then float, then boolean, else string.
 * Digit strings beyond the safe integer range stay strings so no digit is lost.
 */
export function coerceToolValue(raw: string): ToolValue {
  const value = stripQuotes(raw.trim());

  if (INTEGER_PATTERN.test(value)) {
    const parsed = Number.parseInt(value, 10);
    return Number.isSafeInteger(parsed) ? { kind: "int", value: parsed } : { kind: "string", value };
  }
  if (FLOAT_PATTERN.test(value)) {
    return { kind: "float", value: Number.parseFloat(value) };
  }
  const lower = value.toLowerCase();
  if (lower === "true" || lower === "false") {
    return { kind: "bool", value: lower === "true" };
  }
  return { kind: "string", value };
}

/**
 * Parse a comma-separated `key=value` list. Pairs without `=` are skipped.
 */
export function parseToolArguments(raw: string): ToolArguments {
  const args: ToolArguments = {};
  if (raw.trim() === "") {
    return args;
  }

  for (const pair of raw.split(",")) {
    const eq = pair.indexOf("=");
    if (eq === -1) {
      continue;
    }
    const key = pair.slice(0, eq).trim();
    if (key === "") {
      continue;
    }
    args[key] = coerceToolValue(pair.slice(eq + 1));
  }
  return args;
}

/**
 * Extract every tool call from model output, in order of appearance.
 */
export function parseToolCalls(text: string): ToolInvocation[] {
  const invocations: ToolInvocation[] = [];
  for (const match of text.matchAll(TOOL_CALL_PATTERN)) {
    invocations.push({
      name: match[1],
      arguments: parseToolArguments(match[2]),
    });
  }
  return invocations;
}
