/**
 * CLI forget command - Permanently delete a memory and its vector.
 * Command: kindred memory-forget <id>
 */

import type { MemoryEngine } from "../core/memory.js";
import { InvalidInputError } from "../core/errors.js";
import { truncateText } from "./format.js";

export interface ForgetOptions {
  /** Output as JSON */
  json?: boolean;
}

export interface ForgetCommandResult {
  id: string;
  deleted: boolean;
  /** Content of the deleted memory (truncated) */
  content?: string;
  message: string;
}

/**
 * MemoryForgetCommand deletes one memory by id.
 */
export class MemoryForgetCommand {
  private memory: Pick<MemoryEngine, "get" | "delete">;

  constructor(memory: Pick<MemoryEngine, "get" | "delete">) {
    this.memory = memory;
  }

  async execute(id: string, options: ForgetOptions = {}): Promise<string> {
    const trimmedId = id.trim();
    if (trimmedId.length === 0) {
      throw new InvalidInputError("id", "memory id cannot be empty");
    }

    const existing = this.memory.get(trimmedId);
    const deleted = existing !== null && this.memory.delete(trimmedId);

    const result: ForgetCommandResult = {
      id: trimmedId,
      deleted,
      content: existing ? truncateText(existing.content) : undefined,
      message: deleted ? `Deleted memory ${trimmedId}` : `Memory not found: ${trimmedId}`,
    };

    if (options.json) {
      return JSON.stringify(result, null, 2);
    }
    return result.content ? `${result.message}\n  Text: ${result.content}` : result.message;
  }
}

export default MemoryForgetCommand;
