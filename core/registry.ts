/**
 * CapabilityRegistry - named, schema-typed callables the model may invoke.
 *
 * Parameters are TypeBox object schemas. Every dispatch resolves to a
 * ToolResult envelope; nothing thrown by a capability escapes execute().
 */

import type { Static, TObject } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ToolDispatchError, UnknownCapabilityError, errorMessage } from "./errors.js";
import { toolArgumentsToPlain, type ToolArguments, type ToolResult } from "./types.js";
import { silentLogger, type Logger } from "../utils/logger.js";

/**
 * A callable the model may request through the tool-call syntax
 */
export interface Capability<T extends TObject = TObject> {
  name: string;
  description: string;
  parameters: T;
  /** Description of the result shape, shown in the manifest */
  returns: string;
  /** Manifest grouping, e.g. "system", "journal" */
  category: string;
  execute(args: Static<T>): Promise<unknown> | unknown;
}

/**
 * Capability metadata without the callable
 */
export type CapabilityDescriptor = Omit<Capability, "execute">;

export interface CapabilityRegistryOptions {
  /** Per-dispatch timeout (default: 30000) */
  timeoutMs?: number;
  logger?: Logger;
}

const DEFAULT_TIMEOUT_MS = 30000;

interface RegisteredCapability {
  descriptor: CapabilityDescriptor;
  /** Validate plain arguments and run, or report why they were rejected */
  dispatch(args: Record<string, unknown>): { ok: true; run: () => Promise<unknown> } | { ok: false; reason: string };
}

export class CapabilityRegistry {
  private readonly capabilities = new Map<string, RegisteredCapability>();
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: CapabilityRegistryOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Register a capability. Names must be unique.
   */
  register<T extends TObject>(capability: Capability<T>): void {
    if (this.capabilities.has(capability.name)) {
      throw new Error(`Capability '${capability.name}' is already registered`);
    }
    const { name, description, parameters, returns, category } = capability;
    this.capabilities.set(name, {
      descriptor: { name, description, parameters, returns, category },
      dispatch: (args) => {
        // Defaults first, then scalar conversion (e.g. "5" for a number)
        const prepared = Value.Convert(parameters, Value.Default(parameters, args));
        if (!Value.Check(parameters, prepared)) {
          const first = Value.Errors(parameters, prepared).First();
          return {
            ok: false,
            reason: first ? `${first.path || "arguments"}: ${first.message}` : "invalid arguments",
          };
        }
        return { ok: true, run: async () => capability.execute(prepared) };
      },
    });
  }

  has(name: string): boolean {
    return this.capabilities.has(name);
  }

  /**
   * Registered capabilities in registration order.
   */
  list(category?: string): CapabilityDescriptor[] {
    const descriptors: CapabilityDescriptor[] = [];
    for (const { descriptor } of this.capabilities.values()) {
      if (category === undefined || category === descriptor.category) {
        descriptors.push(descriptor);
      }
    }
    return descriptors;
  }

  /**
   * Dispatch by name. Unknown names, invalid arguments, thrown errors and
   * timeouts all come back as error envelopes.
   */
  async execute(name: string, args: ToolArguments): Promise<ToolResult> {
    const capability = this.capabilities.get(name);
    if (!capability) {
      const error = new UnknownCapabilityError(name);
      this.logger.warn(error.message);
      return { status: "error", error: error.message };
    }

    const dispatch = capability.dispatch(toolArgumentsToPlain(args));
    if (!dispatch.ok) {
      const error = new ToolDispatchError(name, dispatch.reason);
      this.logger.warn(error.message);
      return { status: "error", error: error.message };
    }

    try {
      const result = await this.withTimeout(name, dispatch.run());
      return { status: "success", result };
    } catch (error) {
      const message =
        error instanceof ToolDispatchError
          ? error.message
          : new ToolDispatchError(name, errorMessage(error)).message;
      this.logger.warn(message);
      return { status: "error", error: message };
    }
  }

  /**
   * Render the capability manifest block for prompts. Empty registry renders "".
   */
  renderManifest(): string {
    if (this.capabilities.size === 0) {
      return "";
    }

    const byCategory = new Map<string, CapabilityDescriptor[]>();
    for (const { descriptor: capability } of this.capabilities.values()) {
      const group = byCategory.get(capability.category);
      if (group) {
        group.push(capability);
      } else {
        byCategory.set(capability.category, [capability]);
      }
    }

    const lines = [
      "[AVAILABLE TOOLS]",
      "",
      `You can use tools by outputting: [TOOL:tool_name(param1="value", param2=123)]`,
      "",
    ];
    for (const [category, group] of byCategory) {
      lines.push(`## ${category.toUpperCase()} TOOLS`, "");
      for (const capability of group) {
        lines.push(
          `### ${capability.name}`,
          capability.description,
          `Parameters: ${JSON.stringify(capability.parameters, null, 2)}`,
          `Returns: ${capability.returns}`,
          ""
        );
      }
    }
    lines.push("[END TOOLS]");
    return lines.join("\n");
  }

  private withTimeout<T>(name: string, promise: Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new ToolDispatchError(name, `timed out after ${this.timeoutMs}ms`)),
        this.timeoutMs
      );
    });
    return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
  }
}
