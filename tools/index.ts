/**
 * Built-in capabilities and their registration.
 */

import type { MemoryEngine } from "../core/memory.js";
import type { CapabilityRegistry } from "../core/registry.js";
import { createFileCapabilities } from "./files.js";
import { createJournalCapabilities } from "./journal.js";
import { createMemoryCapabilities } from "./memory.js";
import { createTimeCapability } from "./time.js";
import { createFetchUrlCapability } from "./web.js";

export { createFileCapabilities, resolveInWorkspace, globToRegExp } from "./files.js";
export { createJournalCapabilities, formatJournalEntry } from "./journal.js";
export { createMemoryCapabilities } from "./memory.js";
export { createTimeCapability, describeTime, localDate, localTime } from "./time.js";
export { createFetchUrlCapability } from "./web.js";

export interface DefaultCapabilityDeps {
  memory: MemoryEngine;
  journalDir: string;
  workspaceDir: string;
  fetchMaxLength: number;
  now?: () => Date;
}

/**
 * Register every built-in capability, grouped as system, journal, files,
 * web and memory.
 */
export function registerDefaultCapabilities(registry: CapabilityRegistry, deps: DefaultCapabilityDeps): void {
  registry.register(createTimeCapability(deps.now));

  const journal = createJournalCapabilities({ journalDir: deps.journalDir, now: deps.now });
  registry.register(journal.write);
  registry.register(journal.read);

  const files = createFileCapabilities({ workspaceDir: deps.workspaceDir, maxLength: deps.fetchMaxLength });
  registry.register(files.readFile);
  registry.register(files.writeFile);
  registry.register(files.listFiles);

  registry.register(createFetchUrlCapability({ maxLength: deps.fetchMaxLength }));

  const memory = createMemoryCapabilities(deps.memory);
  registry.register(memory.recall);
  registry.register(memory.stats);
}
