/**
 * The `kindred` commander program. Each action opens the engine, runs one
 * command class and closes the engine again.
 */

import { Command, InvalidArgumentError, Option } from "commander";
import { configFromEnv, type ResolvedConfig } from "../config.js";
import { createEngine, type Engine } from "../index.js";
import type { LogLevel } from "../utils/logger.js";
import { ChatCommand } from "./chat.js";
import { ReflectCommand } from "./reflect.js";
import { MemorySearchCommand } from "./search.js";
import { MemoryStatsCommand } from "./stats.js";
import { MemoryListCommand } from "./list.js";
import { MemoryForgetCommand } from "./forget.js";
import { SessionsCommand } from "./sessions.js";
import { HeartbeatCommand } from "./heartbeat.js";

export type GlobalOptions = {
  db?: string;
  logLevel?: LogLevel;
};

export interface ProgramDeps {
  /** Opens the engine for one command (default: config from the environment) */
  openEngine?: (options: GlobalOptions) => Engine;
  /** Receives command output (default: console.log) */
  write?: (text: string) => void;
  /** Signal that ends `heartbeat` (default: SIGINT or SIGTERM) */
  heartbeatSignal?: () => AbortSignal;
}

type ChatCliOptions = { session?: string; user?: string; tools: boolean; memory: boolean; json?: boolean };
type ReflectCliOptions = { session?: string; json?: boolean };
type SearchCliOptions = { limit: number; minImportance: number; category?: string; json?: boolean };
type ListCliOptions = { tag?: string; category?: string; limit: number; json?: boolean };
type JsonCliOptions = { json?: boolean };
type HeartbeatCliOptions = { once?: boolean; json?: boolean };

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

/**
 * Resolved configuration from the environment, with CLI overrides applied.
 */
export function loadCliConfig(options: GlobalOptions, env: NodeJS.ProcessEnv = process.env): ResolvedConfig {
  const config = configFromEnv(env);
  return {
    ...config,
    dbPath: options.db ?? config.dbPath,
    logLevel: options.logLevel ?? config.logLevel,
  };
}

function processSignal(): AbortSignal {
  const controller = new AbortController();
  const abort = (): void => controller.abort();
  process.once("SIGINT", abort);
  process.once("SIGTERM", abort);
  return controller.signal;
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const openEngine = deps.openEngine ?? ((options: GlobalOptions) => createEngine(loadCliConfig(options)));
  const write = deps.write ?? ((text: string) => console.log(text));
  const heartbeatSignal = deps.heartbeatSignal ?? processSignal;

  const program = new Command();
  program
    .name("kindred")
    .description("Companion engine with long-term memory, tools and scheduled reflection")
    .version("0.1.0")
    .option("--db <path>", "Database file (overrides KINDRED_DB_PATH)")
    .addOption(new Option("--log-level <level>", "Log level").choices(["debug", "info", "warn", "error", "silent"]));

  const run = async (command: (engine: Engine) => Promise<string>): Promise<void> => {
    const engine = openEngine(program.opts<GlobalOptions>());
    try {
      write(await command(engine));
    } finally {
      engine.close();
    }
  };

  program
    .command("chat <message>")
    .description("Send one message and print the reply")
    .option("--session <id>", "Conversation session id", "cli")
    .option("--user <name>", "Display name of the sender", "User")
    .option("--no-tools", "Do not run tool calls")
    .option("--no-memory", "Do not save the exchange to memory")
    .option("--json", "Output as JSON")
    .action(async (message: string, opts: ChatCliOptions) => {
      await run((engine) => new ChatCommand(engine.orchestrator).execute(message, opts));
    });

  program
    .command("reflect")
    .description("Run one autonomous reflection and print it")
    .option("--session <id>", "Session whose recent turns are shown")
    .option("--json", "Output as JSON")
    .action(async (opts: ReflectCliOptions) => {
      await run((engine) =>
        new ReflectCommand(engine.orchestrator, engine.config.heartbeat.sessionId).execute(opts)
      );
    });

  program
    .command("memory-search <query>")
    .description("Semantic search over stored memories")
    .option("--limit <n>", "Maximum number of results", parseInteger, 10)
    .option("--min-importance <n>", "Minimum importance (1-10)", parseInteger, 1)
    .option("--category <category>", "Only search this category")
    .option("--json", "Output as JSON")
    .action(async (query: string, opts: SearchCliOptions) => {
      await run((engine) => new MemorySearchCommand(engine.memory).execute(query, opts));
    });

  program
    .command("memory-stats")
    .description("Display memory statistics")
    .option("--json", "Output as JSON")
    .action(async (opts: JsonCliOptions) => {
      await run((engine) => {
        const { provider, model } = engine.config.embedding;
        const command = new MemoryStatsCommand(engine.memory, engine.state, engine.config.dbPath, {
          provider,
          model,
          dimensions: engine.embeddings.getDimensions(),
        });
        return command.execute(opts);
      });
    });

  program
    .command("memory-list")
    .description("List memories, newest first")
    .option("--tag <tag>", "Only memories carrying this tag")
    .option("--category <category>", "Only memories in this category")
    .option("--limit <n>", "Maximum number of results", parseInteger, 20)
    .option("--json", "Output as JSON")
    .action(async (opts: ListCliOptions) => {
      await run((engine) => new MemoryListCommand(engine.memory).execute(opts));
    });

  program
    .command("memory-forget <id>")
    .description("Permanently delete a memory")
    .option("--json", "Output as JSON")
    .action(async (id: string, opts: JsonCliOptions) => {
      await run((engine) => new MemoryForgetCommand(engine.memory).execute(id, opts));
    });

  program
    .command("sessions")
    .description("List conversation sessions, latest activity first")
    .option("--json", "Output as JSON")
    .action(async (opts: JsonCliOptions) => {
      await run((engine) => new SessionsCommand(engine.conversation).execute(opts));
    });

  program
    .command("heartbeat")
    .description("Run scheduled reflection until interrupted")
    .option("--once", "Beat once and exit")
    .option("--json", "Output as JSON (with --once)")
    .action(async (opts: HeartbeatCliOptions) => {
      await run((engine) => {
        const service = engine.createHeartbeat(async (sessionId, message) => {
          write(`[${sessionId}] ${message}`);
        });
        const signal = opts.once ? undefined : heartbeatSignal();
        return new HeartbeatCommand(service).execute({ ...opts, signal });
      });
    });

  return program;
}
