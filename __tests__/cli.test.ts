/**
 * Tests for the CLI command classes and the commander program
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { join } from "node:path";
import { ChatCommand } from "../cli/chat.js";
import { ReflectCommand } from "../cli/reflect.js";
import { MemorySearchCommand } from "../cli/search.js";
import { MemoryStatsCommand } from "../cli/stats.js";
import { MemoryListCommand } from "../cli/list.js";
import { MemoryForgetCommand } from "../cli/forget.js";
import { SessionsCommand } from "../cli/sessions.js";
import { truncateText } from "../cli/format.js";
import { createProgram } from "../cli/program.js";
import { TurnState, type ConversationOrchestrator, type TurnResult } from "../core/orchestrator.js";
import { InvalidInputError } from "../core/errors.js";
import { SqliteStateStore } from "../db/state.js";
import type { ConversationLog } from "../db/conversation.js";
import { LAST_BEAT_KEY } from "../services/heartbeat.js";
import { parseConfig, resolveConfig } from "../config.js";
import { createEngine } from "../index.js";
import { silentLogger } from "../utils/logger.js";
import {
  FakeEmbeddingProvider,
  ScriptedLanguageModel,
  cleanupDb,
  createMemoryFixture,
  createTempDbPath,
  createTempDir,
  type MemoryFixture,
} from "./helpers.js";

function turnResult(overrides: Partial<TurnResult> = {}): TurnResult {
  return {
    response: "Hello!",
    toolCalls: [],
    toolResults: [],
    memorySaved: false,
    memoriesRecalled: 0,
    processingTimeSeconds: 0.5,
    trace: [TurnState.Done],
    ...overrides,
  };
}

describe("truncateText", () => {
  it("should collapse newlines and add an ellipsis past the limit", () => {
    expect(truncateText("a\nb")).toBe("a b");
    expect(truncateText("abcdefghij", 8)).toBe("abcde...");
    expect(truncateText("abcdefgh", 8)).toBe("abcdefgh");
  });
});

describe("ChatCommand", () => {
  it("should run a turn with CLI defaults and format the reply", async () => {
    const processMessage = vi.fn<ConversationOrchestrator["processMessage"]>().mockResolvedValue(
      turnResult({
        toolCalls: [{ name: "get_time", arguments: {} }],
        toolResults: [{ status: "success", result: {} }],
        memorySaved: true,
        memoriesRecalled: 2,
        processingTimeSeconds: 1.234,
      })
    );

    const output = await new ChatCommand({ processMessage }).execute("hi");

    expect(processMessage).toHaveBeenCalledWith({
      message: "hi",
      sessionId: "cli",
      userName: undefined,
      enableTools: true,
      enableMemorySave: true,
    });
    expect(output).toBe("Hello!\n\nTools: get_time (success)\nMemories recalled: 2 | Memory saved: yes | 1.23s");
  });

  it("should output plain tool arguments as JSON", async () => {
    const processMessage = vi.fn<ConversationOrchestrator["processMessage"]>().mockResolvedValue(
      turnResult({ toolCalls: [{ name: "read_journal", arguments: { days_back: { kind: "int", value: 3 } } }] })
    );

    const output = await new ChatCommand({ processMessage }).execute("hi", {
      session: "ana",
      tools: false,
      memory: false,
      json: true,
    });

    expect(processMessage).toHaveBeenCalledWith(
      expect.objectContaining({ sessionId: "ana", enableTools: false, enableMemorySave: false })
    );
    expect(JSON.parse(output)).toMatchObject({
      response: "Hello!",
      toolCalls: [{ name: "read_journal", arguments: { days_back: 3 } }],
    });
  });
});

describe("ReflectCommand", () => {
  it("should report an unavailable model", async () => {
    const autonomousReflection = vi
      .fn<ConversationOrchestrator["autonomousReflection"]>()
      .mockResolvedValue({ thought: "", toolCalls: [], toolResults: [], message: null });

    expect(await new ReflectCommand({ autonomousReflection }, "heartbeat").execute()).toBe(
      "No reflection (language model unavailable)."
    );
    expect(autonomousReflection).toHaveBeenCalledWith("heartbeat");
  });

  it("should show the thought and the outgoing message", async () => {
    const autonomousReflection = vi.fn<ConversationOrchestrator["autonomousReflection"]>().mockResolvedValue({
      thought: "All quiet. [SEND MESSAGE] Good night",
      toolCalls: [{ name: "get_time", arguments: {} }],
      toolResults: [{ status: "success", result: {} }],
      message: "Good night",
    });

    const output = await new ReflectCommand({ autonomousReflection }, "heartbeat").execute({ session: "ana" });

    expect(autonomousReflection).toHaveBeenCalledWith("ana");
    expect(output).toBe(
      [
        "Reflection",
        "==========",
        "",
        "All quiet. [SEND MESSAGE] Good night",
        "",
        "Tools:",
        "  get_time: success",
        "",
        "Outgoing message: Good night",
      ].join("\n")
    );
  });
});

describe("SessionsCommand", () => {
  it("should say when there are no sessions", async () => {
    const listSessions = vi.fn<ConversationLog["listSessions"]>().mockResolvedValue([]);
    expect(await new SessionsCommand({ listSessions }).execute()).toBe("No conversation sessions.");
  });

  it("should list sessions", async () => {
    const listSessions = vi.fn<ConversationLog["listSessions"]>().mockResolvedValue([
      { sessionId: "ana", messageCount: 4, startedAt: "2026-06-01T10:00:00.000Z", lastActivity: "2026-06-01T11:00:00.000Z" },
    ]);
    expect(await new SessionsCommand({ listSessions }).execute()).toBe(
      "Sessions: 1\n\nana  4 message(s)  last activity 2026-06-01T11:00:00.000Z"
    );
  });
});

describe("memory commands", () => {
  let fx: MemoryFixture;

  beforeEach(() => {
    fx = createMemoryFixture();
    fx.embeddings.set("Ana loves roses", [1, 0, 0]).set("flowers", [1, 0, 0]);
  });

  afterEach(() => {
    cleanupDb(fx.db, fx.dbPath);
  });

  describe("MemorySearchCommand", () => {
    it("should format scored results", async () => {
      const id = await fx.memory.save({ content: "Ana loves roses", category: "preference", importance: 8 });
      const date = fx.memory.get(id)?.createdAt.slice(0, 10);

      const output = await new MemorySearchCommand(fx.memory).execute("  flowers ");

      expect(output).toBe(
        [
          'Search results for: "flowers"',
          "Found: 1 result(s)",
          "",
          id,
          `  [preference] importance 8 | score 8.000 | ${date}`,
          "  Text: Ana loves roses",
        ].join("\n")
      );
    });

    it("should say when nothing matches", async () => {
      const output = await new MemorySearchCommand(fx.memory).execute("flowers", { category: "plan" });
      expect(output).toBe(
        'Search results for: "flowers"\nCategory filter: plan\nFound: 0 result(s)\n\nNo memories found matching the query.'
      );
    });

    it("should reject an empty query and an unknown category", async () => {
      const command = new MemorySearchCommand(fx.memory);
      await expect(command.execute("   ")).rejects.toBeInstanceOf(InvalidInputError);
      await expect(command.execute("x", { category: "gossip" })).rejects.toThrow("Invalid category");
    });
  });

  describe("MemoryListCommand", () => {
    it("should list by tag with degraded markers", async () => {
      fx.embeddings.failing = true;
      const id = await fx.memory.save({ content: "Dentist on Friday", category: "plan", importance: 6, tags: ["health"] });
      const date = fx.memory.get(id)?.createdAt.slice(0, 10);

      const output = await new MemoryListCommand(fx.memory).execute({ tag: "health" });

      expect(output).toBe(
        [
          "Memories: 1",
          "Filter: tag=health",
          "",
          `${id} [DEGRADED]`,
          `  [plan] importance 6 | ${date} | tags: health`,
          "  Text: Dentist on Friday",
        ].join("\n")
      );
    });

    it("should say when the store is empty", async () => {
      expect(await new MemoryListCommand(fx.memory).execute()).toBe("Memories: 0\n\nNo memories found.");
    });

    it("should reject two filters at once", async () => {
      await expect(new MemoryListCommand(fx.memory).execute({ tag: "a", category: "fact" })).rejects.toThrow(
        "Invalid filter"
      );
    });
  });

  describe("MemoryForgetCommand", () => {
    it("should delete an existing memory", async () => {
      const id = await fx.memory.save({ content: "Old phone number", category: "fact", importance: 2 });

      const output = await new MemoryForgetCommand(fx.memory).execute(id);

      expect(output).toBe(`Deleted memory ${id}\n  Text: Old phone number`);
      expect(fx.memory.get(id)).toBeNull();
    });

    it("should report a missing memory", async () => {
      expect(await new MemoryForgetCommand(fx.memory).execute("mem_1")).toBe("Memory not found: mem_1");
    });
  });

  describe("MemoryStatsCommand", () => {
    it("should summarise counts, embedding and last heartbeat", async () => {
      await fx.memory.save({ content: "Ana loves roses", category: "fact", importance: 3 });
      const state = new SqliteStateStore(fx.db);
      await state.set(LAST_BEAT_KEY, "2026-06-01T12:00:00.000Z");

      const command = new MemoryStatsCommand(fx.memory, state, ":memory:", {
        provider: "fake",
        model: "fake-embedding",
        dimensions: 3,
      });
      const lines = (await command.execute()).split("\n");

      expect(lines.slice(0, 9)).toEqual([
        "Memory Statistics",
        "=================",
        "",
        "Total memories: 1",
        "Degraded embeddings: 0",
        "",
        "By category:",
        "  fact         1",
        "",
      ]);
      expect(lines).toContain("  10    0");
      expect(lines).toContain("   3    1 █");
      expect(lines.slice(-3)).toEqual([
        "Embedding: fake/fake-embedding (3 dimensions)",
        "Database: :memory: (0 B)",
        "Last heartbeat: 2026-06-01T12:00:00.000Z",
      ]);
    });

    it("should report a missing heartbeat as null in JSON", async () => {
      const command = new MemoryStatsCommand(fx.memory, new SqliteStateStore(fx.db), ":memory:", {
        provider: "fake",
        model: "fake-embedding",
        dimensions: 3,
      });
      expect(JSON.parse(await command.execute({ json: true }))).toMatchObject({
        dbFileSize: 0,
        dbFileSizeFormatted: "0 B",
        lastHeartbeat: null,
        stats: { total: 0 },
      });
    });
  });
});

describe("createProgram", () => {
  let dbPath: string;
  let temp: { dir: string; cleanup: () => void };
  let llm: ScriptedLanguageModel;
  let output: string[];

  const program = () =>
    createProgram({
      openEngine: () =>
        createEngine(
          resolveConfig(
            parseConfig({
              dbPath,
              tools: { journalDir: join(temp.dir, "journal"), workspaceDir: temp.dir },
            })
          ),
          { llm, embeddings: new FakeEmbeddingProvider(), logger: silentLogger }
        ),
      write: (text) => output.push(text),
    });

  beforeEach(() => {
    dbPath = createTempDbPath();
    temp = createTempDir();
    llm = new ScriptedLanguageModel();
    output = [];
  });

  afterEach(() => {
    cleanupDb(undefined, dbPath);
    temp.cleanup();
  });

  it("should chat and then list the session", async () => {
    llm.push("Hi! How was your day?");

    await program().parseAsync(["chat", "Hello there", "--no-memory"], { from: "user" });
    await program().parseAsync(["sessions"], { from: "user" });

    expect(output).toHaveLength(2);
    expect(output[0]).toMatch(/^Hi! How was your day\?\n\nMemories recalled: 0 \| Memory saved: no \| \d+\.\d{2}s$/);
    expect(output[1]).toMatch(/^Sessions: 1\n\ncli {2}2 message\(s\) {2}last activity /);
    expect(llm.prompts).toHaveLength(1);
  });

  it("should beat once and deliver the outgoing message", async () => {
    llm.push("Quiet evening. [SEND MESSAGE] Thinking of you");

    await program().parseAsync(["heartbeat", "--once"], { from: "user" });

    expect(output).toEqual([
      "[heartbeat] Thinking of you",
      "Heartbeat (manual)\nTool calls: 0\nDelivered: Thinking of you",
    ]);
  });

  it("should report unknown memory ids", async () => {
    await program().parseAsync(["memory-forget", "mem_42"], { from: "user" });
    expect(output).toEqual(["Memory not found: mem_42"]);
  });

  it("should reject an invalid log level before opening the engine", async () => {
    const openEngine = vi.fn();
    const cli = createProgram({ openEngine, write: (text) => output.push(text) })
      .exitOverride()
      .configureOutput({ writeErr: () => undefined });

    await expect(cli.parseAsync(["--log-level", "loud", "sessions"], { from: "user" })).rejects.toThrow(
      "Allowed choices are debug, info, warn, error, silent"
    );
    expect(openEngine).not.toHaveBeenCalled();
  });
});
