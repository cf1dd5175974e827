/**
 * Tests for MemoryEngine: save, recall, listing, update, delete and stats
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { InvalidInputError } from "../core/errors.js";
import { clampImportance, formatMemoriesForPrompt } from "../core/memory.js";
import { MemoryCategory, type MemoryRecord } from "../core/types.js";
import { cleanupDb, createMemoryFixture, type MemoryFixture } from "./helpers.js";

describe("MemoryEngine", () => {
  let fx: MemoryFixture;

  beforeEach(() => {
    fx = createMemoryFixture();
    fx.embeddings
      .set("Ana loves roses", [1, 0, 0])
      .set("Ana's dog is called Biscuit", [0, 1, 0])
      .set("flowers", [1, 0, 0]);
  });

  afterEach(() => {
    cleanupDb(fx.db, fx.dbPath);
  });

  describe("save", () => {
    it("should store the record with its embedding", async () => {
      const id = await fx.memory.save({
        content: "  Ana loves roses  ",
        category: "preference",
        importance: 8,
        tags: ["ana", "garden"],
        metadata: { session_id: "s1" },
      });

      expect(id).toMatch(/^mem_\d+$/);
      const record = fx.memory.get(id);
      expect(record).toMatchObject({
        id,
        content: "Ana loves roses",
        category: MemoryCategory.preference,
        importance: 8,
        tags: ["ana", "garden"],
        metadata: { session_id: "s1" },
        embeddingStatus: "ok",
        updatedAt: null,
      });
      expect(fx.vectors.getEmbedding(id)).toEqual([1, 0, 0]);
    });

    it("should assign distinct increasing ids within one millisecond", async () => {
      const first = await fx.memory.save({ content: "one", category: "fact", importance: 5 });
      const second = await fx.memory.save({ content: "two", category: "fact", importance: 5 });
      const third = await fx.memory.save({ content: "three", category: "fact", importance: 5 });

      const ms = [first, second, third].map((id) => Number(id.slice("mem_".length)));
      expect(ms[1]).toBeGreaterThan(ms[0]);
      expect(ms[2]).toBeGreaterThan(ms[1]);
    });

    it("should clamp importance to 1..10", async () => {
      const high = await fx.memory.save({ content: "high", category: "fact", importance: 15 });
      const low = await fx.memory.save({ content: "low", category: "fact", importance: 0 });
      expect(fx.memory.get(high)?.importance).toBe(10);
      expect(fx.memory.get(low)?.importance).toBe(1);
    });

    it("should reject empty content", async () => {
      await expect(fx.memory.save({ content: "   ", category: "fact", importance: 5 })).rejects.toBeInstanceOf(
        InvalidInputError
      );
    });

    it("should reject unknown categories", async () => {
      await expect(fx.memory.save({ content: "x", category: "gossip", importance: 5 })).rejects.toThrow(
        "Invalid category: unknown category 'gossip'"
      );
    });

    it("should store a zero vector when embedding fails", async () => {
      fx.embeddings.failing = true;
      const id = await fx.memory.save({ content: "offline note", category: "fact", importance: 6 });

      expect(fx.memory.get(id)?.embeddingStatus).toBe("degraded");
      expect(fx.vectors.getEmbedding(id)).toEqual([0, 0, 0]);
    });
  });

  describe("recall", () => {
    it("should return close, important memories", async () => {
      const roses = await fx.memory.save({ content: "Ana loves roses", category: "preference", importance: 8 });
      await fx.memory.save({ content: "Ana's dog is called Biscuit", category: "fact", importance: 7 });

      const results = await fx.memory.recall("flowers", { nResults: 5, minImportance: 5, maxDistance: 0.7 });

      expect(results.map((m) => m.id)).toEqual([roses]);
      expect(results[0].distance).toBe(0);
      expect(results[0].score).toBe(8);
    });

    it("should surface distant memories at importance 9 or more", async () => {
      const roses = await fx.memory.save({ content: "Ana loves roses", category: "preference", importance: 8 });
      const dog = await fx.memory.save({ content: "Ana's dog is called Biscuit", category: "fact", importance: 9 });

      const results = await fx.memory.recall("flowers", { nResults: 5, minImportance: 5, maxDistance: 0.7 });

      expect(results.map((m) => m.id)).toEqual([roses, dog]);
      expect(results[1].distance).toBe(1);
      expect(results[1].score).toBe(0);
    });

    it("should drop memories below the minimum importance", async () => {
      await fx.memory.save({ content: "Ana loves roses", category: "preference", importance: 4 });
      expect(await fx.memory.recall("flowers", { minImportance: 5 })).toEqual([]);
    });

    it("should restrict candidates to a category", async () => {
      await fx.memory.save({ content: "Ana loves roses", category: "preference", importance: 8 });
      fx.embeddings.set("Plant roses on Saturday", [1, 0, 0]);
      const plan = await fx.memory.save({ content: "Plant roses on Saturday", category: "plan", importance: 6 });

      const results = await fx.memory.recall("flowers", { category: "plan" });
      expect(results.map((m) => m.id)).toEqual([plan]);
    });

    it("should return nothing when the query cannot be embedded", async () => {
      await fx.memory.save({ content: "Ana loves roses", category: "preference", importance: 8 });
      fx.embeddings.failing = true;
      expect(await fx.memory.recall("flowers")).toEqual([]);
    });

    it("should keep degraded memories out unless they bypass the cutoff", async () => {
      fx.embeddings.failing = true;
      await fx.memory.save({ content: "ordinary", category: "fact", importance: 8 });
      const critical = await fx.memory.save({ content: "critical", category: "fact", importance: 9 });
      fx.embeddings.failing = false;

      const results = await fx.memory.recall("flowers");
      expect(results.map((m) => m.id)).toEqual([critical]);
    });

    it("should rank identical content by importance", async () => {
      const high = await fx.memory.save({ content: "Ana loves roses", category: "preference", importance: 9 });
      const low = await fx.memory.save({ content: "Ana loves roses", category: "preference", importance: 3 });

      const results = await fx.memory.recall("flowers", { nResults: 5, minImportance: 1, maxDistance: 0.7 });

      expect(results.map((m) => m.id)).toEqual([high, low]);
      expect(results[0].score).toBe(9);
      expect(results[1].score).toBe(3);
      expect(results[0].score).toBeGreaterThan(results[1].score);
    });

    it("should return nothing from an empty store", async () => {
      expect(await fx.memory.recall("flowers")).toEqual([]);
    });
  });

  describe("listing", () => {
    it("should list by tag, category and recency, newest first", async () => {
      const a = await fx.memory.save({ content: "a", category: "fact", importance: 3, tags: ["ana"] });
      const b = await fx.memory.save({ content: "b", category: "plan", importance: 7, tags: ["ana", "trip"] });
      const c = await fx.memory.save({ content: "c", category: "fact", importance: 8 });

      expect(fx.memory.getByTag("ana").map((m) => m.id)).toEqual([b, a]);
      expect(fx.memory.getByTag("trip").map((m) => m.id)).toEqual([b]);
      expect(fx.memory.getByCategory("fact").map((m) => m.id)).toEqual([c, a]);
      expect(fx.memory.getByCategory("fact", 20, 5).map((m) => m.id)).toEqual([c]);
      expect(fx.memory.getRecent(2).map((m) => m.id)).toEqual([c, b]);
    });

    it("should return null for a missing id", () => {
      expect(fx.memory.get("mem_0")).toBeNull();
    });
  });

  describe("update", () => {
    it("should re-embed when the content changes", async () => {
      const id = await fx.memory.save({ content: "Ana loves roses", category: "preference", importance: 8 });
      fx.embeddings.set("Ana loves tulips", [0, 1, 0]);

      expect(await fx.memory.update(id, { content: "Ana loves tulips", importance: 12, tags: ["ana"] })).toBe(true);

      const record = fx.memory.get(id);
      expect(record?.content).toBe("Ana loves tulips");
      expect(record?.importance).toBe(10);
      expect(record?.tags).toEqual(["ana"]);
      expect(record?.updatedAt).not.toBeNull();
      expect(fx.vectors.getEmbedding(id)).toEqual([0, 1, 0]);
    });

    it("should not re-embed when only metadata fields change", async () => {
      const id = await fx.memory.save({ content: "Ana loves roses", category: "preference", importance: 8 });
      const callsBefore = fx.embeddings.calls.length;

      await fx.memory.update(id, { importance: 3 });

      expect(fx.embeddings.calls.length).toBe(callsBefore);
      expect(fx.memory.get(id)?.importance).toBe(3);
    });

    it("should move a memory in and out of recall as its importance changes", async () => {
      const id = await fx.memory.save({ content: "Ana loves roses", category: "preference", importance: 8 });
      const filter = { nResults: 5, minImportance: 5, maxDistance: 0.7 };

      expect((await fx.memory.recall("flowers", filter)).map((m) => m.id)).toEqual([id]);

      await fx.memory.update(id, { importance: 2 });
      expect(await fx.memory.recall("flowers", filter)).toEqual([]);

      await fx.memory.update(id, { importance: 8 });
      expect((await fx.memory.recall("flowers", filter)).map((m) => m.id)).toEqual([id]);
    });

    it("should report missing memories", async () => {
      expect(await fx.memory.update("mem_1", { importance: 3 })).toBe(false);
    });

    it("should reject empty content", async () => {
      const id = await fx.memory.save({ content: "x", category: "fact", importance: 5 });
      await expect(fx.memory.update(id, { content: " " })).rejects.toBeInstanceOf(InvalidInputError);
    });
  });

  describe("delete", () => {
    it("should remove the record and its vector", async () => {
      const id = await fx.memory.save({ content: "Ana loves roses", category: "preference", importance: 8 });

      expect(fx.memory.delete(id)).toBe(true);
      expect(fx.memory.get(id)).toBeNull();
      expect(fx.vectors.getEmbedding(id)).toBeNull();
      expect(fx.memory.delete(id)).toBe(false);
    });
  });

  describe("stats", () => {
    it("should count by category, importance and embedding status", async () => {
      await fx.memory.save({ content: "a", category: "fact", importance: 3 });
      await fx.memory.save({ content: "b", category: "fact", importance: 8 });
      fx.embeddings.failing = true;
      await fx.memory.save({ content: "c", category: "plan", importance: 8 });

      const stats = fx.memory.stats();
      expect(stats.total).toBe(3);
      expect(stats.byCategory).toEqual({ fact: 2, plan: 1 });
      expect(stats.byImportance).toEqual({ 1: 0, 2: 0, 3: 1, 4: 0, 5: 0, 6: 0, 7: 0, 8: 2, 9: 0, 10: 0 });
      expect(stats.degradedEmbeddings).toBe(1);
    });
  });
});

describe("clampImportance", () => {
  it("should round and clamp", () => {
    expect(clampImportance(7.6)).toBe(8);
    expect(clampImportance(-2)).toBe(1);
    expect(clampImportance(99)).toBe(10);
    expect(clampImportance(Number.NaN)).toBe(5);
  });
});

describe("formatMemoriesForPrompt", () => {
  function record(content: string, category: MemoryCategory, importance: number): MemoryRecord {
    return {
      id: `mem_${content}`,
      content,
      category,
      importance,
      tags: [],
      metadata: {},
      embeddingStatus: "ok",
      createdAt: "2026-05-04T08:30:00.000Z",
      updatedAt: null,
    };
  }

  it("should render nothing for no memories", () => {
    expect(formatMemoriesForPrompt([])).toBe("");
  });

  it("should group by category in first-seen order with importance stars", () => {
    const text = formatMemoriesForPrompt([
      record("Likes tea", MemoryCategory.preference, 4),
      record("Lives in Porto", MemoryCategory.fact, 10),
      record("Prefers mornings", MemoryCategory.preference, 1),
    ]);

    expect(text).toBe(
      [
        "[RELEVANT MEMORIES]",
        "",
        "## PREFERENCE",
        "★★ [2026-05-04] Likes tea",
        "★ [2026-05-04] Prefers mornings",
        "",
        "## FACT",
        "★★★ [2026-05-04] Lives in Porto",
        "",
        "[END MEMORIES]",
      ].join("\n")
    );
  });
});
