import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { clampImportance, MemoryStore } from "../../src/memory/store.js";
import { makeTempDb, type TempDb } from "../helpers/fixtures.js";

describe("clampImportance", () => {
  it("clamps to the 1..10 range", () => {
    expect(clampImportance(0)).toBe(1);
    expect(clampImportance(11)).toBe(10);
    expect(clampImportance(7.5)).toBe(7.5);
  });

  it("maps non-finite values to the default", () => {
    expect(clampImportance(Number.NaN)).toBe(5);
  });
});

describe("MemoryStore", () => {
  let tmp: TempDb;
  let store: MemoryStore;

  beforeEach(() => {
    tmp = makeTempDb();
    store = new MemoryStore(tmp.db);
  });

  afterEach(() => {
    vi.useRealTimers();
    tmp.cleanup();
  });

  describe("episodes", () => {
    it("stores clamped importance and metadata", () => {
      const id = store.addEpisode({ type: "post", content: "hello", importance: 42, metadata: { a: 1 } });
      const episode = store.getEpisode(id);
      expect(episode?.importance).toBe(10);
      expect(episode?.metadata).toEqual({ a: 1 });
      expect(episode?.type).toBe("post");
    });

    it("refuses to update a stored episode", () => {
      const id = store.addEpisode({ type: "post", content: "hello", importance: 5 });
      expect(() =>
        tmp.db.raw().prepare("UPDATE episodes SET content = 'changed' WHERE id = ?").run(id),
      ).toThrow(/immutable/);
      expect(store.getEpisode(id)?.content).toBe("hello");
    });

    it("lists recent episodes newest first, optionally by type", () => {
      store.addEpisode({ type: "post", content: "one", importance: 5 });
      store.addEpisode({ type: "skip", content: "two", importance: 5 });
      store.addEpisode({ type: "post", content: "three", importance: 5 });
      expect(store.recentEpisodes(10).map((e) => e.content)).toEqual(["three", "two", "one"]);
      expect(store.recentEpisodes(10, "post").map((e) => e.content)).toEqual(["three", "one"]);
    });

    it("searches by keyword substring and escapes LIKE wildcards", () => {
      store.addEpisode({ type: "post", content: "memory systems", importance: 5 });
      store.addEpisode({ type: "post", content: "cooking pasta", importance: 5 });
      store.addEpisode({ type: "post", content: "100% sure", importance: 5 });
      expect(store.searchEpisodes(["memory"]).map((e) => e.content)).toEqual(["memory systems"]);
      expect(store.searchEpisodes(["0%"]).map((e) => e.content)).toEqual(["100% sure"]);
      expect(store.searchEpisodes([])).toHaveLength(3);
    });

    it("selects old low-importance episodes for compression, never summaries", () => {
      vi.useFakeTimers();
      vi.setSystemTime(1_000_000);
      const low = store.addEpisode({ type: "comment", content: "low", importance: 2 });
      store.addEpisode({ type: "comment", content: "high", importance: 8 });
      store.addEpisode({ type: "compressed_summary", content: "summary", importance: 2 });
      vi.setSystemTime(2_000_000);
      store.addEpisode({ type: "comment", content: "fresh", importance: 2 });

      const candidates = store.compressionCandidates(1_500_000, 5);
      expect(candidates.map((e) => e.id)).toEqual([low]);
    });

    it("replaces compressed episodes with their summary atomically", () => {
      const a = store.addEpisode({ type: "comment", content: "a", importance: 2 });
      const b = store.addEpisode({ type: "comment", content: "b", importance: 2 });
      const summaryId = store.replaceWithSummary([a, b], {
        type: "compressed_summary",
        content: "a and b",
        importance: 6,
      });
      expect(store.getEpisode(a)).toBeNull();
      expect(store.getEpisode(b)).toBeNull();
      expect(store.getEpisode(summaryId)?.content).toBe("a and b");
      expect(store.countEpisodes()).toBe(1);
    });
  });

  describe("insights", () => {
    it("reinforces up to a confidence of 1", () => {
      const id = store.addInsight({ text: "Questions get replies", category: "engagement", confidence: 0.95, sourceEpisodeIds: [1] });
      store.reinforceInsight(id);
      const insight = store.getInsight(id);
      expect(insight?.confidence).toBe(1);
      expect(insight?.evidenceCount).toBe(2);
      expect(insight?.sourceEpisodeIds).toEqual([1]);
    });

    it("finds insights by case-insensitive text", () => {
      const id = store.addInsight({ text: "Short posts do well", category: "content", sourceEpisodeIds: [] });
      expect(store.findInsightByText("  short POSTS do well ")?.id).toBe(id);
    });

    it("orders by confidence and filters by minimum", () => {
      store.addInsight({ text: "weak", category: "social", confidence: 0.2, sourceEpisodeIds: [] });
      store.addInsight({ text: "strong", category: "social", confidence: 0.9, sourceEpisodeIds: [] });
      expect(store.getInsights().map((i) => i.text)).toEqual(["strong", "weak"]);
      expect(store.getInsights(0.5).map((i) => i.text)).toEqual(["strong"]);
      expect(store.countInsights(0.5)).toBe(1);
    });

    it("decays stale insights and soft-deletes those below the floor", () => {
      vi.useFakeTimers();
      vi.setSystemTime(1_000_000);
      const stale = store.addInsight({ text: "stale", category: "strategy", confidence: 0.15, sourceEpisodeIds: [] });
      vi.setSystemTime(5_000_000);
      const fresh = store.addInsight({ text: "fresh", category: "strategy", confidence: 0.15, sourceEpisodeIds: [] });

      expect(store.decayStaleInsights(2_000_000, 0.1)).toBe(1);
      expect(store.softDeleteInsightsBelow(0.1)).toBe(1);
      expect(store.getInsight(stale)).toBeNull();
      expect(store.getInsight(fresh)?.confidence).toBe(0.15);
    });

    it("suppresses without going below zero", () => {
      const id = store.addInsight({ text: "x", category: "social", confidence: 0.1, sourceEpisodeIds: [] });
      store.suppressInsight(id);
      expect(store.getInsight(id)?.confidence).toBe(0);
    });
  });

  describe("core blocks", () => {
    it("initializes once and truncates to the limit", () => {
      expect(store.initCoreBlock("goals", "x".repeat(20), 10)).toBe(true);
      expect(store.initCoreBlock("goals", "other", 10)).toBe(false);
      expect(store.getCoreBlock("goals")?.content).toBe("x".repeat(10));
      expect(store.setCoreBlock("goals", "y".repeat(30))).toBe(true);
      expect(store.getCoreBlock("goals")?.content).toBe("y".repeat(10));
    });

    it("returns blocks in canonical order", () => {
      store.initCoreBlock("domain_knowledge", "d", 100);
      store.initCoreBlock("persona", "p", 100);
      expect(store.getCoreBlocks().map((b) => b.name)).toEqual(["persona", "domain_knowledge"]);
    });

    it("refuses to set a block that does not exist", () => {
      expect(store.setCoreBlock("social_graph", "x")).toBe(false);
    });
  });
});
