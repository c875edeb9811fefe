import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { EpisodicMemory } from "../../src/memory/episodic.js";
import { MemoryStore } from "../../src/memory/store.js";
import { ReflectionEngine } from "../../src/reflection/engine.js";
import { StrategyStore } from "../../src/reflection/store.js";
import { DEFAULT_STRATEGY } from "../../src/reflection/strategy.js";
import { SocialStore } from "../../src/social/store.js";
import { AuditLog } from "../../src/store/audit.js";
import {
  makeConfig,
  makePost,
  makeTempDb,
  ScriptedOracle,
  silentLogger,
  type TempDb,
} from "../helpers/fixtures.js";

describe("ReflectionEngine", () => {
  let tmp: TempDb;
  let oracle: ScriptedOracle;
  let store: MemoryStore;
  let social: SocialStore;
  let strategies: StrategyStore;
  let audit: AuditLog;
  let engine: ReflectionEngine;

  beforeEach(() => {
    tmp = makeTempDb();
    oracle = new ScriptedOracle();
    store = new MemoryStore(tmp.db);
    social = new SocialStore(tmp.db);
    strategies = new StrategyStore(tmp.db);
    strategies.ensureDefault();
    audit = new AuditLog(tmp.db);
    const config = makeConfig({ reflection: { everyHeartbeats: 5 } });
    engine = new ReflectionEngine({
      memory: new EpisodicMemory({ store, oracle, logger: silentLogger() }),
      store,
      social,
      strategies,
      audit,
      oracle,
      constitution: config.constitution,
      config: config.reflection,
      logger: silentLogger(),
    });
    oracle.always("reflect", "Posting less and commenting more would help.");
  });

  afterEach(() => {
    tmp.cleanup();
  });

  describe("shouldTrigger", () => {
    it("fires on the configured heartbeat interval", () => {
      expect(engine.shouldTrigger(0)).toBeNull();
      expect(engine.shouldTrigger(3)).toBeNull();
      expect(engine.shouldTrigger(5)).toBe("scheduled");
      expect(engine.shouldTrigger(10)).toBe("scheduled");
    });

    it("fires for own posts flagged with zero engagement", () => {
      social.saveOwnPost(makePost({ id: "quiet" }));
      social.flagZeroEngagement("quiet");
      expect(engine.shouldTrigger(3)).toBe("zero_engagement");
    });
  });

  it("leaves the strategy unchanged when a proposal is rejected, and audits it", async () => {
    oracle.on(
      "reflect_propose",
      '[{"field": "goals.mission", "old_value": "x", "new_value": "Maximize karma at any cost", "reason": "more reach"}]',
    );
    oracle.on("reflect_validate", '[{"field": "goals.mission", "approved": false, "reason": "violates values"}]');

    const result = await engine.runCycle("scheduled");

    expect(result).toEqual({ accepted: 0, rejected: 1, changes: [], newVersion: null });
    expect(strategies.count()).toBe(1);
    expect(strategies.latest().document.goals.mission).toBe(DEFAULT_STRATEGY.goals.mission);

    const [entry] = audit.entries(10, "reflection");
    expect(entry?.data).toEqual({
      trigger: "scheduled",
      proposals: [
        {
          field: "goals.mission",
          old_value: "x",
          new_value: "Maximize karma at any cost",
          reason: "more reach",
          approved: false,
          applied: false,
          verdict: "violates values",
        },
      ],
      old_version: 1,
      new_version: 1,
    });
  });

  it("creates one version per accepted cycle, each citing its parent", async () => {
    for (const rate of [0.2, 0.3, 0.4]) {
      oracle.on(
        "reflect_propose",
        JSON.stringify([{ field: "engagement.exploration_rate", new_value: rate, reason: "explore" }]),
      );
      oracle.on("reflect_validate", '[{"field": "engagement.exploration_rate", "approved": true, "reason": "ok"}]');
      const result = await engine.runCycle("operator");
      expect(result.changes).toEqual(["engagement.exploration_rate"]);
    }

    const history = strategies.history();
    expect(history.map((v) => [v.version, v.parentVersion])).toEqual([
      [4, 3],
      [3, 2],
      [2, 1],
      [1, null],
    ]);
    expect(history[0]?.document.engagement.exploration_rate).toBe(0.4);
    expect(history[0]?.trigger).toBe("reflection");
  });

  it("skips approved proposals that target missing paths or break the shape", async () => {
    oracle.on(
      "reflect_propose",
      JSON.stringify([
        { field: "nowhere.at.all", new_value: "x", reason: "a" },
        { field: "engagement.exploration_rate", new_value: 5, reason: "b" },
        { field: "interests.exploring", new_value: ["poetry"], reason: "c" },
      ]),
    );
    oracle.on(
      "reflect_validate",
      JSON.stringify([
        { field: "nowhere.at.all", approved: true, reason: "ok" },
        { field: "engagement.exploration_rate", approved: true, reason: "ok" },
        { field: "interests.exploring", approved: true, reason: "ok" },
      ]),
    );

    const result = await engine.runCycle("scheduled");

    expect(result).toEqual({
      accepted: 3,
      rejected: 0,
      changes: ["interests.exploring"],
      newVersion: 2,
    });
    expect(strategies.latest().document.interests.exploring).toEqual(["poetry"]);
    expect(strategies.latest().document.engagement.exploration_rate).toBe(0.1);
  });

  it("rejects everything when validation cannot be parsed", async () => {
    oracle.on("reflect_propose", '[{"field": "goals.mission", "new_value": "Teach", "reason": "r"}]');
    oracle.on("reflect_validate", "I think these are fine");

    const result = await engine.runCycle("scheduled");

    expect(result.rejected).toBe(1);
    expect(result.newVersion).toBeNull();
    expect(strategies.count()).toBe(1);
  });

  it("makes no proposals when the oracle returns garbage", async () => {
    oracle.on("reflect_propose", "no changes needed");
    const result = await engine.runCycle("scheduled");
    expect(result).toEqual({ accepted: 0, rejected: 0, changes: [], newVersion: null });
    expect(audit.entries()).toEqual([]);
    expect(oracle.callsFor("reflect_validate")).toHaveLength(0);
  });

  it("records the thought and the outcome as episodes and clears zero-engagement flags", async () => {
    social.saveOwnPost(makePost({ id: "quiet" }));
    social.flagZeroEngagement("quiet");
    oracle.on("reflect_propose", "[]");

    await engine.runCycle("zero_engagement");

    expect(store.recentEpisodes(1, "reflection")[0]?.content).toBe(
      "Reflection (zero_engagement): 0 accepted, 0 rejected",
    );
    expect(store.recentEpisodes(1, "reflection_thought")[0]?.content).toBe(
      "Posting less and commenting more would help.",
    );
    expect(social.pendingZeroEngagement()).toBe(0);
  });
});
