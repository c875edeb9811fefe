import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { formatUptime, HealthServer } from "../../src/gateway/health.js";
import type { UsageReport } from "../../src/oracle/types.js";
import { StrategyStore } from "../../src/reflection/store.js";
import { MemoryStore } from "../../src/memory/store.js";
import { StabilityIndex } from "../../src/safety/stability.js";
import { STATE_KEYS, StateStore } from "../../src/store/state.js";
import { makeTempDb, type TempDb } from "../helpers/fixtures.js";

describe("HealthServer", () => {
  let tmp: TempDb;
  let state: StateStore;
  let registered: boolean;
  let usage: UsageReport;
  let server: HealthServer;

  beforeEach(() => {
    tmp = makeTempDb();
    state = new StateStore(tmp.db);
    state.initDefaults();
    const strategies = new StrategyStore(tmp.db);
    strategies.ensureDefault();
    registered = true;
    usage = {};
    server = new HealthServer({
      state,
      strategies,
      stability: new StabilityIndex(new MemoryStore(tmp.db)),
      isRegistered: () => registered,
      usage: () => usage,
      port: 0,
      hostname: "127.0.0.1",
    });
  });

  afterEach(() => {
    tmp.cleanup();
  });

  describe("GET /health", () => {
    it("reports agent state", async () => {
      state.increment(STATE_KEYS.heartbeatCount);

      const res = await server.app.request("/health");
      expect(res.status).toBe(200);

      const body: unknown = await res.json();
      expect(body).toMatchObject({
        status: "ok",
        version: "0.1.0",
        paused: false,
        heartbeatRunning: false,
        heartbeatCount: 1,
        strategyVersion: 1,
        stability: { overall: 1, alert: false },
      });
      expect(body).toHaveProperty("uptime");
      expect(body).toHaveProperty("uptimeHuman");
    });

    it("reports paused while paused", async () => {
      state.setPaused(true);

      const body: unknown = await (await server.app.request("/health")).json();

      expect(body).toMatchObject({ status: "paused", paused: true });
    });
  });

  describe("GET /ready", () => {
    it("returns 503 before registration", async () => {
      registered = false;

      const res = await server.app.request("/ready");

      expect(res.status).toBe(503);
      expect(await res.json()).toEqual({ ready: false, reason: "not registered" });
    });

    it("returns ready once registered", async () => {
      const res = await server.app.request("/ready");

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ ready: true });
    });
  });

  describe("GET /metrics", () => {
    it("exposes counters in text format", async () => {
      state.setPaused(true);
      usage = {
        "primary:decide": { calls: 3, failures: 1, promptTokens: 10, completionTokens: 5 },
        backup: { calls: 2, failures: 0, promptTokens: 0, completionTokens: 0 },
      };

      const res = await server.app.request("/metrics");
      expect(res.headers.get("content-type")).toContain("text/plain");

      const lines = (await res.text()).split("\n");
      expect(lines).toContain("tidepool_heartbeats_total 0");
      expect(lines).toContain("tidepool_paused 1");
      expect(lines).toContain("tidepool_strategy_version 1");
      expect(lines).toContain("tidepool_stability 1");
      expect(lines).toContain('tidepool_oracle_calls_total{provider="primary",label="decide"} 3');
      expect(lines).toContain('tidepool_oracle_failures_total{provider="primary",label="decide"} 1');
      expect(lines).toContain('tidepool_oracle_calls_total{provider="backup",label="default"} 2');
    });
  });
});

describe("formatUptime", () => {
  it("picks the two largest units", () => {
    expect(formatUptime(5_000)).toBe("5s");
    expect(formatUptime(65_000)).toBe("1m 5s");
    expect(formatUptime(3_660_000)).toBe("1h 1m");
    expect(formatUptime(90_000_000)).toBe("1d 1h");
  });
});
