import { Hono } from "hono";
import { serve } from "@hono/node-server";
import type { UsageReport } from "../oracle/types.js";
import type { StrategyStore } from "../reflection/store.js";
import type { StabilityIndex } from "../safety/stability.js";
import { STATE_KEYS, type StateStore } from "../store/state.js";

export const VERSION = "0.1.0";

export interface HealthServerDeps {
  state: StateStore;
  strategies: StrategyStore;
  stability: StabilityIndex;
  isRegistered: () => boolean;
  usage: () => UsageReport;
  port: number;
  hostname: string;
}

function labelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

export class HealthServer {
  readonly app: Hono;
  private server: ReturnType<typeof serve> | null = null;
  private readonly startedAt = Date.now();
  private readonly deps: HealthServerDeps;

  constructor(deps: HealthServerDeps) {
    this.deps = deps;
    this.app = new Hono();
    this.setupRoutes();
  }

  private setupRoutes(): void {
    const { state, strategies, stability, isRegistered, usage } = this.deps;

    this.app.get("/health", (c) => {
      const paused = state.isPaused();
      const report = stability.compute();
      const uptime = Date.now() - this.startedAt;
      return c.json({
        status: paused ? "paused" : "ok",
        version: VERSION,
        uptime,
        uptimeHuman: formatUptime(uptime),
        paused,
        heartbeatRunning: state.isSet(STATE_KEYS.heartbeatRunning),
        heartbeatCount: state.getNumber(STATE_KEYS.heartbeatCount),
        strategyVersion: strategies.latest().version,
        stability: { overall: report.overall, alert: report.alert },
      });
    });

    this.app.get("/ready", (c) => {
      if (!isRegistered()) {
        return c.json({ ready: false, reason: "not registered" }, 503);
      }
      return c.json({ ready: true });
    });

    this.app.get("/metrics", (c) => {
      const report = stability.compute();
      const lines = [
        "# HELP tidepool_uptime_seconds Agent uptime in seconds",
        "# TYPE tidepool_uptime_seconds gauge",
        `tidepool_uptime_seconds ${Math.round((Date.now() - this.startedAt) / 1000)}`,
        "# HELP tidepool_heartbeats_total Heartbeats started",
        "# TYPE tidepool_heartbeats_total counter",
        `tidepool_heartbeats_total ${state.getNumber(STATE_KEYS.heartbeatCount)}`,
        "# HELP tidepool_paused Whether the agent is paused",
        "# TYPE tidepool_paused gauge",
        `tidepool_paused ${state.isPaused() ? 1 : 0}`,
        "# HELP tidepool_strategy_version Active strategy version",
        "# TYPE tidepool_strategy_version gauge",
        `tidepool_strategy_version ${strategies.latest().version}`,
        "# HELP tidepool_stability Behavioral stability index",
        "# TYPE tidepool_stability gauge",
        `tidepool_stability ${report.overall}`,
        "# HELP tidepool_oracle_calls_total Oracle calls by provider and label",
        "# TYPE tidepool_oracle_calls_total counter",
      ];
      const failures: string[] = [
        "# HELP tidepool_oracle_failures_total Failed oracle calls by provider and label",
        "# TYPE tidepool_oracle_failures_total counter",
      ];
      for (const [bucket, counter] of Object.entries(usage())) {
        const sep = bucket.indexOf(":");
        const provider = sep === -1 ? bucket : bucket.slice(0, sep);
        const label = sep === -1 ? "default" : bucket.slice(sep + 1);
        const labels = `provider="${labelValue(provider)}",label="${labelValue(label)}"`;
        lines.push(`tidepool_oracle_calls_total{${labels}} ${counter.calls}`);
        failures.push(`tidepool_oracle_failures_total{${labels}} ${counter.failures}`);
      }
      c.header("Content-Type", "text/plain; charset=utf-8");
      return c.text([...lines, ...failures].join("\n") + "\n");
    });
  }

  async start(): Promise<void> {
    this.server = serve({
      fetch: this.app.fetch,
      port: this.deps.port,
      hostname: this.deps.hostname,
    });
  }

  async stop(): Promise<void> {
    if (this.server) {
      this.server.close();
      this.server = null;
    }
  }
}

export function formatUptime(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) return `${days}d ${hours % 24}h`;
  if (hours > 0) return `${hours}h ${minutes % 60}m`;
  if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
  return `${seconds}s`;
}
