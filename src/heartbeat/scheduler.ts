import { Cron } from "croner";
import type { ConsolidationEngine, ConsolidationSummary } from "../consolidation/engine.js";
import type { HeartbeatConfig } from "../config/types.js";
import type { EventSink } from "../events/types.js";
import type { Logger } from "../logging/logger.js";
import type { ReflectionEngine, ReflectionResult, ReflectionTrigger } from "../reflection/engine.js";
import type { StrategyStore } from "../reflection/store.js";
import type { ActiveStrategy } from "../reflection/strategy.js";
import type { StabilityIndex, StabilityReport } from "../safety/stability.js";
import type { ContentService } from "../social/types.js";
import { STATE_KEYS, type StateStore } from "../store/state.js";
import type { ActionOutcome, AutonomousPhase } from "./autonomous.js";
import type { Obligations } from "./obligations.js";

export interface HeartbeatSchedulerDeps {
  state: StateStore;
  client: ContentService;
  obligations: Obligations;
  autonomous: AutonomousPhase;
  stability: StabilityIndex;
  reflection: ReflectionEngine;
  consolidation: ConsolidationEngine;
  strategies: StrategyStore;
  active: ActiveStrategy;
  events: EventSink;
  config: HeartbeatConfig;
  consolidationSchedule: string;
  logger: Logger;
  random?: () => number;
}

export type TickReport =
  | { status: "skipped"; reason: string }
  | {
      status: "completed";
      count: number;
      replies: number;
      action: ActionOutcome | "failed";
      stability: StabilityReport | null;
      reflection: ReflectionResult | null;
      durationMs: number;
    };

export interface TickOptions {
  /** Arm the next timer before running. Manual ticks pass false. */
  reschedule?: boolean;
}

/**
 * Drives the agent. One tick at a time runs under the heartbeat flag; the
 * consolidation job shares that flag and backs off while a tick holds it.
 */
export class HeartbeatScheduler {
  private readonly state: StateStore;
  private readonly client: ContentService;
  private readonly obligations: Obligations;
  private readonly autonomous: AutonomousPhase;
  private readonly stability: StabilityIndex;
  private readonly reflection: ReflectionEngine;
  private readonly consolidation: ConsolidationEngine;
  private readonly strategies: StrategyStore;
  private readonly active: ActiveStrategy;
  private readonly events: EventSink;
  private readonly config: HeartbeatConfig;
  private readonly consolidationSchedule: string;
  private readonly logger: Logger;
  private readonly random: () => number;

  private timer: ReturnType<typeof setTimeout> | null = null;
  private consolidationJob: Cron | null = null;
  private running = false;
  private readonly inFlight = new Set<Promise<unknown>>();

  constructor(deps: HeartbeatSchedulerDeps) {
    this.state = deps.state;
    this.client = deps.client;
    this.obligations = deps.obligations;
    this.autonomous = deps.autonomous;
    this.stability = deps.stability;
    this.reflection = deps.reflection;
    this.consolidation = deps.consolidation;
    this.strategies = deps.strategies;
    this.active = deps.active;
    this.events = deps.events;
    this.config = deps.config;
    this.consolidationSchedule = deps.consolidationSchedule;
    this.logger = deps.logger;
    this.random = deps.random ?? Math.random;
  }

  start(): void {
    this.running = true;
    this.scheduleNext();
    this.consolidationJob = new Cron(this.consolidationSchedule, { protect: true }, () => {
      this.consolidationTick().catch((err) => {
        this.logger.error({ err }, "Consolidation tick error");
      });
    });
    this.logger.info({ consolidation: this.consolidationSchedule }, "Heartbeat scheduler started");
  }

  /** Cancels the timers, then waits for a tick or cycle already under way. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.consolidationJob?.stop();
    this.consolidationJob = null;
    if (this.inFlight.size > 0) {
      this.logger.info({ pending: this.inFlight.size }, "Waiting for in-flight heartbeat work");
      await Promise.allSettled([...this.inFlight]);
    }
    this.logger.info("Heartbeat scheduler stopped");
  }

  /** Uniform in [min, max] seconds, drawn fresh for every tick. */
  nextDelayMs(): number {
    const { minIntervalSec, maxIntervalSec } = this.config;
    const span = maxIntervalSec - minIntervalSec;
    return (minIntervalSec + Math.floor(this.random() * (span + 1))) * 1000;
  }

  // ── Heartbeat ──

  tick(options: TickOptions = {}): Promise<TickReport> {
    return this.track(() => this.runTick(options));
  }

  private async runTick(options: TickOptions): Promise<TickReport> {
    if (options.reschedule ?? true) this.scheduleNext();

    if (!this.syncRegistration()) return this.skip("not registered");
    if (this.state.isPaused()) return this.skip("paused");
    if (this.state.isSet(STATE_KEYS.consolidationRunning)) return this.skip("consolidation running");
    if (!this.state.tryAcquire(STATE_KEYS.heartbeatRunning)) return this.skip("heartbeat already running");

    const started = Date.now();
    try {
      const count = this.state.increment(STATE_KEYS.heartbeatCount);
      this.state.set(STATE_KEYS.lastHeartbeatAt, String(started));
      this.logger.info({ count }, "Heartbeat started");

      const replies = await this.phase("replies", () => this.obligations.replyToComments(), 0);
      await this.phase("dms", () => this.obligations.handleDms(), null);
      const action = await this.phase<ActionOutcome | "failed">(
        "autonomous",
        () => this.autonomous.run(),
        "failed",
      );
      const stability = await this.phase("stability", async () => this.checkStability(), null);
      const reflection = await this.phase(
        "reflection",
        async () => {
          const trigger = this.reflection.shouldTrigger(count);
          return trigger ? this.reflect(trigger) : null;
        },
        null,
      );

      const durationMs = Date.now() - started;
      this.events.emit("heartbeat_report", { count, action, durationMs });
      this.logger.info({ count, action, replies, durationMs }, "Heartbeat completed");
      return { status: "completed", count, replies, action, stability, reflection, durationMs };
    } finally {
      this.state.release(STATE_KEYS.heartbeatRunning);
    }
  }

  /**
   * Runs a reflection cycle outside the timer. Returns null when a heartbeat
   * holds the flag, so the caller can try again later.
   */
  reflectNow(trigger: ReflectionTrigger = "operator"): Promise<ReflectionResult | null> {
    return this.track(async () => {
      if (!this.state.tryAcquire(STATE_KEYS.heartbeatRunning)) return null;
      try {
        return await this.reflect(trigger);
      } finally {
        this.state.release(STATE_KEYS.heartbeatRunning);
      }
    });
  }

  // ── Consolidation ──

  /** No-op while paused or while a heartbeat holds its flag. Never waits for the flag. */
  consolidationTick(): Promise<ConsolidationSummary | null> {
    return this.track(() => this.runConsolidation());
  }

  private async runConsolidation(): Promise<ConsolidationSummary | null> {
    if (this.state.isPaused()) return null;
    if (this.state.isSet(STATE_KEYS.heartbeatRunning)) {
      this.logger.info("Consolidation skipped, heartbeat running");
      return null;
    }
    if (!this.state.tryAcquire(STATE_KEYS.consolidationRunning)) {
      this.logger.info("Consolidation skipped, already running");
      return null;
    }
    try {
      return await this.consolidation.runCycle();
    } catch (err) {
      this.logger.error({ err }, "Consolidation cycle failed");
      return null;
    } finally {
      this.state.release(STATE_KEYS.consolidationRunning);
    }
  }

  // ── Internals ──

  private async track<T>(work: () => Promise<T>): Promise<T> {
    const run = work();
    this.inFlight.add(run);
    try {
      return await run;
    } finally {
      this.inFlight.delete(run);
    }
  }

  /** Picks up a key that `tidepool register` stored after this process started. */
  private syncRegistration(): boolean {
    if (this.client.isRegistered()) return true;
    const apiKey = this.state.get(STATE_KEYS.apiKey);
    if (!apiKey) return false;
    this.client.setApiKey(apiKey);
    this.logger.info("Platform API key loaded from the store");
    return true;
  }

  private scheduleNext(): void {
    if (!this.running) return;
    if (this.timer) clearTimeout(this.timer);
    const delayMs = this.nextDelayMs();
    this.timer = setTimeout(() => {
      this.tick().catch((err) => {
        this.logger.error({ err }, "Heartbeat tick error");
      });
    }, delayMs);
    this.logger.info({ delaySec: delayMs / 1000 }, "Next heartbeat scheduled");
  }

  private skip(reason: string): TickReport {
    this.logger.info({ reason }, "Heartbeat skipped");
    this.events.emit("heartbeat_skip", { reason });
    return { status: "skipped", reason };
  }

  private checkStability(): StabilityReport {
    const report = this.stability.compute();
    if (report.alert) {
      this.logger.warn({ overall: report.overall, components: report.components }, "Stability alert");
      this.events.emit("stability_alert", {
        overall: report.overall,
        skipRate: report.components?.skipRate ?? 0,
        qualityTrend: report.components?.qualityTrend ?? 0,
      });
    }
    return report;
  }

  private async reflect(trigger: ReflectionTrigger): Promise<ReflectionResult> {
    const result = await this.reflection.runCycle(trigger);
    if (result.newVersion !== null) {
      this.active.swap(this.strategies.latest());
      this.logger.info({ version: result.newVersion }, "Active strategy reloaded");
    }
    this.events.emit("reflection_done", {
      accepted: result.accepted,
      rejected: result.rejected,
      changes: result.changes,
      newVersion: result.newVersion,
    });
    return result;
  }

  private async phase<T>(name: string, fn: () => Promise<T>, fallback: T): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      this.logger.error({ err, phase: name }, "Heartbeat phase failed");
      return fallback;
    }
  }
}
