import type Database from "better-sqlite3";
import type { AgentDB } from "./db.js";

export const STATE_KEYS = {
  paused: "paused",
  heartbeatRunning: "heartbeat_running",
  consolidationRunning: "consolidation_running",
  heartbeatCount: "heartbeat_count",
  lastHeartbeatAt: "last_heartbeat_at",
  agentName: "agent_name",
  apiKey: "api_key",
} as const;

export type StateKey = (typeof STATE_KEYS)[keyof typeof STATE_KEYS];

interface StateRow {
  value: string;
}

/**
 * Process-wide key/value state shared by every component through an explicit
 * handle. Boolean flags are stored as "1" / "0".
 */
export class StateStore {
  private readonly db: Database.Database;

  constructor(agentDb: AgentDB) {
    this.db = agentDb.raw();
  }

  get(key: StateKey): string | null {
    const row = this.db
      .prepare<[string], StateRow>("SELECT value FROM state WHERE key = ?")
      .get(key);
    return row?.value ?? null;
  }

  set(key: StateKey, value: string): void {
    this.db
      .prepare(
        `INSERT INTO state (key, value, updated_at) VALUES (?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`,
      )
      .run(key, value, Date.now());
  }

  /** Inserts only when the key is absent. Returns true when a row was written. */
  setDefault(key: StateKey, value: string): boolean {
    const result = this.db
      .prepare("INSERT OR IGNORE INTO state (key, value, updated_at) VALUES (?, ?, ?)")
      .run(key, value, Date.now());
    return result.changes > 0;
  }

  delete(key: StateKey): void {
    this.db.prepare("DELETE FROM state WHERE key = ?").run(key);
  }

  getNumber(key: StateKey, fallback = 0): number {
    const raw = this.get(key);
    if (raw === null) return fallback;
    const value = Number(raw);
    return Number.isFinite(value) ? value : fallback;
  }

  increment(key: StateKey): number {
    this.db
      .prepare(
        `INSERT INTO state (key, value, updated_at) VALUES (?, '1', ?)
         ON CONFLICT(key) DO UPDATE SET
           value = CAST(CAST(state.value AS INTEGER) + 1 AS TEXT),
           updated_at = excluded.updated_at`,
      )
      .run(key, Date.now());
    return this.getNumber(key);
  }

  isSet(key: StateKey): boolean {
    return this.get(key) === "1";
  }

  /**
   * Compare-and-swap on a flag: sets it to "1" only if it is not already "1".
   * Returns true when this caller now holds the flag.
   */
  tryAcquire(key: StateKey): boolean {
    const result = this.db
      .prepare(
        `INSERT INTO state (key, value, updated_at) VALUES (?, '1', ?)
         ON CONFLICT(key) DO UPDATE SET value = '1', updated_at = excluded.updated_at
         WHERE state.value <> '1'`,
      )
      .run(key, Date.now());
    return result.changes > 0;
  }

  release(key: StateKey): void {
    this.set(key, "0");
  }

  isPaused(): boolean {
    return this.isSet(STATE_KEYS.paused);
  }

  setPaused(paused: boolean): void {
    this.set(STATE_KEYS.paused, paused ? "1" : "0");
  }

  isRegistered(): boolean {
    return this.get(STATE_KEYS.apiKey) !== null;
  }

  /** Seeds the flags and counters every component expects to find. */
  initDefaults(): void {
    this.setDefault(STATE_KEYS.paused, "0");
    this.setDefault(STATE_KEYS.heartbeatRunning, "0");
    this.setDefault(STATE_KEYS.consolidationRunning, "0");
    this.setDefault(STATE_KEYS.heartbeatCount, "0");
  }
}
