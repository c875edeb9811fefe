import type Database from "better-sqlite3";
import type { AgentDB } from "../store/db.js";
import { parseJsonRecord } from "../utils/json.js";
import type { AgentEventPayloads, AgentEventType, EventSink } from "./types.js";

interface EventRow {
  id: number;
  type: string;
  payload: string;
  created_at: number;
}

/** An event as read back from the store; payload fields are checked by the consumer. */
export interface StoredEvent {
  id: number;
  type: string;
  payload: Record<string, unknown>;
  createdAt: number;
}

export class EventStore implements EventSink {
  private readonly db: Database.Database;

  constructor(agentDb: AgentDB) {
    this.db = agentDb.raw();
  }

  emit<K extends AgentEventType>(type: K, payload: AgentEventPayloads[K]): void {
    this.db
      .prepare("INSERT INTO agent_events (type, payload, consumed, created_at) VALUES (?, ?, 0, ?)")
      .run(type, JSON.stringify(payload), Date.now());
  }

  /** Unconsumed events, oldest first. */
  pending(limit = 50): StoredEvent[] {
    return this.db
      .prepare<[number], EventRow>(
        "SELECT id, type, payload, created_at FROM agent_events WHERE consumed = 0 ORDER BY id ASC LIMIT ?",
      )
      .all(limit)
      .map((row) => ({
        id: row.id,
        type: row.type,
        payload: parseJsonRecord(row.payload),
        createdAt: row.created_at,
      }));
  }

  markConsumed(id: number): void {
    this.db.prepare("UPDATE agent_events SET consumed = 1 WHERE id = ?").run(id);
  }

  /** Deletes events created before `cutoff`. Returns the number removed. */
  pruneBefore(cutoff: number): number {
    return this.db.prepare("DELETE FROM agent_events WHERE created_at < ?").run(cutoff).changes;
  }
}
