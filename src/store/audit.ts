import type Database from "better-sqlite3";
import type { AgentDB } from "./db.js";
import { parseJsonRecord } from "../utils/json.js";

export type AuditKind = "reflection" | "operator" | "safety";

export interface AuditEntry {
  id: number;
  kind: string;
  data: Record<string, unknown>;
  createdAt: number;
}

interface AuditRow {
  id: number;
  kind: string;
  data: string;
  created_at: number;
}

/** Append-only record of self-modification and operator interventions. */
export class AuditLog {
  private readonly db: Database.Database;

  constructor(agentDb: AgentDB) {
    this.db = agentDb.raw();
  }

  record(kind: AuditKind, data: Record<string, unknown>): number {
    const result = this.db
      .prepare("INSERT INTO audit_log (kind, data, created_at) VALUES (?, ?, ?)")
      .run(kind, JSON.stringify(data), Date.now());
    return Number(result.lastInsertRowid);
  }

  /** Newest first. */
  entries(limit = 20, kind?: AuditKind): AuditEntry[] {
    const rows = kind
      ? this.db
          .prepare<[string, number], AuditRow>(
            "SELECT * FROM audit_log WHERE kind = ? ORDER BY id DESC LIMIT ?",
          )
          .all(kind, limit)
      : this.db
          .prepare<[number], AuditRow>("SELECT * FROM audit_log ORDER BY id DESC LIMIT ?")
          .all(limit);
    return rows.map((row) => ({
      id: row.id,
      kind: row.kind,
      data: parseJsonRecord(row.data),
      createdAt: row.created_at,
    }));
  }
}
