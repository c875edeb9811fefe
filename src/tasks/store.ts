import type Database from "better-sqlite3";
import type { AgentDB } from "../store/db.js";
import { parseJsonRecord } from "../utils/json.js";

export type TaskType = "ask" | "reflect" | "heartbeat";
export type TaskStatus = "pending" | "done" | "failed";

export interface Task {
  id: number;
  type: TaskType;
  payload: Record<string, unknown>;
  status: TaskStatus;
  result: string | null;
  createdAt: number;
  completedAt: number | null;
}

interface TaskRow {
  id: number;
  type: string;
  payload: string;
  status: string;
  result: string | null;
  created_at: number;
  completed_at: number | null;
}

function isTaskType(value: string): value is TaskType {
  return value === "ask" || value === "reflect" || value === "heartbeat";
}

function isTaskStatus(value: string): value is TaskStatus {
  return value === "pending" || value === "done" || value === "failed";
}

function toTask(row: TaskRow): Task {
  if (!isTaskType(row.type) || !isTaskStatus(row.status)) {
    throw new Error(`Corrupt task row ${row.id}`);
  }
  return {
    id: row.id,
    type: row.type,
    payload: parseJsonRecord(row.payload),
    status: row.status,
    result: row.result,
    createdAt: row.created_at,
    completedAt: row.completed_at,
  };
}

export class TaskStore {
  private readonly db: Database.Database;

  constructor(agentDb: AgentDB) {
    this.db = agentDb.raw();
  }

  enqueue(type: TaskType, payload: Record<string, unknown> = {}): number {
    const result = this.db
      .prepare("INSERT INTO tasks (type, payload, status, created_at) VALUES (?, ?, 'pending', ?)")
      .run(type, JSON.stringify(payload), Date.now());
    return Number(result.lastInsertRowid);
  }

  get(id: number): Task | null {
    const row = this.db.prepare<[number], TaskRow>("SELECT * FROM tasks WHERE id = ?").get(id);
    return row ? toTask(row) : null;
  }

  /** Pending tasks in FIFO order. */
  pending(limit = 10): Task[] {
    return this.db
      .prepare<[number], TaskRow>(
        "SELECT * FROM tasks WHERE status = 'pending' ORDER BY id ASC LIMIT ?",
      )
      .all(limit)
      .map(toTask);
  }

  /** Terminal transition; a task already done or failed is left untouched. */
  complete(id: number, result: string): boolean {
    return this.finish(id, "done", result);
  }

  fail(id: number, error: string): boolean {
    return this.finish(id, "failed", error);
  }

  private finish(id: number, status: "done" | "failed", result: string): boolean {
    return (
      this.db
        .prepare(
          "UPDATE tasks SET status = ?, result = ?, completed_at = ? WHERE id = ? AND status = 'pending'",
        )
        .run(status, result, Date.now(), id).changes > 0
    );
  }
}
