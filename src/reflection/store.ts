import type Database from "better-sqlite3";
import type { AgentDB } from "../store/db.js";
import { parseJsonRecord } from "../utils/json.js";
import {
  DEFAULT_STRATEGY,
  strategyDocumentSchema,
  type StrategyDocument,
  type StrategyTrigger,
  type StrategyVersion,
} from "./strategy.js";

interface StrategyRow {
  version: number;
  document: string;
  parent_version: number | null;
  trigger: string;
  performance_snapshot: string | null;
  created_at: number;
}

function toTrigger(value: string): StrategyTrigger {
  if (value === "default" || value === "reflection" || value === "operator") return value;
  throw new Error(`Unknown strategy trigger in store: ${value}`);
}

function toVersion(row: StrategyRow): StrategyVersion {
  const raw: unknown = JSON.parse(row.document);
  return {
    version: row.version,
    document: strategyDocumentSchema.parse(raw),
    parentVersion: row.parent_version,
    trigger: toTrigger(row.trigger),
    performanceSnapshot: row.performance_snapshot ? parseJsonRecord(row.performance_snapshot) : null,
    createdAt: row.created_at,
  };
}

/** Append-only strategy history. Version 1 is the built-in default. */
export class StrategyStore {
  private readonly agentDb: AgentDB;
  private readonly db: Database.Database;

  constructor(agentDb: AgentDB) {
    this.agentDb = agentDb;
    this.db = agentDb.raw();
  }

  ensureDefault(document: StrategyDocument = DEFAULT_STRATEGY): StrategyVersion {
    this.db
      .prepare(
        `INSERT OR IGNORE INTO strategy_versions (version, document, parent_version, trigger, created_at)
         VALUES (1, ?, NULL, 'default', ?)`,
      )
      .run(JSON.stringify(document), Date.now());
    return this.latest();
  }

  latest(): StrategyVersion {
    const row = this.db
      .prepare<[], StrategyRow>("SELECT * FROM strategy_versions ORDER BY version DESC LIMIT 1")
      .get();
    if (!row) throw new Error("No strategy version stored; call ensureDefault() first");
    return toVersion(row);
  }

  get(version: number): StrategyVersion | null {
    const row = this.db
      .prepare<[number], StrategyRow>("SELECT * FROM strategy_versions WHERE version = ?")
      .get(version);
    return row ? toVersion(row) : null;
  }

  /** Newest first. */
  history(limit = 20): StrategyVersion[] {
    return this.db
      .prepare<[number], StrategyRow>("SELECT * FROM strategy_versions ORDER BY version DESC LIMIT ?")
      .all(limit)
      .map(toVersion);
  }

  count(): number {
    const row = this.db
      .prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM strategy_versions")
      .get();
    return row?.n ?? 0;
  }

  /** Appends the next version on top of the current latest one. */
  append(
    document: StrategyDocument,
    trigger: StrategyTrigger,
    performanceSnapshot: Record<string, unknown> | null = null,
  ): StrategyVersion {
    const validated = strategyDocumentSchema.parse(document);
    return this.agentDb.transaction(() => {
      const parent = this.latest();
      const version = parent.version + 1;
      this.db
        .prepare(
          `INSERT INTO strategy_versions (version, document, parent_version, trigger, performance_snapshot, created_at)
           VALUES (?, ?, ?, ?, ?, ?)`,
        )
        .run(
          version,
          JSON.stringify(validated),
          parent.version,
          trigger,
          performanceSnapshot ? JSON.stringify(performanceSnapshot) : null,
          Date.now(),
        );
      return this.latest();
    });
  }
}
