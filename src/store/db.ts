import Database from "better-sqlite3";
import { getDbPath } from "../config/paths.js";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS state (
  key         TEXT PRIMARY KEY,
  value       TEXT NOT NULL,
  updated_at  INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS episodes (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  type        TEXT NOT NULL,
  content     TEXT NOT NULL,
  importance  REAL NOT NULL DEFAULT 5.0 CHECK(importance BETWEEN 1 AND 10),
  metadata    TEXT NOT NULL DEFAULT '{}',
  created_at  INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_episodes_type ON episodes(type, id);
CREATE INDEX IF NOT EXISTS idx_episodes_created ON episodes(created_at);

CREATE TRIGGER IF NOT EXISTS episodes_immutable BEFORE UPDATE ON episodes BEGIN
  SELECT RAISE(ABORT, 'episodes are immutable');
END;

CREATE TABLE IF NOT EXISTS insights (
  id                 INTEGER PRIMARY KEY AUTOINCREMENT,
  text               TEXT NOT NULL,
  category           TEXT NOT NULL CHECK(category IN ('engagement','social','strategy','content')),
  confidence         REAL NOT NULL DEFAULT 0.5 CHECK(confidence BETWEEN 0 AND 1),
  evidence_count     INTEGER NOT NULL DEFAULT 1,
  source_episode_ids TEXT NOT NULL DEFAULT '[]',
  created_at         INTEGER NOT NULL,
  updated_at         INTEGER NOT NULL,
  deleted_at         INTEGER
);
CREATE INDEX IF NOT EXISTS idx_insights_live
  ON insights(confidence) WHERE deleted_at IS NULL;

CREATE TABLE IF NOT EXISTS core_memory (
  block       TEXT PRIMARY KEY CHECK(block IN ('persona','goals','social_graph','domain_knowledge')),
  content     TEXT NOT NULL,
  char_limit  INTEGER NOT NULL,
  updated_at  INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS strategy_versions (
  version              INTEGER PRIMARY KEY,
  document             TEXT NOT NULL,
  parent_version       INTEGER REFERENCES strategy_versions(version),
  trigger              TEXT NOT NULL,
  performance_snapshot TEXT,
  created_at           INTEGER NOT NULL
);

CREATE TRIGGER IF NOT EXISTS strategy_versions_no_update BEFORE UPDATE ON strategy_versions BEGIN
  SELECT RAISE(ABORT, 'strategy history is append-only');
END;

CREATE TRIGGER IF NOT EXISTS strategy_versions_no_delete BEFORE DELETE ON strategy_versions BEGIN
  SELECT RAISE(ABORT, 'strategy history is append-only');
END;

CREATE TABLE IF NOT EXISTS audit_log (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  kind        TEXT NOT NULL,
  data        TEXT NOT NULL,
  created_at  INTEGER NOT NULL
);

CREATE TRIGGER IF NOT EXISTS audit_log_no_update BEFORE UPDATE ON audit_log BEGIN
  SELECT RAISE(ABORT, 'audit log is append-only');
END;

CREATE TRIGGER IF NOT EXISTS audit_log_no_delete BEFORE DELETE ON audit_log BEGIN
  SELECT RAISE(ABORT, 'audit log is append-only');
END;

CREATE TABLE IF NOT EXISTS own_posts (
  id                    TEXT PRIMARY KEY,
  channel               TEXT NOT NULL,
  title                 TEXT NOT NULL,
  content               TEXT NOT NULL,
  created_at            INTEGER NOT NULL,
  zero_engagement_at    INTEGER,
  reviewed_at           INTEGER
);
CREATE INDEX IF NOT EXISTS idx_own_posts_created ON own_posts(created_at);

CREATE TABLE IF NOT EXISTS own_comments (
  id          TEXT PRIMARY KEY,
  post_id     TEXT NOT NULL,
  parent_id   TEXT,
  content     TEXT NOT NULL,
  created_at  INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS seen_posts (
  post_id     TEXT PRIMARY KEY,
  author      TEXT,
  channel     TEXT,
  interacted  INTEGER NOT NULL DEFAULT 0,
  seen_at     INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS seen_comments (
  comment_id  TEXT PRIMARY KEY,
  post_id     TEXT NOT NULL,
  replied     INTEGER NOT NULL DEFAULT 0,
  seen_at     INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_seen_comments_post ON seen_comments(post_id);

CREATE TABLE IF NOT EXISTS dm_conversations (
  id            TEXT PRIMARY KEY,
  other_party   TEXT NOT NULL,
  watermark_id  TEXT,
  watermark_at  INTEGER,
  needs_human   INTEGER NOT NULL DEFAULT 0,
  created_at    INTEGER NOT NULL,
  updated_at    INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS tasks (
  id            INTEGER PRIMARY KEY AUTOINCREMENT,
  type          TEXT NOT NULL CHECK(type IN ('ask','reflect','heartbeat')),
  payload       TEXT NOT NULL DEFAULT '{}',
  status        TEXT NOT NULL DEFAULT 'pending' CHECK(status IN ('pending','done','failed')),
  result        TEXT,
  created_at    INTEGER NOT NULL,
  completed_at  INTEGER
);
CREATE INDEX IF NOT EXISTS idx_tasks_pending ON tasks(id) WHERE status = 'pending';

CREATE TABLE IF NOT EXISTS agent_events (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  type        TEXT NOT NULL,
  payload     TEXT NOT NULL DEFAULT '{}',
  consumed    INTEGER NOT NULL DEFAULT 0,
  created_at  INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_agent_events_pending ON agent_events(id) WHERE consumed = 0;
`;

export class AgentDB {
  private db: Database.Database;

  constructor(stateDir: string) {
    this.db = new Database(getDbPath(stateDir));
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.exec(SCHEMA_SQL);
  }

  raw(): Database.Database {
    return this.db;
  }

  /** Runs `fn` inside a single SQLite transaction. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
