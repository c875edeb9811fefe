import type Database from "better-sqlite3";
import type { AgentDB } from "../store/db.js";
import { parseIdList, parseJsonRecord } from "../utils/json.js";
import {
  CORE_BLOCK_NAMES,
  isCoreBlockName,
  isEpisodeType,
  isInsightCategory,
  type CoreBlock,
  type CoreBlockName,
  type Episode,
  type EpisodeType,
  type Insight,
  type InsightCategory,
  type NewEpisode,
} from "./types.js";

interface EpisodeRow {
  id: number;
  type: string;
  content: string;
  importance: number;
  metadata: string;
  created_at: number;
}

interface InsightRow {
  id: number;
  text: string;
  category: string;
  confidence: number;
  evidence_count: number;
  source_episode_ids: string;
  created_at: number;
  updated_at: number;
}

interface CoreBlockRow {
  block: string;
  content: string;
  char_limit: number;
  updated_at: number;
}

interface CountRow {
  n: number;
}

export interface NewInsight {
  text: string;
  category: InsightCategory;
  confidence?: number;
  sourceEpisodeIds: number[];
}

export const MIN_IMPORTANCE = 1;
export const MAX_IMPORTANCE = 10;

export function clampImportance(value: number): number {
  if (!Number.isFinite(value)) return 5;
  return Math.min(MAX_IMPORTANCE, Math.max(MIN_IMPORTANCE, value));
}

function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

function toEpisode(row: EpisodeRow): Episode {
  if (!isEpisodeType(row.type)) {
    throw new Error(`Unknown episode type in store: ${row.type}`);
  }
  return {
    id: row.id,
    type: row.type,
    content: row.content,
    importance: row.importance,
    metadata: parseJsonRecord(row.metadata),
    createdAt: row.created_at,
  };
}

function toInsight(row: InsightRow): Insight {
  if (!isInsightCategory(row.category)) {
    throw new Error(`Unknown insight category in store: ${row.category}`);
  }
  return {
    id: row.id,
    text: row.text,
    category: row.category,
    confidence: row.confidence,
    evidenceCount: row.evidence_count,
    sourceEpisodeIds: parseIdList(row.source_episode_ids),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toCoreBlock(row: CoreBlockRow): CoreBlock {
  if (!isCoreBlockName(row.block)) {
    throw new Error(`Unknown core block in store: ${row.block}`);
  }
  return {
    name: row.block,
    content: row.content,
    charLimit: row.char_limit,
    updatedAt: row.updated_at,
  };
}

export class MemoryStore {
  private readonly agentDb: AgentDB;
  private readonly db: Database.Database;

  constructor(agentDb: AgentDB) {
    this.agentDb = agentDb;
    this.db = agentDb.raw();
  }

  // ── Episodes ──

  addEpisode(episode: NewEpisode): number {
    const result = this.db
      .prepare(
        `INSERT INTO episodes (type, content, importance, metadata, created_at)
         VALUES (?, ?, ?, ?, ?)`,
      )
      .run(
        episode.type,
        episode.content,
        clampImportance(episode.importance),
        JSON.stringify(episode.metadata ?? {}),
        Date.now(),
      );
    return Number(result.lastInsertRowid);
  }

  getEpisode(id: number): Episode | null {
    const row = this.db
      .prepare<[number], EpisodeRow>("SELECT * FROM episodes WHERE id = ?")
      .get(id);
    return row ? toEpisode(row) : null;
  }

  /** Newest first. */
  recentEpisodes(limit: number, type?: EpisodeType): Episode[] {
    if (type) {
      return this.db
        .prepare<[string, number], EpisodeRow>(
          "SELECT * FROM episodes WHERE type = ? ORDER BY id DESC LIMIT ?",
        )
        .all(type, limit)
        .map(toEpisode);
    }
    return this.db
      .prepare<[number], EpisodeRow>("SELECT * FROM episodes ORDER BY id DESC LIMIT ?")
      .all(limit)
      .map(toEpisode);
  }

  /** Substring match on any keyword, newest first; most recent episodes when no keywords are given. */
  searchEpisodes(keywords: string[], limit = 50): Episode[] {
    if (keywords.length === 0) return this.recentEpisodes(limit);

    const clauses = keywords.map(() => "content LIKE ? ESCAPE '\\'").join(" OR ");
    const params = keywords.map((kw) => `%${escapeLike(kw)}%`);
    return this.db
      .prepare<Array<string | number>, EpisodeRow>(
        `SELECT * FROM episodes WHERE ${clauses} ORDER BY id DESC LIMIT ?`,
      )
      .all(...params, limit)
      .map(toEpisode);
  }

  /** Oldest first. Summaries produced by earlier compressions are never selected again. */
  compressionCandidates(createdBefore: number, importanceBelow: number): Episode[] {
    return this.db
      .prepare<[number, number], EpisodeRow>(
        `SELECT * FROM episodes
         WHERE created_at < ? AND importance < ? AND type <> 'compressed_summary'
         ORDER BY id ASC`,
      )
      .all(createdBefore, importanceBelow)
      .map(toEpisode);
  }

  /** Atomically deletes `ids` and inserts their summary. Returns the summary's id. */
  replaceWithSummary(ids: number[], summary: NewEpisode): number {
    const remove = this.db.prepare("DELETE FROM episodes WHERE id = ?");
    return this.agentDb.transaction(() => {
      for (const id of ids) remove.run(id);
      return this.addEpisode(summary);
    });
  }

  countEpisodes(): number {
    const row = this.db.prepare<[], CountRow>("SELECT COUNT(*) AS n FROM episodes").get();
    return row?.n ?? 0;
  }

  // ── Insights ──

  addInsight(insight: NewInsight): number {
    const now = Date.now();
    const result = this.db
      .prepare(
        `INSERT INTO insights (text, category, confidence, evidence_count, source_episode_ids, created_at, updated_at)
         VALUES (?, ?, ?, 1, ?, ?, ?)`,
      )
      .run(
        insight.text,
        insight.category,
        clampConfidence(insight.confidence ?? 0.5),
        JSON.stringify(insight.sourceEpisodeIds),
        now,
        now,
      );
    return Number(result.lastInsertRowid);
  }

  getInsight(id: number): Insight | null {
    const row = this.db
      .prepare<[number], InsightRow>("SELECT * FROM insights WHERE id = ? AND deleted_at IS NULL")
      .get(id);
    return row ? toInsight(row) : null;
  }

  /** Live insights at or above `minConfidence`, strongest first. */
  getInsights(minConfidence = 0, limit = 100): Insight[] {
    return this.db
      .prepare<[number, number], InsightRow>(
        `SELECT * FROM insights
         WHERE deleted_at IS NULL AND confidence >= ?
         ORDER BY confidence DESC, id ASC LIMIT ?`,
      )
      .all(minConfidence, limit)
      .map(toInsight);
  }

  findInsightByText(text: string): Insight | null {
    const row = this.db
      .prepare<[string], InsightRow>(
        "SELECT * FROM insights WHERE deleted_at IS NULL AND lower(text) = lower(?) LIMIT 1",
      )
      .get(text.trim());
    return row ? toInsight(row) : null;
  }

  countInsights(minConfidence = 0): number {
    const row = this.db
      .prepare<[number], CountRow>(
        "SELECT COUNT(*) AS n FROM insights WHERE deleted_at IS NULL AND confidence >= ?",
      )
      .get(minConfidence);
    return row?.n ?? 0;
  }

  reinforceInsight(id: number, amount = 0.1): void {
    this.db
      .prepare(
        `UPDATE insights
         SET confidence = MIN(1.0, confidence + ?), evidence_count = evidence_count + 1, updated_at = ?
         WHERE id = ? AND deleted_at IS NULL`,
      )
      .run(amount, Date.now(), id);
  }

  suppressInsight(id: number, amount = 0.2): void {
    this.db
      .prepare(
        `UPDATE insights SET confidence = MAX(0.0, confidence - ?), updated_at = ?
         WHERE id = ? AND deleted_at IS NULL`,
      )
      .run(amount, Date.now(), id);
  }

  /** Lowers confidence of insights untouched since `updatedBefore`. Returns rows changed. */
  decayStaleInsights(updatedBefore: number, amount: number): number {
    return this.db
      .prepare(
        `UPDATE insights SET confidence = MAX(0.0, confidence - ?), updated_at = ?
         WHERE deleted_at IS NULL AND updated_at < ?`,
      )
      .run(amount, Date.now(), updatedBefore).changes;
  }

  softDeleteInsightsBelow(floor: number): number {
    return this.db
      .prepare("UPDATE insights SET deleted_at = ? WHERE deleted_at IS NULL AND confidence < ?")
      .run(Date.now(), floor).changes;
  }

  // ── Core memory ──

  initCoreBlock(name: CoreBlockName, content: string, charLimit: number): boolean {
    const result = this.db
      .prepare(
        `INSERT OR IGNORE INTO core_memory (block, content, char_limit, updated_at)
         VALUES (?, ?, ?, ?)`,
      )
      .run(name, content.slice(0, charLimit), charLimit, Date.now());
    return result.changes > 0;
  }

  getCoreBlock(name: CoreBlockName): CoreBlock | null {
    const row = this.db
      .prepare<[string], CoreBlockRow>("SELECT * FROM core_memory WHERE block = ?")
      .get(name);
    return row ? toCoreBlock(row) : null;
  }

  /** All blocks in canonical order. */
  getCoreBlocks(): CoreBlock[] {
    const rows = this.db.prepare<[], CoreBlockRow>("SELECT * FROM core_memory").all();
    const byName = new Map(rows.map((row) => [row.block, toCoreBlock(row)]));
    return CORE_BLOCK_NAMES.flatMap((name) => {
      const block = byName.get(name);
      return block ? [block] : [];
    });
  }

  /** Replaces a block's content, truncated to its limit. Returns false if the block does not exist. */
  setCoreBlock(name: CoreBlockName, content: string): boolean {
    const block = this.getCoreBlock(name);
    if (!block) return false;
    this.db
      .prepare("UPDATE core_memory SET content = ?, updated_at = ? WHERE block = ?")
      .run(content.slice(0, block.charLimit), Date.now(), name);
    return true;
  }
}
