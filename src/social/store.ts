import type Database from "better-sqlite3";
import type { AgentDB } from "../store/db.js";
import type { Comment, Post } from "./types.js";

export interface OwnPost {
  id: string;
  channel: string;
  title: string;
  content: string;
  createdAt: number;
}

export interface DmConversation {
  id: string;
  otherParty: string;
  watermarkId: string | null;
  watermarkAt: number | null;
  needsHuman: boolean;
  createdAt: number;
  updatedAt: number;
}

export interface AgentStats {
  totalPosts: number;
  commentsToday: number;
  seenPosts: number;
  pendingTasks: number;
  unrepliedComments: number;
  lastPostAt: number | null;
  hoursSinceLastPost: number | null;
}

interface OwnPostRow {
  id: string;
  channel: string;
  title: string;
  content: string;
  created_at: number;
}

interface ConversationRow {
  id: string;
  other_party: string;
  watermark_id: string | null;
  watermark_at: number | null;
  needs_human: number;
  created_at: number;
  updated_at: number;
}

interface CountRow {
  n: number;
}

interface LastPostRow {
  last: number | null;
}

interface CommentIdRow {
  comment_id: string;
}

const DAY_MS = 86_400_000;
const HOUR_MS = 3_600_000;

function toOwnPost(row: OwnPostRow): OwnPost {
  return {
    id: row.id,
    channel: row.channel,
    title: row.title,
    content: row.content,
    createdAt: row.created_at,
  };
}

function toConversation(row: ConversationRow): DmConversation {
  return {
    id: row.id,
    otherParty: row.other_party,
    watermarkId: row.watermark_id,
    watermarkAt: row.watermark_at,
    needsHuman: row.needs_human === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class SocialStore {
  private readonly db: Database.Database;

  constructor(agentDb: AgentDB) {
    this.db = agentDb.raw();
  }

  // ── Feed ──

  markPostSeen(post: Pick<Post, "id" | "author" | "channel">): void {
    this.db
      .prepare(
        `INSERT OR IGNORE INTO seen_posts (post_id, author, channel, interacted, seen_at)
         VALUES (?, ?, ?, 0, ?)`,
      )
      .run(post.id, post.author, post.channel, Date.now());
  }

  markPostInteracted(postId: string): void {
    this.db.prepare("UPDATE seen_posts SET interacted = 1 WHERE post_id = ?").run(postId);
  }

  isPostSeen(postId: string): boolean {
    return this.db.prepare("SELECT 1 FROM seen_posts WHERE post_id = ?").get(postId) !== undefined;
  }

  // ── Own content ──

  saveOwnPost(post: Pick<Post, "id" | "channel" | "title" | "content">): void {
    this.db
      .prepare(
        `INSERT OR IGNORE INTO own_posts (id, channel, title, content, created_at)
         VALUES (?, ?, ?, ?, ?)`,
      )
      .run(post.id, post.channel, post.title, post.content, Date.now());
  }

  /** Own posts created at or after `since`, newest first. */
  recentOwnPosts(since: number, limit = 10): OwnPost[] {
    return this.db
      .prepare<[number, number], OwnPostRow>(
        `SELECT id, channel, title, content, created_at FROM own_posts
         WHERE created_at >= ? ORDER BY created_at DESC LIMIT ?`,
      )
      .all(since, limit)
      .map(toOwnPost);
  }

  ownPostTitles(limit = 10): string[] {
    return this.db
      .prepare<[number], { title: string }>(
        "SELECT title FROM own_posts ORDER BY created_at DESC LIMIT ?",
      )
      .all(limit)
      .map((row) => row.title);
  }

  saveOwnComment(comment: Pick<Comment, "id" | "postId" | "parentId" | "content">): void {
    this.db
      .prepare(
        `INSERT OR IGNORE INTO own_comments (id, post_id, parent_id, content, created_at)
         VALUES (?, ?, ?, ?, ?)`,
      )
      .run(comment.id, comment.postId, comment.parentId, comment.content, Date.now());
  }

  isOwnComment(commentId: string): boolean {
    return this.db.prepare("SELECT 1 FROM own_comments WHERE id = ?").get(commentId) !== undefined;
  }

  // ── Zero engagement ──

  /** Flags an own post once. Returns true when the flag was newly set. */
  flagZeroEngagement(postId: string): boolean {
    return (
      this.db
        .prepare(
          "UPDATE own_posts SET zero_engagement_at = ? WHERE id = ? AND zero_engagement_at IS NULL",
        )
        .run(Date.now(), postId).changes > 0
    );
  }

  pendingZeroEngagement(): number {
    const row = this.db
      .prepare<[], CountRow>(
        `SELECT COUNT(*) AS n FROM own_posts
         WHERE zero_engagement_at IS NOT NULL AND reviewed_at IS NULL`,
      )
      .get();
    return row?.n ?? 0;
  }

  markZeroEngagementReviewed(): number {
    return this.db
      .prepare(
        `UPDATE own_posts SET reviewed_at = ?
         WHERE zero_engagement_at IS NOT NULL AND reviewed_at IS NULL`,
      )
      .run(Date.now()).changes;
  }

  // ── Seen comments ──

  seenCommentIds(postId: string): Set<string> {
    const rows = this.db
      .prepare<[string], CommentIdRow>("SELECT comment_id FROM seen_comments WHERE post_id = ?")
      .all(postId);
    return new Set(rows.map((row) => row.comment_id));
  }

  /** Records a comment as seen. The replied flag only ever moves from false to true. */
  markCommentSeen(commentId: string, postId: string, replied: boolean): void {
    this.db
      .prepare(
        `INSERT INTO seen_comments (comment_id, post_id, replied, seen_at) VALUES (?, ?, ?, ?)
         ON CONFLICT(comment_id) DO UPDATE SET replied = MAX(seen_comments.replied, excluded.replied)`,
      )
      .run(commentId, postId, replied ? 1 : 0, Date.now());
  }

  isCommentReplied(commentId: string): boolean {
    const row = this.db
      .prepare<[string], { replied: number }>("SELECT replied FROM seen_comments WHERE comment_id = ?")
      .get(commentId);
    return row?.replied === 1;
  }

  // ── Direct messages ──

  upsertConversation(id: string, otherParty: string): void {
    const now = Date.now();
    this.db
      .prepare(
        `INSERT INTO dm_conversations (id, other_party, needs_human, created_at, updated_at)
         VALUES (?, ?, 0, ?, ?)
         ON CONFLICT(id) DO UPDATE SET other_party = excluded.other_party`,
      )
      .run(id, otherParty, now, now);
  }

  getConversation(id: string): DmConversation | null {
    const row = this.db
      .prepare<[string], ConversationRow>("SELECT * FROM dm_conversations WHERE id = ?")
      .get(id);
    return row ? toConversation(row) : null;
  }

  listConversations(): DmConversation[] {
    return this.db
      .prepare<[], ConversationRow>("SELECT * FROM dm_conversations ORDER BY updated_at DESC")
      .all()
      .map(toConversation);
  }

  /**
   * Moves the watermark to `messageId`. Refused when the stored watermark is
   * newer than `messageAt`, so the watermark never moves backward.
   */
  advanceWatermark(id: string, messageId: string, messageAt: number | null): boolean {
    const result = this.db
      .prepare(
        `UPDATE dm_conversations
         SET watermark_id = ?, watermark_at = COALESCE(?, watermark_at), updated_at = ?
         WHERE id = ?
           AND (watermark_id IS NULL OR watermark_id <> ?)
           AND (? IS NULL OR watermark_at IS NULL OR ? >= watermark_at)`,
      )
      .run(messageId, messageAt, Date.now(), id, messageId, messageAt, messageAt);
    return result.changes > 0;
  }

  setNeedsHuman(id: string, needsHuman: boolean): void {
    this.db
      .prepare("UPDATE dm_conversations SET needs_human = ?, updated_at = ? WHERE id = ?")
      .run(needsHuman ? 1 : 0, Date.now(), id);
  }

  // ── Stats ──

  getStats(): AgentStats {
    const now = Date.now();
    const dayStart = now - (now % DAY_MS);
    const count = (sql: string, ...params: number[]): number =>
      this.db.prepare<number[], CountRow>(sql).get(...params)?.n ?? 0;

    const last = this.db
      .prepare<[], LastPostRow>("SELECT MAX(created_at) AS last FROM own_posts")
      .get();
    const lastPostAt = last?.last ?? null;

    return {
      totalPosts: count("SELECT COUNT(*) AS n FROM own_posts"),
      commentsToday: count("SELECT COUNT(*) AS n FROM own_comments WHERE created_at >= ?", dayStart),
      seenPosts: count("SELECT COUNT(*) AS n FROM seen_posts"),
      pendingTasks: count("SELECT COUNT(*) AS n FROM tasks WHERE status = 'pending'"),
      unrepliedComments: count("SELECT COUNT(*) AS n FROM seen_comments WHERE replied = 0"),
      lastPostAt,
      hoursSinceLastPost:
        lastPostAt === null ? null : Math.round(((now - lastPostAt) / HOUR_MS) * 10) / 10,
    };
  }
}
