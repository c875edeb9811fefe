import type { Brain } from "../agent/brain.js";
import type { HeartbeatConfig, ReflectionConfig } from "../config/types.js";
import type { EventSink } from "../events/types.js";
import type { Logger } from "../logging/logger.js";
import type { EpisodicMemory } from "../memory/episodic.js";
import { DailyLimitError } from "../social/errors.js";
import type { OwnPost, SocialStore } from "../social/store.js";
import type { Comment, ContentService, DmConversationSummary, DmMessage } from "../social/types.js";

export interface ObligationsDeps {
  client: ContentService;
  social: SocialStore;
  brain: Brain;
  memory: EpisodicMemory;
  events: EventSink;
  heartbeat: HeartbeatConfig;
  reflection: ReflectionConfig;
  logger: Logger;
  agentName: () => string;
}

export interface DmSummary {
  approved: number;
  replied: number;
  escalated: number;
}

interface PendingReply {
  post: OwnPost;
  comment: Comment;
  thread: Comment[];
}

const HOUR_MS = 3_600_000;
const OWN_POST_SCAN_LIMIT = 10;
const DM_CONTEXT_MESSAGES = 10;

/** Ancestors of `target`, root first, found by walking parent links. */
export function buildThread(target: Comment, all: Comment[]): Comment[] {
  const byId = new Map(all.map((c) => [c.id, c]));
  const thread: Comment[] = [];
  const visited = new Set<string>([target.id]);
  let current = target;
  while (current.parentId) {
    const parent = byId.get(current.parentId);
    if (!parent || visited.has(parent.id)) break;
    visited.add(parent.id);
    thread.push(parent);
    current = parent;
  }
  return thread.reverse();
}

/** Messages after the watermark, or all of them when the watermark is unknown. */
export function messagesAfter(messages: DmMessage[], watermarkId: string | null): DmMessage[] {
  if (!watermarkId) return messages;
  const index = messages.findIndex((m) => m.id === watermarkId);
  return index === -1 ? messages : messages.slice(index + 1);
}

/**
 * Work owed to others before the agent acts on its own: replies to comments
 * on recent own posts, then direct messages.
 */
export class Obligations {
  private readonly client: ContentService;
  private readonly social: SocialStore;
  private readonly brain: Brain;
  private readonly memory: EpisodicMemory;
  private readonly events: EventSink;
  private readonly heartbeat: HeartbeatConfig;
  private readonly reflection: ReflectionConfig;
  private readonly logger: Logger;
  private readonly agentName: () => string;

  constructor(deps: ObligationsDeps) {
    this.client = deps.client;
    this.social = deps.social;
    this.brain = deps.brain;
    this.memory = deps.memory;
    this.events = deps.events;
    this.heartbeat = deps.heartbeat;
    this.reflection = deps.reflection;
    this.logger = deps.logger;
    this.agentName = deps.agentName;
  }

  // ── Comment replies ──

  async replyToComments(): Promise<number> {
    const self = this.agentName().toLowerCase();
    if (!self) return 0;

    const now = Date.now();
    const since = now - this.heartbeat.ownPostWindowHours * HOUR_MS;
    const posts = this.social.recentOwnPosts(since, OWN_POST_SCAN_LIMIT);
    const pending: PendingReply[] = [];

    for (const post of posts) {
      let comments: Comment[];
      try {
        comments = await this.client.getComments(post.id, "new");
      } catch (err) {
        this.logger.warn({ err, postId: post.id }, "Could not fetch comments for own post");
        continue;
      }

      if (
        comments.length === 0 &&
        now - post.createdAt >= this.reflection.zeroEngagementAfterHours * HOUR_MS &&
        this.social.flagZeroEngagement(post.id)
      ) {
        this.logger.info({ postId: post.id, title: post.title }, "Own post drew no engagement");
      }

      const seen = this.social.seenCommentIds(post.id);
      const isSelf = (c: Comment): boolean =>
        c.author.toLowerCase() === self || this.social.isOwnComment(c.id);

      for (const comment of comments) {
        if (seen.has(comment.id)) continue;
        if (isSelf(comment)) {
          this.social.markCommentSeen(comment.id, post.id, true);
          continue;
        }
        const parent = comment.parentId ? comments.find((c) => c.id === comment.parentId) : undefined;
        const eligible = comment.parentId === null || (parent !== undefined && isSelf(parent));
        if (eligible) {
          // Left unmarked until answered.
          pending.push({ post, comment, thread: buildThread(comment, comments) });
        } else {
          this.social.markCommentSeen(comment.id, post.id, false);
        }
      }
    }

    pending.sort((a, b) => (a.comment.createdAt ?? 0) - (b.comment.createdAt ?? 0));

    let sent = 0;
    for (const { post, comment, thread } of pending.slice(0, this.heartbeat.maxRepliesPerTick)) {
      try {
        const text = await this.brain.generateReply(post, comment, thread);
        if (!text) {
          this.logger.warn({ commentId: comment.id }, "Empty reply generated, comment left unanswered");
          this.social.markCommentSeen(comment.id, post.id, false);
          continue;
        }
        const reply = await this.client.createComment(post.id, text, comment.id);
        this.social.saveOwnComment(reply);
        this.social.markCommentSeen(comment.id, post.id, true);
        sent++;

        await this.client.upvoteComment(comment.id).catch((err: unknown) => {
          this.logger.debug({ err, commentId: comment.id }, "Upvote after reply failed");
        });

        await this.memory.remember(
          "reply",
          `Replied to ${comment.author}'s comment on '${post.title}': ${text.slice(0, 200)}`,
          { postId: post.id, commentId: comment.id, author: comment.author },
        );
        this.events.emit("reply_sent", {
          postId: post.id,
          commentId: comment.id,
          to: comment.author,
          content: text.slice(0, 300),
        });
        this.logger.info({ postId: post.id, to: comment.author }, "Reply sent");
      } catch (err) {
        if (err instanceof DailyLimitError) {
          this.logger.warn({ limit: err.limit }, "Daily comment limit reached, no more replies");
          this.events.emit("action_blocked", { action: "reply", reason: err.message });
          break;
        }
        this.logger.error({ err, commentId: comment.id }, "Reply failed");
      }
    }

    return sent;
  }

  // ── Direct messages ──

  async handleDms(): Promise<DmSummary> {
    const summary: DmSummary = { approved: 0, replied: 0, escalated: 0 };
    const activity = await this.client.dmCheck();
    if (!activity.hasActivity) {
      this.logger.debug("No DM activity");
      return summary;
    }

    try {
      for (const request of await this.client.dmRequests()) {
        try {
          await this.client.dmApprove(request.conversationId);
          this.social.upsertConversation(request.conversationId, request.from);
          this.events.emit("dm_approved", { otherParty: request.from });
          summary.approved++;
          this.logger.info({ from: request.from }, "DM request approved");
        } catch (err) {
          this.logger.error({ err, from: request.from }, "DM approval failed");
        }
      }
    } catch (err) {
      this.logger.warn({ err }, "Could not list DM requests");
    }

    const conversations = await this.client.dmConversations();
    for (const conversation of conversations) {
      if (conversation.unreadCount <= 0) continue;
      const outcome = await this.handleConversation(conversation);
      if (outcome === "replied") summary.replied++;
      if (outcome === "escalated") summary.escalated++;
    }
    return summary;
  }

  private async handleConversation(
    conversation: DmConversationSummary,
  ): Promise<"replied" | "escalated" | "none"> {
    const { id, otherParty, unreadCount } = conversation;
    this.social.upsertConversation(id, otherParty);
    const stored = this.social.getConversation(id);

    if (stored?.needsHuman) {
      this.events.emit("dm_needs_human", { conversationId: id, otherParty, unreadCount });
      return "none";
    }

    let messages: DmMessage[];
    try {
      messages = await this.client.dmMessages(id);
    } catch (err) {
      this.logger.warn({ err, conversationId: id }, "Could not fetch DM messages");
      return "none";
    }
    const last = messages.at(-1);
    if (!last) return "none";

    const self = this.agentName().toLowerCase();
    const incoming = messagesAfter(messages, stored?.watermarkId ?? null).filter(
      (m) => m.sender.toLowerCase() !== self,
    );

    let outcome: "replied" | "escalated" | "none" = "none";
    if (incoming.length > 0) {
      try {
        const draft = await this.brain.generateDmReply(otherParty, messages.slice(-DM_CONTEXT_MESSAGES));
        if (draft.needsHumanInput) {
          this.social.setNeedsHuman(id, true);
          this.events.emit("dm_needs_human", { conversationId: id, otherParty, unreadCount });
          this.logger.info({ conversationId: id, otherParty }, "DM escalated to operator");
          outcome = "escalated";
        } else if (draft.content) {
          await this.client.dmSend(id, draft.content);
          this.events.emit("dm_replied", {
            conversationId: id,
            otherParty,
            content: draft.content.slice(0, 300),
          });
          await this.memory.remember("dm", `DM with ${otherParty}: ${draft.content.slice(0, 200)}`, {
            conversationId: id,
            otherParty,
          });
          this.logger.info({ conversationId: id, otherParty }, "DM reply sent");
          outcome = "replied";
        } else {
          this.logger.warn({ conversationId: id }, "Empty DM reply generated");
        }
      } catch (err) {
        this.logger.error({ err, conversationId: id }, "DM conversation failed");
      }
    }

    // Advances whether or not a reply went out.
    this.social.advanceWatermark(id, last.id, last.createdAt);
    return outcome;
  }
}
