import type { Brain } from "../agent/brain.js";
import { describeAction, type ActionDecision, type ActionKind } from "../agent/types.js";
import type { HeartbeatConfig } from "../config/types.js";
import type { EventSink } from "../events/types.js";
import type { Logger } from "../logging/logger.js";
import type { EpisodicMemory } from "../memory/episodic.js";
import type { ActionShield } from "../safety/shield.js";
import { DailyLimitError } from "../social/errors.js";
import type { SocialStore } from "../social/store.js";
import type { ContentService, Post } from "../social/types.js";
import type { AuditLog } from "../store/audit.js";

export type ActionOutcome = ActionKind | "blocked";

export interface AutonomousPhaseDeps {
  client: ContentService;
  social: SocialStore;
  brain: Brain;
  shield: ActionShield;
  memory: EpisodicMemory;
  audit: AuditLog;
  events: EventSink;
  config: HeartbeatConfig;
  logger: Logger;
}

const OWN_TITLE_LIMIT = 10;

/** Reads the feed, lets the brain pick one action, gates it through the shield and carries it out. */
export class AutonomousPhase {
  private readonly client: ContentService;
  private readonly social: SocialStore;
  private readonly brain: Brain;
  private readonly shield: ActionShield;
  private readonly memory: EpisodicMemory;
  private readonly audit: AuditLog;
  private readonly events: EventSink;
  private readonly config: HeartbeatConfig;
  private readonly logger: Logger;

  constructor(deps: AutonomousPhaseDeps) {
    this.client = deps.client;
    this.social = deps.social;
    this.brain = deps.brain;
    this.shield = deps.shield;
    this.memory = deps.memory;
    this.audit = deps.audit;
    this.events = deps.events;
    this.config = deps.config;
    this.logger = deps.logger;
  }

  async run(): Promise<ActionOutcome> {
    const stats = this.social.getStats();
    const feed = await this.client.getFeed("new", this.config.feedLimit);
    for (const post of feed) this.social.markPostSeen(post);

    let decision = await this.brain.decideAction(feed, stats);
    this.logger.info({ action: decision.action, reason: decision.reason }, "Heartbeat decision");

    const verdict = await this.shield.validate(decision, this.brain.goals());
    if (!verdict.safe) {
      this.logger.warn({ action: decision.action, reason: verdict.reason }, "Action blocked by shield");
      this.audit.record("safety", { action: describeAction(decision), reason: verdict.reason });
      await this.memory.remember(
        "safety_block",
        `Action '${describeAction(decision)}' blocked: ${verdict.reason}`,
        { action: decision.action, reason: verdict.reason },
      );
      this.events.emit("action_blocked", { action: decision.action, reason: verdict.reason });
      decision = { action: "skip", reason: `Blocked: ${verdict.reason}` };
    }

    try {
      return await this.execute(decision, feed);
    } catch (err) {
      if (err instanceof DailyLimitError) {
        this.logger.warn({ action: decision.action, limit: err.limit }, "Daily limit reached");
        await this.memory.remember("blocked_action", `${describeAction(decision)} not done: ${err.message}`, {
          action: decision.action,
        });
        this.events.emit("action_blocked", { action: decision.action, reason: err.message });
        return "blocked";
      }
      throw err;
    }
  }

  private async execute(decision: ActionDecision, feed: Post[]): Promise<ActionOutcome> {
    switch (decision.action) {
      case "post":
        return this.post(feed, decision.topic);
      case "comment":
        return this.comment(feed, decision.postId);
      case "upvote":
        return this.upvote(feed, decision.postId);
      case "skip":
        await this.memory.remember("skip", `Skipped this heartbeat: ${decision.reason || "no reason given"}`);
        return "skip";
    }
  }

  private async post(feed: Post[], topic?: string): Promise<ActionOutcome> {
    const draft = await this.brain.generatePost(feed, this.social.ownPostTitles(OWN_TITLE_LIMIT), topic);
    if (!draft) {
      this.logger.warn("No post draft produced");
      return "skip";
    }
    const post = await this.client.createPost(draft.channel, draft.title, draft.content);
    this.social.saveOwnPost(post);
    await this.memory.remember(
      "post",
      `Posted '${post.title}' in ${post.channel}: ${post.content.slice(0, 200)}`,
      { postId: post.id, channel: post.channel },
    );
    this.events.emit("post_created", { postId: post.id, title: post.title, channel: post.channel });
    this.logger.info({ postId: post.id, channel: post.channel }, "Post created");
    return "post";
  }

  private async comment(feed: Post[], postId: string): Promise<ActionOutcome> {
    const target = feed.find((p) => p.id === postId);
    if (!target) {
      this.logger.warn({ postId }, "Comment target not in feed");
      return "skip";
    }
    const existing = await this.client.getComments(postId, "top");
    const text = await this.brain.generateComment(target, existing);
    if (!text) {
      this.logger.warn({ postId }, "Empty comment generated");
      return "skip";
    }
    const comment = await this.client.createComment(postId, text);
    this.social.saveOwnComment(comment);
    this.social.markPostInteracted(postId);

    await this.client.upvotePost(postId).catch((err: unknown) => {
      this.logger.debug({ err, postId }, "Upvote after comment failed");
    });

    await this.memory.remember(
      "comment",
      `Commented on '${target.title}' by ${target.author}: ${text.slice(0, 200)}`,
      { postId, author: target.author },
    );
    this.events.emit("comment_created", { postId, postTitle: target.title, content: text.slice(0, 300) });
    this.logger.info({ postId }, "Comment created");
    return "comment";
  }

  private async upvote(feed: Post[], postId: string): Promise<ActionOutcome> {
    await this.client.upvotePost(postId);
    this.social.markPostInteracted(postId);
    const title = feed.find((p) => p.id === postId)?.title ?? "";
    await this.memory.remember("upvote", `Upvoted '${title || postId}'`, { postId });
    this.events.emit("upvoted", { postId, title });
    this.logger.info({ postId }, "Post upvoted");
    return "upvote";
  }
}
