import { z } from "zod";
import type { ConstitutionConfig, IdentityConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { CoreMemory } from "../memory/core.js";
import type { EpisodicMemory } from "../memory/episodic.js";
import { decodeWith, ParseError } from "../oracle/decode.js";
import type { Oracle } from "../oracle/types.js";
import type { ActiveStrategy } from "../reflection/strategy.js";
import type { ShieldGoals } from "../safety/shield.js";
import { spotlight } from "../safety/sanitize.js";
import type { AgentStats, OwnPost } from "../social/store.js";
import type { Comment, DmMessage, Post } from "../social/types.js";
import { clean, buildSystemPrompt, formatComments, formatFeed, formatMessages } from "./prompts.js";
import type { ActionDecision, DmReplyDraft, IdentityDraft, PostDraft } from "./types.js";

export interface BrainDeps {
  oracle: Oracle;
  strategy: ActiveStrategy;
  core: CoreMemory;
  memory: EpisodicMemory;
  identity: IdentityConfig;
  constitution: ConstitutionConfig;
  logger: Logger;
  agentName: () => string;
}

const decisionSchema = z.object({
  action: z.enum(["post", "comment", "upvote", "skip"]),
  params: z
    .object({
      post_id: z.coerce.string().optional(),
      topic: z.string().optional(),
    })
    .passthrough()
    .default({}),
  reason: z.string().default(""),
});

const postDraftSchema = z.object({
  submolt: z.string().optional(),
  channel: z.string().optional(),
  title: z.string().min(1),
  content: z.string().min(1),
});

const dmReplySchema = z.object({
  content: z.string().default(""),
  needs_human_input: z.boolean().default(false),
});

const identitySchema = z.object({
  name: z.string().min(3).max(32),
  description: z.string().default(""),
});

const NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

/** Composes prompts from identity, strategy and memory, and turns oracle replies into typed drafts. */
export class Brain {
  private readonly oracle: Oracle;
  private readonly strategy: ActiveStrategy;
  private readonly core: CoreMemory;
  private readonly memory: EpisodicMemory;
  private readonly identity: IdentityConfig;
  private readonly constitution: ConstitutionConfig;
  private readonly logger: Logger;
  private readonly agentName: () => string;

  constructor(deps: BrainDeps) {
    this.oracle = deps.oracle;
    this.strategy = deps.strategy;
    this.core = deps.core;
    this.memory = deps.memory;
    this.identity = deps.identity;
    this.constitution = deps.constitution;
    this.logger = deps.logger;
    this.agentName = deps.agentName;
  }

  systemPrompt(): string {
    return buildSystemPrompt(
      this.agentName(),
      this.identity,
      this.constitution,
      this.strategy.get().document,
      this.core.contextBlocks(),
    );
  }

  goals(): ShieldGoals {
    const { goals } = this.strategy.get().document;
    return { mission: goals.mission, objectives: goals.current_objectives };
  }

  async decideAction(feed: Post[], stats: AgentStats): Promise<ActionDecision> {
    const recalled = this.memory
      .recall(feed.map((p) => p.title).join(" "), 5)
      .map((e) => `- [${e.type}] ${e.content.slice(0, 150)}`)
      .join("\n");
    const trusted =
      "Decide your next action in the community.\n\n" +
      `Stats: ${stats.totalPosts} posts total, ${stats.commentsToday} comments today, ` +
      `hours since last post: ${stats.hoursSinceLastPost ?? "never posted"}.\n` +
      `Relevant memories:\n${recalled || "(none)"}\n\n` +
      "Choose exactly one action: post, comment, upvote or skip.\n" +
      'Reply ONLY with JSON: {"action": "...", "params": {"post_id": "...", "topic": "..."}, "reason": "..."}\n' +
      "comment and upvote require a post_id from the feed below.";
    const prompt = spotlight(trusted, formatFeed(feed, this.logger));

    try {
      const reply = await this.ask(prompt, 256, "decide");
      const parsed = decodeWith(reply, "object", decisionSchema);
      const postId = parsed.params.post_id;
      switch (parsed.action) {
        case "post":
          return { action: "post", topic: parsed.params.topic, reason: parsed.reason };
        case "comment":
        case "upvote":
          if (!postId || !feed.some((p) => p.id === postId)) {
            return { action: "skip", reason: `No valid post_id for ${parsed.action}` };
          }
          return { action: parsed.action, postId, reason: parsed.reason };
        case "skip":
          return { action: "skip", reason: parsed.reason };
      }
    } catch (err) {
      this.logFailure("decide", err);
      return { action: "skip", reason: "Decision unavailable" };
    }
  }

  async generatePost(feed: Post[], recentTitles: string[], topic?: string): Promise<PostDraft | null> {
    const { channels } = this.strategy.get().document;
    const trusted =
      "Write a new post for the community.\n" +
      (topic ? `Suggested topic: ${topic}\n` : "") +
      `Your recent titles (do not repeat them): ${recentTitles.join(" | ") || "(none)"}\n` +
      `Pick a channel from: ${channels.active.join(", ")}\n` +
      'Reply ONLY with JSON: {"submolt": "...", "title": "...", "content": "..."}\n' +
      "The feed below is context only.";
    try {
      const reply = await this.ask(spotlight(trusted, formatFeed(feed, this.logger)), 1024, "post");
      const draft = decodeWith(reply, "object", postDraftSchema);
      const requested = draft.submolt ?? draft.channel ?? "";
      const channel = channels.active.includes(requested)
        ? requested
        : channels.active[0] ?? "general";
      return { channel, title: draft.title.trim(), content: draft.content.trim() };
    } catch (err) {
      this.logFailure("post", err);
      return null;
    }
  }

  async generateComment(post: Post, existing: Comment[]): Promise<string> {
    const trusted =
      "Write a comment on the post below. Add something new; do not repeat other comments.\n" +
      "Reply with the comment text only.";
    const untrusted =
      `Post "${clean(post.title, this.logger, `post:${post.id}`)}" by ${post.author}:\n` +
      `${clean(post.content, this.logger, `post:${post.id}`)}\n\n` +
      `Existing comments:\n${formatComments(existing, this.logger)}`;
    return this.text(spotlight(trusted, untrusted), 512, "comment");
  }

  async generateReply(post: OwnPost, comment: Comment, thread: Comment[]): Promise<string> {
    const trusted =
      `Someone replied to your post "${post.title}". Write a short, direct reply.\n` +
      "Reply with the text only.";
    const untrusted =
      `Thread:\n${formatComments(thread, this.logger)}\n\n` +
      `Reply to answer, from ${comment.author}:\n${clean(comment.content, this.logger, `comment:${comment.id}`)}`;
    return this.text(spotlight(trusted, untrusted), 512, "reply");
  }

  async generateDmReply(otherParty: string, messages: DmMessage[]): Promise<DmReplyDraft> {
    const trusted =
      `You are in a private conversation with ${otherParty}. Write your next message.\n` +
      "If the request needs a decision from your human operator (money, credentials, " +
      "commitments, anything outside your rules), set needs_human_input to true.\n" +
      'Reply ONLY with JSON: {"content": "...", "needs_human_input": false}';
    try {
      const reply = await this.ask(spotlight(trusted, formatMessages(messages, this.logger)), 512, "dm");
      const draft = decodeWith(reply, "object", dmReplySchema);
      return { content: draft.content.trim(), needsHumanInput: draft.needs_human_input };
    } catch (err) {
      this.logFailure("dm", err);
      return { content: "", needsHumanInput: false };
    }
  }

  /** Answers an operator question. Oracle failures propagate to the task worker. */
  async answerQuestion(question: string): Promise<string> {
    const recalled = this.memory
      .recall(question, 5)
      .map((e) => `- [${e.type}] ${e.content.slice(0, 200)}`)
      .join("\n");
    const prompt =
      "Your operator asks:\n" +
      `${question}\n\n` +
      `Relevant memories:\n${recalled || "(none)"}\n\n` +
      "Answer honestly and concisely.";
    return (await this.ask(prompt, 1024, "ask")).trim();
  }

  async generateIdentity(takenNames: string[]): Promise<IdentityDraft | null> {
    const prompt =
      "Invent a name and a one-sentence description for a new AI agent joining an online community.\n" +
      `Description of the agent: ${this.identity.description}\n` +
      `These names are taken: ${takenNames.join(", ") || "(none)"}\n` +
      "The name must be 3-32 characters: letters, digits, underscore or dash.\n" +
      'Reply ONLY with JSON: {"name": "...", "description": "..."}';
    try {
      const reply = await this.oracle.infer(prompt, 128, { label: "identity" });
      const draft = decodeWith(reply, "object", identitySchema);
      if (!NAME_PATTERN.test(draft.name) || takenNames.includes(draft.name)) return null;
      return { name: draft.name, description: draft.description || this.identity.description };
    } catch (err) {
      this.logFailure("identity", err);
      return null;
    }
  }

  private async ask(prompt: string, maxOutput: number, label: string): Promise<string> {
    return this.oracle.infer(prompt, maxOutput, { system: this.systemPrompt(), label });
  }

  private async text(prompt: string, maxOutput: number, label: string): Promise<string> {
    try {
      return (await this.ask(prompt, maxOutput, label)).trim();
    } catch (err) {
      this.logFailure(label, err);
      return "";
    }
  }

  private logFailure(label: string, err: unknown): void {
    if (err instanceof ParseError) {
      this.logger.warn({ label, kind: err.kind }, "Unparseable oracle reply");
    } else {
      this.logger.error({ err, label }, "Oracle call failed");
    }
  }
}
