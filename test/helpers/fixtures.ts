import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import { parseConfig } from "../../src/config/schema.js";
import type { AgentConfig } from "../../src/config/types.js";
import { buildAgent, type Agent } from "../../src/gateway/agent.js";
import type { Logger } from "../../src/logging/logger.js";
import type { InferOptions, Oracle } from "../../src/oracle/types.js";
import type { Registrar } from "../../src/social/registration.js";
import type {
  Comment,
  CommentSort,
  ContentService,
  DmActivity,
  DmConversationSummary,
  DmMessage,
  DmRequest,
  FeedSort,
  Post,
  Registration,
} from "../../src/social/types.js";
import { AgentDB } from "../../src/store/db.js";

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export interface TempDb {
  dir: string;
  db: AgentDB;
  cleanup: () => void;
}

export function makeTempDb(prefix = "tidepool-test-"): TempDb {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  const db = new AgentDB(dir);
  return {
    dir,
    db,
    cleanup: () => {
      db.close();
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

export interface TestAgent {
  agent: Agent;
  oracle: ScriptedOracle;
  client: FakeContentService;
  cleanup: () => Promise<void>;
}

/** A fully wired agent on a temp directory, with scripted oracle and platform. */
export function makeTestAgent(raw: Record<string, unknown> = {}, random?: () => number): TestAgent {
  const dir = mkdtempSync(join(tmpdir(), "tidepool-agent-"));
  const oracle = new ScriptedOracle();
  const client = new FakeContentService();
  const agent = buildAgent({ config: makeConfig(raw), logger: silentLogger(), stateDir: dir, oracle, client, random });
  return {
    agent,
    oracle,
    client,
    cleanup: async () => {
      await agent.worker.stop();
      await agent.scheduler.stop();
      agent.db.close();
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

export function makeConfig(raw: Record<string, unknown> = {}): AgentConfig {
  return parseConfig(raw);
}

export function makePost(overrides: Partial<Post> = {}): Post {
  return {
    id: "post-1",
    author: "other_agent",
    channel: "general",
    title: "A post about memory",
    content: "How do agents remember things?",
    upvotes: 0,
    commentCount: 0,
    createdAt: 1_700_000_000_000,
    ...overrides,
  };
}

export function makeComment(overrides: Partial<Comment> = {}): Comment {
  return {
    id: "comment-1",
    postId: "post-1",
    author: "other_agent",
    content: "Interesting thought",
    parentId: null,
    upvotes: 0,
    createdAt: 1_700_000_000_000,
    ...overrides,
  };
}

// ── Oracle ──

export interface OracleCall {
  prompt: string;
  maxOutput: number;
  label: string;
  system: string | undefined;
}

/** A pending promise holds the call open until the test settles it. */
type ScriptedReply = string | Error | Promise<string>;

/**
 * Oracle stand-in routed by call label. Queued replies are used first, then
 * the label's standing reply, then the fallback.
 */
export class ScriptedOracle implements Oracle {
  readonly calls: OracleCall[] = [];
  private readonly queues = new Map<string, ScriptedReply[]>();
  private readonly standing = new Map<string, ScriptedReply>();

  constructor(private readonly fallback: ScriptedReply = "5") {}

  /** Queues one-shot replies for `label`. */
  on(label: string, ...replies: ScriptedReply[]): this {
    const queue = this.queues.get(label) ?? [];
    queue.push(...replies);
    this.queues.set(label, queue);
    return this;
  }

  /** Reply used for every call with `label` once its queue is empty. */
  always(label: string, reply: ScriptedReply): this {
    this.standing.set(label, reply);
    return this;
  }

  async infer(prompt: string, maxOutput: number, options: InferOptions = {}): Promise<string> {
    const label = options.label ?? "default";
    this.calls.push({ prompt, maxOutput, label, system: options.system });
    const reply = this.queues.get(label)?.shift() ?? this.standing.get(label) ?? this.fallback;
    if (reply instanceof Error) throw reply;
    return reply;
  }

  callsFor(label: string): OracleCall[] {
    return this.calls.filter((c) => c.label === label);
  }
}

// ── Platform ──

export interface SentComment {
  postId: string;
  body: string;
  parentId: string | undefined;
}

/** In-memory content service that records every write. */
export class FakeContentService implements ContentService, Registrar {
  registered = true;
  apiKey: string | null = null;

  feed: Post[] = [];
  comments = new Map<string, Comment[]>();
  dmActivity = false;
  requests: DmRequest[] = [];
  conversations: DmConversationSummary[] = [];
  messages = new Map<string, DmMessage[]>();
  registrations: Array<Registration | Error> = [];

  readonly createdPosts: Post[] = [];
  readonly sentComments: SentComment[] = [];
  readonly upvotedPosts: string[] = [];
  readonly upvotedComments: string[] = [];
  readonly approved: string[] = [];
  readonly dmSent: Array<{ conversationId: string; body: string }> = [];
  readonly registerCalls: Array<{ name: string; description: string }> = [];

  /** Errors thrown by the next call of the named method. */
  readonly failures = new Map<string, Error>();

  private nextId = 1;

  private maybeFail(method: string): void {
    const err = this.failures.get(method);
    if (err) {
      this.failures.delete(method);
      throw err;
    }
  }

  isRegistered(): boolean {
    return this.registered;
  }

  setApiKey(key: string): void {
    this.apiKey = key;
    this.registered = true;
  }

  async register(name: string, description: string): Promise<Registration> {
    this.registerCalls.push({ name, description });
    const next = this.registrations.shift();
    if (next instanceof Error) throw next;
    return next ?? { name, apiKey: "test-key", claimUrl: "", verificationCode: "" };
  }

  async getFeed(_sort: FeedSort, limit: number): Promise<Post[]> {
    this.maybeFail("getFeed");
    return this.feed.slice(0, limit);
  }

  async createPost(channel: string, title: string, body: string): Promise<Post> {
    this.maybeFail("createPost");
    const post = makePost({
      id: `new-post-${this.nextId++}`,
      author: "me",
      channel,
      title,
      content: body,
    });
    this.createdPosts.push(post);
    return post;
  }

  async createComment(postId: string, body: string, parentId?: string): Promise<Comment> {
    this.maybeFail("createComment");
    this.sentComments.push({ postId, body, parentId });
    return makeComment({
      id: `new-comment-${this.nextId++}`,
      postId,
      author: "me",
      content: body,
      parentId: parentId ?? null,
    });
  }

  async upvotePost(postId: string): Promise<void> {
    this.maybeFail("upvotePost");
    this.upvotedPosts.push(postId);
  }

  async upvoteComment(commentId: string): Promise<void> {
    this.maybeFail("upvoteComment");
    this.upvotedComments.push(commentId);
  }

  async getComments(postId: string, _sort: CommentSort): Promise<Comment[]> {
    this.maybeFail("getComments");
    return this.comments.get(postId) ?? [];
  }

  async dmCheck(): Promise<DmActivity> {
    this.maybeFail("dmCheck");
    return { hasActivity: this.dmActivity };
  }

  async dmRequests(): Promise<DmRequest[]> {
    this.maybeFail("dmRequests");
    return this.requests;
  }

  async dmApprove(conversationId: string): Promise<void> {
    this.maybeFail("dmApprove");
    this.approved.push(conversationId);
    this.requests = this.requests.filter((r) => r.conversationId !== conversationId);
  }

  async dmConversations(): Promise<DmConversationSummary[]> {
    this.maybeFail("dmConversations");
    return this.conversations;
  }

  async dmMessages(conversationId: string): Promise<DmMessage[]> {
    this.maybeFail("dmMessages");
    return this.messages.get(conversationId) ?? [];
  }

  async dmSend(conversationId: string, body: string): Promise<void> {
    this.maybeFail("dmSend");
    this.dmSent.push({ conversationId, body });
  }
}
