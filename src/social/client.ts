import { z } from "zod";
import type { PlatformConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { isRecord } from "../utils/json.js";
import { NameTakenError, PlatformError, RateLimitError } from "./errors.js";
import { CooldownTracker, sleep, type Sleep } from "./rate-limiter.js";
import type {
  AgentProfile,
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
} from "./types.js";

// ── Wire schemas ──

const nameSchema = z
  .union([z.string(), z.object({ name: z.string() }).passthrough(), z.null()])
  .optional()
  .transform((v) => (typeof v === "string" ? v : v?.name ?? "unknown"));

const timestampSchema = z
  .union([z.string(), z.number(), z.null()])
  .optional()
  .transform((v) => {
    if (typeof v === "number") return v;
    if (!v) return null;
    const ms = Date.parse(v);
    return Number.isNaN(ms) ? null : ms;
  });

const postSchema = z
  .object({
    id: z.coerce.string(),
    author: nameSchema,
    submolt: nameSchema,
    title: z.string().default(""),
    content: z.string().nullish().transform((v) => v ?? ""),
    upvotes: z.number().default(0),
    comment_count: z.number().default(0),
    created_at: timestampSchema,
  })
  .transform(
    (p): Post => ({
      id: p.id,
      author: p.author,
      channel: p.submolt,
      title: p.title,
      content: p.content,
      upvotes: p.upvotes,
      commentCount: p.comment_count,
      createdAt: p.created_at,
    }),
  );

const commentSchema = z
  .object({
    id: z.coerce.string(),
    post_id: z.coerce.string().optional(),
    author: nameSchema,
    content: z.string().default(""),
    parent_id: z.coerce.string().nullish(),
    upvotes: z.number().default(0),
    created_at: timestampSchema,
  })
  .transform(
    (c): Omit<Comment, "postId"> & { postId?: string } => ({
      id: c.id,
      postId: c.post_id,
      author: c.author,
      content: c.content,
      parentId: c.parent_id ?? null,
      upvotes: c.upvotes,
      createdAt: c.created_at,
    }),
  );

const dmRequestSchema = z
  .object({
    conversation_id: z.coerce.string().optional(),
    id: z.coerce.string().optional(),
    from: nameSchema,
    message: z.string().default(""),
  })
  .transform(
    (r): DmRequest => ({
      conversationId: r.conversation_id ?? r.id ?? "",
      from: r.from,
      message: r.message,
    }),
  );

const dmConversationSchema = z
  .object({
    conversation_id: z.coerce.string().optional(),
    id: z.coerce.string().optional(),
    with_agent: nameSchema,
    participant: nameSchema,
    unread_count: z.number().default(0),
  })
  .transform(
    (c): DmConversationSummary => ({
      id: c.conversation_id ?? c.id ?? "",
      otherParty: c.with_agent !== "unknown" ? c.with_agent : c.participant,
      unreadCount: c.unread_count,
    }),
  );

const dmMessageSchema = z
  .object({
    id: z.coerce.string(),
    sender: nameSchema,
    from: nameSchema,
    content: z.string().default(""),
    created_at: timestampSchema,
  })
  .transform(
    (m): DmMessage => ({
      id: m.id,
      sender: m.sender !== "unknown" ? m.sender : m.from,
      content: m.content,
      createdAt: m.created_at,
    }),
  );

const registrationSchema = z
  .object({
    name: z.string(),
    api_key: z.string(),
    claim_url: z.string().default(""),
    verification_code: z.string().default(""),
  })
  .transform(
    (r): Registration => ({
      name: r.name,
      apiKey: r.api_key,
      claimUrl: r.claim_url,
      verificationCode: r.verification_code,
    }),
  );

const profileSchema = z
  .object({
    name: z.string(),
    description: z.string().nullish().transform((v) => v ?? ""),
    karma: z.number().default(0),
  })
  .transform((a): AgentProfile => a);

/** Accepts a bare array or an envelope such as `{ posts: [...] }`. */
function listFrom(data: unknown, ...keys: string[]): unknown[] {
  if (Array.isArray(data)) return data;
  if (!isRecord(data)) return [];
  for (const key of [...keys, "items", "data"]) {
    const value = data[key];
    if (Array.isArray(value)) return value;
  }
  return [];
}

/** Unwraps `{ post: {...} }`-style envelopes. */
function entityFrom(data: unknown, key: string): unknown {
  if (isRecord(data) && isRecord(data[key])) return data[key];
  return data;
}

function parseRetryAfter(header: string | null): number {
  const seconds = Number.parseInt(header ?? "", 10);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : 60;
}

// ── Client ──

type HttpMethod = "GET" | "POST" | "PATCH" | "DELETE";

interface RequestOptions {
  query?: Record<string, string | number>;
  body?: Record<string, unknown>;
  auth?: boolean;
}

export interface PlatformClientDeps {
  config: PlatformConfig;
  logger: Logger;
  apiKey?: string | null;
  fetchImpl?: typeof fetch;
  sleep?: Sleep;
}

export class PlatformClient implements ContentService {
  private readonly config: PlatformConfig;
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;
  private readonly wait: Sleep;
  private readonly cooldowns: CooldownTracker;
  private apiKey: string | null;

  constructor(deps: PlatformClientDeps) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.fetchImpl = deps.fetchImpl ?? fetch;
    this.wait = deps.sleep ?? sleep;
    this.apiKey = deps.apiKey ?? deps.config.apiKey ?? null;
    this.cooldowns = new CooldownTracker(deps.config, deps.logger, this.wait);
  }

  isRegistered(): boolean {
    return this.apiKey !== null && this.apiKey.length > 0;
  }

  setApiKey(key: string): void {
    this.apiKey = key;
  }

  // ── Registration & profile ──

  async register(name: string, description: string): Promise<Registration> {
    const res = await this.send("POST", "/agents/register", {
      body: { name, description },
      auth: false,
    });
    if (res.status === 409) throw new NameTakenError(name);
    const data = await this.readBody("POST", "/agents/register", res);
    return registrationSchema.parse(entityFrom(data, "agent"));
  }

  async getMe(): Promise<AgentProfile> {
    const data = await this.request("GET", "/agents/me");
    return profileSchema.parse(entityFrom(data, "agent"));
  }

  async follow(agentName: string): Promise<void> {
    await this.request("POST", `/agents/${encodeURIComponent(agentName)}/follow`);
  }

  // ── Posts & comments ──

  async getFeed(sort: FeedSort, limit: number): Promise<Post[]> {
    const data = await this.request("GET", "/feed", { query: { sort, limit } });
    return listFrom(data, "posts").map((p) => postSchema.parse(p));
  }

  async search(query: string, limit = 10): Promise<Post[]> {
    const data = await this.request("GET", "/search", { query: { q: query, type: "posts", limit } });
    return listFrom(data, "posts", "results").map((p) => postSchema.parse(p));
  }

  async createPost(channel: string, title: string, body: string): Promise<Post> {
    await this.cooldowns.beforePost();
    const data = await this.request("POST", "/posts", {
      body: { submolt: channel, title, content: body },
    });
    return postSchema.parse(entityFrom(data, "post"));
  }

  async getComments(postId: string, sort: CommentSort): Promise<Comment[]> {
    const data = await this.request("GET", `/posts/${encodeURIComponent(postId)}/comments`, {
      query: { sort },
    });
    return listFrom(data, "comments").map((c) => ({ ...commentSchema.parse(c), postId }));
  }

  async createComment(postId: string, body: string, parentId?: string): Promise<Comment> {
    await this.cooldowns.beforeComment();
    const payload: Record<string, unknown> = { content: body };
    if (parentId) payload["parent_id"] = parentId;
    const data = await this.request("POST", `/posts/${encodeURIComponent(postId)}/comments`, {
      body: payload,
    });
    return { ...commentSchema.parse(entityFrom(data, "comment")), postId };
  }

  async upvotePost(postId: string): Promise<void> {
    await this.request("POST", `/posts/${encodeURIComponent(postId)}/upvote`);
  }

  async upvoteComment(commentId: string): Promise<void> {
    await this.request("POST", `/comments/${encodeURIComponent(commentId)}/upvote`);
  }

  // ── Direct messages ──

  async dmCheck(): Promise<DmActivity> {
    const data = await this.request("GET", "/agents/dm/check");
    return { hasActivity: isRecord(data) && data["has_activity"] === true };
  }

  async dmRequests(): Promise<DmRequest[]> {
    const data = await this.request("GET", "/agents/dm/requests");
    return listFrom(data, "requests").map((r) => dmRequestSchema.parse(r));
  }

  async dmApprove(conversationId: string): Promise<void> {
    await this.request("POST", `/agents/dm/requests/${encodeURIComponent(conversationId)}/approve`);
  }

  async dmConversations(): Promise<DmConversationSummary[]> {
    const data = await this.request("GET", "/agents/dm/conversations");
    return listFrom(data, "conversations").map((c) => dmConversationSchema.parse(c));
  }

  async dmMessages(conversationId: string): Promise<DmMessage[]> {
    const data = await this.request(
      "GET",
      `/agents/dm/conversations/${encodeURIComponent(conversationId)}`,
    );
    return listFrom(data, "messages").map((m) => dmMessageSchema.parse(m));
  }

  async dmSend(conversationId: string, body: string): Promise<void> {
    await this.request(
      "POST",
      `/agents/dm/conversations/${encodeURIComponent(conversationId)}/send`,
      { body: { message: body } },
    );
  }

  // ── Transport ──

  private async request(
    method: HttpMethod,
    path: string,
    opts: RequestOptions = {},
  ): Promise<unknown> {
    let res = await this.send(method, path, opts);
    if (res.status === 429) {
      const retryAfter = parseRetryAfter(res.headers.get("Retry-After"));
      this.logger.warn({ method, path, retryAfter }, "Rate limited, retrying once");
      await this.wait(retryAfter * 1000);
      res = await this.send(method, path, opts);
      if (res.status === 429) {
        throw new RateLimitError(
          `Rate limited on ${method} ${path}`,
          parseRetryAfter(res.headers.get("Retry-After")),
        );
      }
    }
    return this.readBody(method, path, res);
  }

  private async send(method: HttpMethod, path: string, opts: RequestOptions): Promise<Response> {
    const url = new URL(this.config.baseUrl.replace(/\/+$/, "") + path);
    for (const [key, value] of Object.entries(opts.query ?? {})) {
      url.searchParams.set(key, String(value));
    }
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (opts.auth !== false && this.apiKey) {
      headers["Authorization"] = `Bearer ${this.apiKey}`;
    }
    return this.fetchImpl(url, {
      method,
      headers,
      body: opts.body ? JSON.stringify(opts.body) : undefined,
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });
  }

  private async readBody(method: HttpMethod, path: string, res: Response): Promise<unknown> {
    if (!res.ok) {
      const detail = (await res.text()).slice(0, 200);
      throw new PlatformError(res.status, method, path, detail);
    }
    if (res.status === 204) return {};
    const text = await res.text();
    if (!text) return {};
    const data: unknown = JSON.parse(text);
    return data;
  }
}
