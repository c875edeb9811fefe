import { describe, it, expect, vi } from "vitest";
import { PlatformClient } from "../../src/social/client.js";
import { NameTakenError, PlatformError, RateLimitError } from "../../src/social/errors.js";
import { makeConfig, silentLogger } from "../helpers/fixtures.js";

function json(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

function setup(apiKey: string | null = "test-key") {
  const fetchImpl = vi.fn<typeof fetch>();
  const waits: number[] = [];
  const client = new PlatformClient({
    config: makeConfig({ platform: { baseUrl: "http://platform.test/api/v1/" } }).platform,
    logger: silentLogger(),
    apiKey,
    fetchImpl,
    sleep: async (ms) => {
      waits.push(ms);
    },
  });
  return { client, fetchImpl, waits };
}

function requestOf(fetchImpl: ReturnType<typeof setup>["fetchImpl"], index = 0) {
  const [input, init] = fetchImpl.mock.calls[index] ?? [];
  return { url: String(input), init };
}

describe("PlatformClient", () => {
  it("reads the feed and normalizes posts", async () => {
    const { client, fetchImpl } = setup();
    fetchImpl.mockResolvedValueOnce(
      json({
        posts: [
          {
            id: 17,
            author: { name: "bob" },
            submolt: "general",
            title: "Hello",
            content: null,
            upvotes: 3,
            comment_count: 1,
            created_at: "2026-01-01T00:00:00Z",
          },
        ],
      }),
    );

    const feed = await client.getFeed("new", 5);

    expect(feed).toEqual([
      {
        id: "17",
        author: "bob",
        channel: "general",
        title: "Hello",
        content: "",
        upvotes: 3,
        commentCount: 1,
        createdAt: Date.UTC(2026, 0, 1),
      },
    ]);
    const { url, init } = requestOf(fetchImpl);
    expect(url).toBe("http://platform.test/api/v1/feed?sort=new&limit=5");
    expect(init?.method).toBe("GET");
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-key",
    });
  });

  it("retries once after a 429 using Retry-After", async () => {
    const { client, fetchImpl, waits } = setup();
    fetchImpl
      .mockResolvedValueOnce(json({ error: "slow down" }, 429, { "Retry-After": "2" }))
      .mockResolvedValueOnce(json([]));

    await expect(client.getFeed("hot", 10)).resolves.toEqual([]);
    expect(waits).toEqual([2000]);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it("throws RateLimitError when the retry is also limited", async () => {
    const { client, fetchImpl } = setup();
    fetchImpl
      .mockResolvedValueOnce(json({}, 429, { "Retry-After": "1" }))
      .mockResolvedValueOnce(json({}, 429, { "Retry-After": "30" }));

    const err = await client.upvotePost("p1").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RateLimitError);
    expect(err instanceof RateLimitError && err.retryAfterSec).toBe(30);
  });

  it("raises PlatformError for other failures", async () => {
    const { client, fetchImpl } = setup();
    fetchImpl.mockResolvedValueOnce(new Response("boom", { status: 500 }));
    await expect(client.dmCheck()).rejects.toThrow(
      new PlatformError(500, "GET", "/agents/dm/check", "boom").message,
    );
  });

  it("registers without credentials and maps the response", async () => {
    const { client, fetchImpl } = setup();
    fetchImpl.mockResolvedValueOnce(
      json({ agent: { name: "tide", api_key: "test-new-key", claim_url: "http://claim.test/x" } }),
    );

    const registration = await client.register("tide", "An agent");

    expect(registration).toEqual({
      name: "tide",
      apiKey: "test-new-key",
      claimUrl: "http://claim.test/x",
      verificationCode: "",
    });
    const { init } = requestOf(fetchImpl);
    expect(init?.headers).toEqual({ "Content-Type": "application/json" });
    expect(JSON.parse(String(init?.body))).toEqual({ name: "tide", description: "An agent" });
  });

  it("turns a 409 on registration into NameTakenError", async () => {
    const { client, fetchImpl } = setup(null);
    fetchImpl.mockResolvedValueOnce(json({ error: "taken" }, 409));
    await expect(client.register("tide", "An agent")).rejects.toBeInstanceOf(NameTakenError);
  });

  it("tracks registration through the api key", () => {
    const { client } = setup(null);
    expect(client.isRegistered()).toBe(false);
    client.setApiKey("test-key");
    expect(client.isRegistered()).toBe(true);
  });

  it("sends threaded replies with parent_id", async () => {
    const { client, fetchImpl } = setup();
    fetchImpl.mockResolvedValueOnce(
      json({ comment: { id: "c9", author: "me", content: "thanks", parent_id: "c1" } }),
    );

    const comment = await client.createComment("p1", "thanks", "c1");

    expect(comment).toEqual({
      id: "c9",
      postId: "p1",
      author: "me",
      content: "thanks",
      parentId: "c1",
      upvotes: 0,
      createdAt: null,
    });
    const { url, init } = requestOf(fetchImpl);
    expect(url).toBe("http://platform.test/api/v1/posts/p1/comments");
    expect(JSON.parse(String(init?.body))).toEqual({ content: "thanks", parent_id: "c1" });
  });

  describe("direct messages", () => {
    it("lists conversations with their counterpart", async () => {
      const { client, fetchImpl } = setup();
      fetchImpl.mockResolvedValueOnce(
        json({ conversations: [{ conversation_id: 7, with_agent: { name: "alice" }, unread_count: 2 }] }),
      );
      expect(await client.dmConversations()).toEqual([{ id: "7", otherParty: "alice", unreadCount: 2 }]);
    });

    it("reads messages, falling back to the from field", async () => {
      const { client, fetchImpl } = setup();
      fetchImpl.mockResolvedValueOnce(
        json({ messages: [{ id: "m1", from: "alice", content: "hi", created_at: 1000 }] }),
      );
      expect(await client.dmMessages("7")).toEqual([
        { id: "m1", sender: "alice", content: "hi", createdAt: 1000 },
      ]);
      expect(requestOf(fetchImpl).url).toBe("http://platform.test/api/v1/agents/dm/conversations/7");
    });

    it("reports activity and approves requests", async () => {
      const { client, fetchImpl } = setup();
      fetchImpl
        .mockResolvedValueOnce(json({ has_activity: true }))
        .mockResolvedValueOnce(new Response(null, { status: 204 }));

      expect(await client.dmCheck()).toEqual({ hasActivity: true });
      await client.dmApprove("conv 1");
      expect(requestOf(fetchImpl, 1).url).toBe(
        "http://platform.test/api/v1/agents/dm/requests/conv%201/approve",
      );
    });
  });

  describe("profile and discovery", () => {
    it("reads its own profile", async () => {
      const { client, fetchImpl } = setup();
      fetchImpl.mockResolvedValueOnce(json({ agent: { name: "tide_walker", description: null, karma: 12 } }));

      expect(await client.getMe()).toEqual({ name: "tide_walker", description: "", karma: 12 });
      expect(requestOf(fetchImpl).url).toBe("http://platform.test/api/v1/agents/me");
    });

    it("follows another agent", async () => {
      const { client, fetchImpl } = setup();
      fetchImpl.mockResolvedValueOnce(json({ success: true }));

      await client.follow("kelp_thinker");

      const { url, init } = requestOf(fetchImpl);
      expect(url).toBe("http://platform.test/api/v1/agents/kelp_thinker/follow");
      expect(init?.method).toBe("POST");
    });

    it("searches posts", async () => {
      const { client, fetchImpl } = setup();
      fetchImpl.mockResolvedValueOnce(
        json({
          results: [
            {
              id: "p9",
              author: { name: "bob" },
              submolt: "technology",
              title: "Tide pools",
              content: "Small worlds",
              upvotes: 0,
              comment_count: 0,
              created_at: "2026-01-01T00:00:00Z",
            },
          ],
        }),
      );

      const posts = await client.search("tide pools", 3);

      expect(posts.map((p) => [p.id, p.channel, p.title])).toEqual([["p9", "technology", "Tide pools"]]);
      expect(requestOf(fetchImpl).url).toBe("http://platform.test/api/v1/search?q=tide+pools&type=posts&limit=3");
    });
  });
});
