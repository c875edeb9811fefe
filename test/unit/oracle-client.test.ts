import { describe, it, expect, vi } from "vitest";
import { ChatOracle, OracleError, OracleHttpError } from "../../src/oracle/client.js";
import { makeConfig, silentLogger } from "../helpers/fixtures.js";

function completion(content: string): Response {
  return new Response(
    JSON.stringify({
      choices: [{ message: { content } }],
      usage: { prompt_tokens: 12, completion_tokens: 3 },
    }),
    { status: 200, headers: { "Content-Type": "application/json" } },
  );
}

function oracleConfig(providers: Array<{ name: string; baseUrl: string; apiKey?: string }>, maxAttempts = 1) {
  return makeConfig({
    oracle: {
      maxAttempts,
      providers: providers.map((p) => ({ ...p, model: "test-model" })),
    },
  }).oracle;
}

describe("ChatOracle", () => {
  it("posts an OpenAI-style chat completion request", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(completion("hello"));
    const oracle = new ChatOracle({
      config: oracleConfig([{ name: "primary", baseUrl: "http://oracle.test/v1/", apiKey: "test-secret" }]),
      logger: silentLogger(),
      fetchImpl,
    });

    const reply = await oracle.infer("Say hi", 32, { system: "Be nice", label: "post" });

    expect(reply).toBe("hello");
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe("http://oracle.test/v1/chat/completions");
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-secret",
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "test-model",
      max_tokens: 32,
      temperature: 0.7,
      messages: [
        { role: "system", content: "Be nice" },
        { role: "user", content: "Say hi" },
      ],
    });
  });

  it("falls back to the next provider and counts usage per provider and label", async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(new Response("overloaded", { status: 503 }))
      .mockResolvedValueOnce(completion("from backup"));
    const oracle = new ChatOracle({
      config: oracleConfig([
        { name: "primary", baseUrl: "http://primary.test" },
        { name: "backup", baseUrl: "http://backup.test" },
      ]),
      logger: silentLogger(),
      fetchImpl,
    });

    expect(await oracle.infer("prompt", 10, { label: "decide" })).toBe("from backup");
    expect(oracle.usageReport()).toEqual({
      "primary:decide": { calls: 1, failures: 1, promptTokens: 0, completionTokens: 0 },
      "backup:decide": { calls: 1, failures: 0, promptTokens: 12, completionTokens: 3 },
    });
  });

  it("throws OracleError when every provider fails", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockRejectedValue(new Error("connection refused"));
    const oracle = new ChatOracle({
      config: oracleConfig([{ name: "only", baseUrl: "http://only.test" }]),
      logger: silentLogger(),
      fetchImpl,
    });

    await expect(oracle.infer("prompt", 10)).rejects.toThrow(OracleError);
    expect(oracle.usageReport()["only:default"]?.failures).toBe(1);
  });

  it("rejects an unexpected completion shape", async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValue(new Response(JSON.stringify({ choices: [] }), { status: 200 }));
    const oracle = new ChatOracle({
      config: oracleConfig([{ name: "odd", baseUrl: "http://odd.test" }]),
      logger: silentLogger(),
      fetchImpl,
    });

    await expect(oracle.infer("prompt", 10)).rejects.toThrow("All oracle providers failed");
  });

  it("does not retry a rejected request", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response("bad key", { status: 401 }));
    const oracle = new ChatOracle({
      config: oracleConfig([{ name: "only", baseUrl: "http://only.test" }], 3),
      logger: silentLogger(),
      fetchImpl,
    });

    const err: unknown = await oracle.infer("prompt", 10).catch((e: unknown) => e);

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(err).toBeInstanceOf(OracleError);
    const [cause] = err instanceof OracleError ? err.causes : [];
    expect(cause).toBeInstanceOf(OracleHttpError);
    expect(cause instanceof OracleHttpError ? cause.status : 0).toBe(401);
  });

  it("fails fast without providers", async () => {
    const oracle = new ChatOracle({ config: oracleConfig([]), logger: silentLogger() });
    await expect(oracle.infer("prompt", 10)).rejects.toThrow("No oracle providers configured");
  });
});
