import { z } from "zod";
import type { OracleConfig, OracleProviderConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { retry } from "../utils/retry.js";
import type { InferOptions, Oracle, UsageCounter, UsageReport } from "./types.js";

export class OracleError extends Error {
  constructor(
    message: string,
    readonly causes: unknown[] = [],
  ) {
    super(message);
    this.name = "OracleError";
  }
}

/** A non-2xx completion response. */
export class OracleHttpError extends OracleError {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
    this.name = "OracleHttpError";
  }
}

/** Client errors other than rate limiting will not succeed on a second try. */
function isTransient(err: unknown): boolean {
  if (!(err instanceof OracleHttpError)) return true;
  return err.status === 429 || err.status >= 500;
}

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().default(0),
      completion_tokens: z.number().default(0),
    })
    .optional(),
});

export interface ChatOracleDeps {
  config: OracleConfig;
  logger: Logger;
  fetchImpl?: typeof fetch;
}

function emptyCounter(): UsageCounter {
  return { calls: 0, failures: 0, promptTokens: 0, completionTokens: 0 };
}

/**
 * OpenAI-compatible chat completions, trying providers in order. Each provider
 * gets `maxAttempts` tries with jittered backoff before the next one is used.
 */
export class ChatOracle implements Oracle {
  private readonly config: OracleConfig;
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;
  private readonly usage = new Map<string, UsageCounter>();

  constructor(deps: ChatOracleDeps) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.fetchImpl = deps.fetchImpl ?? fetch;
  }

  async infer(prompt: string, maxOutput: number, options: InferOptions = {}): Promise<string> {
    if (this.config.providers.length === 0) {
      throw new OracleError("No oracle providers configured");
    }

    const causes: unknown[] = [];
    for (const provider of this.config.providers) {
      const bucket = `${provider.name}:${options.label ?? "default"}`;
      try {
        return await retry(() => this.complete(provider, bucket, prompt, maxOutput, options), {
          maxAttempts: this.config.maxAttempts,
          shouldRetry: isTransient,
          onRetry: (err, attempt, delayMs) =>
            this.logger.debug({ err, provider: provider.name, attempt, delayMs }, "Retrying oracle call"),
        });
      } catch (err) {
        causes.push(err);
        this.logger.warn({ err, provider: provider.name, label: options.label }, "Oracle provider failed");
      }
    }
    throw new OracleError("All oracle providers failed", causes);
  }

  usageReport(): UsageReport {
    return Object.fromEntries(this.usage);
  }

  private async complete(
    provider: OracleProviderConfig,
    bucket: string,
    prompt: string,
    maxOutput: number,
    options: InferOptions,
  ): Promise<string> {
    const counter = this.usage.get(bucket) ?? emptyCounter();
    this.usage.set(bucket, counter);
    counter.calls++;

    const messages = options.system
      ? [
          { role: "system", content: options.system },
          { role: "user", content: prompt },
        ]
      : [{ role: "user", content: prompt }];

    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (provider.apiKey) headers["Authorization"] = `Bearer ${provider.apiKey}`;

    let res: Response;
    try {
      res = await this.fetchImpl(`${provider.baseUrl.replace(/\/+$/, "")}/chat/completions`, {
        method: "POST",
        headers,
        body: JSON.stringify({
          model: provider.model,
          max_tokens: maxOutput,
          temperature: options.temperature ?? 0.7,
          messages,
        }),
        signal: AbortSignal.timeout(provider.timeoutMs),
      });
    } catch (err) {
      counter.failures++;
      throw err;
    }

    if (!res.ok) {
      counter.failures++;
      const detail = (await res.text()).slice(0, 200);
      throw new OracleHttpError(`${provider.name} returned ${res.status}: ${detail}`, res.status);
    }

    const body: unknown = await res.json();
    const parsed = completionSchema.safeParse(body);
    if (!parsed.success) {
      counter.failures++;
      throw new OracleError(`${provider.name} returned an unexpected completion shape`);
    }

    counter.promptTokens += parsed.data.usage?.prompt_tokens ?? 0;
    counter.completionTokens += parsed.data.usage?.completion_tokens ?? 0;
    return parsed.data.choices[0]?.message.content ?? "";
  }
}
