import type { Logger } from "../logging/logger.js";
import type { Oracle } from "../oracle/types.js";
import { extractKeywords } from "./keywords.js";
import { clampImportance, type MemoryStore } from "./store.js";
import type { Episode, EpisodeType } from "./types.js";

export interface EpisodicMemoryDeps {
  store: MemoryStore;
  oracle: Oracle;
  logger: Logger;
}

export interface ScoredEpisode {
  episode: Episode;
  score: number;
}

export const DEFAULT_IMPORTANCE = 5;
const CANDIDATE_LIMIT = 50;
const RECENCY_DECAY_PER_HOUR = 0.03;
const HOUR_MS = 3_600_000;

const NUMBER_PATTERN = /(\d+(?:\.\d+)?)/;

/** First number in the text clamped to [1, 10], or 5 when there is none. */
export function parseImportance(text: string): number {
  const match = NUMBER_PATTERN.exec(text);
  if (!match?.[1]) return DEFAULT_IMPORTANCE;
  return clampImportance(Number.parseFloat(match[1]));
}

export function recencyScore(createdAt: number, now: number): number {
  const hours = Math.max(0, (now - createdAt) / HOUR_MS);
  return Math.exp(-RECENCY_DECAY_PER_HOUR * hours);
}

/** Blend of recency, importance and keyword overlap used by `recall`. */
export function scoreEpisode(episode: Episode, keywords: string[], now: number): number {
  const recency = recencyScore(episode.createdAt, now);
  const importance = episode.importance / 10;
  let overlap = 0;
  if (keywords.length > 0) {
    const content = episode.content.toLowerCase();
    const matched = keywords.filter((kw) => content.includes(kw)).length;
    overlap = matched / keywords.length;
  }
  return 0.3 * recency + 0.4 * importance + 0.3 * overlap;
}

export class EpisodicMemory {
  private readonly store: MemoryStore;
  private readonly oracle: Oracle;
  private readonly logger: Logger;

  constructor(deps: EpisodicMemoryDeps) {
    this.store = deps.store;
    this.oracle = deps.oracle;
    this.logger = deps.logger;
  }

  async remember(
    type: EpisodeType,
    content: string,
    metadata?: Record<string, unknown>,
  ): Promise<number> {
    const importance = await this.scoreImportance(content);
    const id = this.store.addEpisode({ type, content, importance, metadata });
    this.logger.debug({ id, type, importance }, "Episode stored");
    return id;
  }

  async scoreImportance(content: string): Promise<number> {
    const prompt =
      "Rate the importance of this event for a social agent on a scale of 1-10.\n" +
      "1 = routine, nothing learned. 10 = pivotal, changes how the agent should behave.\n\n" +
      `Event: ${content.slice(0, 500)}\n\n` +
      "Reply with ONLY a number.";
    try {
      const reply = await this.oracle.infer(prompt, 8, { label: "importance" });
      return parseImportance(reply);
    } catch (err) {
      this.logger.warn({ err }, "Importance scoring failed, using default");
      return DEFAULT_IMPORTANCE;
    }
  }

  recall(query: string, limit = 5): Episode[] {
    return this.recallScored(query, limit).map((s) => s.episode);
  }

  recallScored(query: string, limit = 5): ScoredEpisode[] {
    const keywords = extractKeywords(query);
    const candidates = this.store.searchEpisodes(keywords, CANDIDATE_LIMIT);
    const now = Date.now();
    return candidates
      .map((episode) => ({ episode, score: scoreEpisode(episode, keywords, now) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, limit);
  }
}
