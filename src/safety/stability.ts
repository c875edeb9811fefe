import type { MemoryStore } from "../memory/store.js";
import { keywordSet } from "../memory/keywords.js";

export interface StabilityComponents {
  actionConsistency: number;
  topicConsistency: number;
  qualityTrend: number;
  skipRate: number;
}

export interface StabilityReport {
  overall: number;
  components: StabilityComponents | null;
  alert: boolean;
}

export const STABILITY_WINDOW = 30;
const QUALITY_WINDOW = 10;
const TOPIC_WINDOW = 10;
export const ALERT_THRESHOLD = 0.3;

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

function jaccard(a: Set<string>, b: Set<string>): number {
  let shared = 0;
  for (const word of a) if (b.has(word)) shared++;
  const union = a.size + b.size - shared;
  return union === 0 ? 0 : shared / union;
}

/** Mean Jaccard overlap of consecutive keyword sets; pairs with an empty side are skipped. */
export function topicConsistency(contents: string[]): number {
  if (contents.length < 2) return 1;
  const sets = contents.map(keywordSet);
  const overlaps: number[] = [];
  for (let i = 0; i < sets.length - 1; i++) {
    const a = sets[i];
    const b = sets[i + 1];
    if (!a || !b || a.size === 0 || b.size === 0) continue;
    overlaps.push(jaccard(a, b));
  }
  if (overlaps.length === 0) return 1;
  return overlaps.reduce((sum, v) => sum + v, 0) / overlaps.length;
}

export class StabilityIndex {
  constructor(private readonly store: MemoryStore) {}

  compute(): StabilityReport {
    const episodes = this.store.recentEpisodes(STABILITY_WINDOW);
    if (episodes.length === 0) {
      return { overall: 1, components: null, alert: false };
    }

    const n = episodes.length;
    const skipCount = episodes.filter((e) => e.type === "skip").length;
    const actionConsistency = 1 - skipCount / n;

    const recent = episodes.slice(0, QUALITY_WINDOW);
    const qualityTrend = recent.reduce((sum, e) => sum + e.importance, 0) / recent.length / 10;

    let leadingSkips = 0;
    for (const episode of episodes) {
      if (episode.type !== "skip") break;
      leadingSkips++;
    }
    const skipRate = leadingSkips / n;

    const topic = topicConsistency(episodes.slice(0, TOPIC_WINDOW).map((e) => e.content));

    const overall =
      0.25 * actionConsistency + 0.25 * topic + 0.3 * qualityTrend + 0.2 * (1 - skipRate);

    return {
      overall: round3(overall),
      components: {
        actionConsistency: round3(actionConsistency),
        topicConsistency: round3(topic),
        qualityTrend: round3(qualityTrend),
        skipRate: round3(skipRate),
      },
      alert: overall < ALERT_THRESHOLD,
    };
  }
}
