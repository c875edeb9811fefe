import { z } from "zod";
import { isRecord } from "../utils/json.js";

export const strategyDocumentSchema = z
  .object({
    goals: z
      .object({
        mission: z.string().min(1),
        current_objectives: z.array(z.string()),
      })
      .passthrough(),
    interests: z
      .object({
        primary: z.array(z.string()),
        exploring: z.array(z.string()),
        weight_primary: z.number().min(0).max(1),
        weight_exploring: z.number().min(0).max(1),
      })
      .passthrough(),
    engagement: z
      .object({
        style: z.object({ tone: z.string(), length: z.string() }).passthrough(),
        heuristics: z.array(z.string()),
        exploration_rate: z.number().min(0).max(1),
      })
      .passthrough(),
    channels: z
      .object({
        active: z.array(z.string()),
        watching: z.array(z.string()),
      })
      .passthrough(),
  })
  .passthrough();

export type StrategyDocument = z.infer<typeof strategyDocumentSchema>;

export type StrategyTrigger = "default" | "reflection" | "operator";

export interface StrategyVersion {
  version: number;
  document: StrategyDocument;
  parentVersion: number | null;
  trigger: StrategyTrigger;
  performanceSnapshot: Record<string, unknown> | null;
  createdAt: number;
}

export const DEFAULT_STRATEGY: StrategyDocument = {
  goals: {
    mission: "Become a thoughtful, valued participant in the agent community",
    current_objectives: [
      "Build reputation through quality contributions",
      "Engage meaningfully with other agents' posts",
      "Develop a recognizable voice and perspective",
    ],
  },
  interests: {
    primary: ["AI agents", "technology", "philosophy of mind"],
    exploring: ["creative writing", "science"],
    weight_primary: 0.7,
    weight_exploring: 0.3,
  },
  engagement: {
    style: { tone: "curious and thoughtful", length: "concise" },
    heuristics: [
      "Comment when you can add a genuinely new angle",
      "Upvote posts that sparked real discussion",
      "Post when you have an original idea worth sharing",
      "Skip when nothing in the feed deserves a response",
    ],
    exploration_rate: 0.1,
  },
  channels: {
    active: ["general", "technology", "philosophy"],
    watching: [],
  },
};

const FORBIDDEN_SEGMENTS: ReadonlySet<string> = new Set(["__proto__", "prototype", "constructor"]);

/**
 * Assigns `value` at a dotted path inside `target`. Every intermediate
 * segment must already exist and be an object; otherwise nothing changes
 * and false is returned.
 */
export function applyPath(target: Record<string, unknown>, path: string, value: unknown): boolean {
  const segments = path.split(".");
  if (segments.some((s) => s.length === 0 || FORBIDDEN_SEGMENTS.has(s))) return false;

  const last = segments.pop();
  if (last === undefined) return false;

  let node: Record<string, unknown> = target;
  for (const segment of segments) {
    const next = node[segment];
    if (!isRecord(next)) return false;
    node = next;
  }
  node[last] = value;
  return true;
}

/** Value at a dotted path, or undefined. */
export function readPath(source: Record<string, unknown>, path: string): unknown {
  let node: unknown = source;
  for (const segment of path.split(".")) {
    if (!isRecord(node)) return undefined;
    node = node[segment];
  }
  return node;
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    const children: unknown[] = Object.values(value);
    for (const child of children) deepFreeze(child);
  }
  return value;
}

/**
 * Holds the strategy the prompt builder reads. Each version is a frozen value;
 * reloading swaps the reference and never mutates the previous one.
 */
export class ActiveStrategy {
  private current: StrategyVersion;

  constructor(initial: StrategyVersion) {
    this.current = deepFreeze(initial);
  }

  get(): StrategyVersion {
    return this.current;
  }

  swap(next: StrategyVersion): void {
    this.current = deepFreeze(next);
  }
}
