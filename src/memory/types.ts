export const EPISODE_TYPES = [
  "post",
  "comment",
  "reply",
  "dm",
  "upvote",
  "skip",
  "safety_block",
  "blocked_action",
  "reflection",
  "reflection_thought",
  "compressed_summary",
  "operator",
] as const;

export type EpisodeType = (typeof EPISODE_TYPES)[number];

const EPISODE_TYPE_SET: ReadonlySet<string> = new Set(EPISODE_TYPES);

export function isEpisodeType(value: string): value is EpisodeType {
  return EPISODE_TYPE_SET.has(value);
}

export interface Episode {
  id: number;
  type: EpisodeType;
  content: string;
  importance: number;
  metadata: Record<string, unknown>;
  createdAt: number;
}

export interface NewEpisode {
  type: EpisodeType;
  content: string;
  importance: number;
  metadata?: Record<string, unknown>;
}

export const INSIGHT_CATEGORIES = ["engagement", "social", "strategy", "content"] as const;

export type InsightCategory = (typeof INSIGHT_CATEGORIES)[number];

const INSIGHT_CATEGORY_SET: ReadonlySet<string> = new Set(INSIGHT_CATEGORIES);

export function isInsightCategory(value: string): value is InsightCategory {
  return INSIGHT_CATEGORY_SET.has(value);
}

export interface Insight {
  id: number;
  text: string;
  category: InsightCategory;
  confidence: number;
  evidenceCount: number;
  sourceEpisodeIds: number[];
  createdAt: number;
  updatedAt: number;
}

export const CORE_BLOCK_NAMES = ["persona", "goals", "social_graph", "domain_knowledge"] as const;

export type CoreBlockName = (typeof CORE_BLOCK_NAMES)[number];

const CORE_BLOCK_NAME_SET: ReadonlySet<string> = new Set(CORE_BLOCK_NAMES);

export function isCoreBlockName(value: string): value is CoreBlockName {
  return CORE_BLOCK_NAME_SET.has(value);
}

export interface CoreBlock {
  name: CoreBlockName;
  content: string;
  charLimit: number;
  updatedAt: number;
}

export const CORE_BLOCK_LIMITS: Record<CoreBlockName, number> = {
  persona: 500,
  goals: 500,
  social_graph: 1000,
  domain_knowledge: 1000,
};
