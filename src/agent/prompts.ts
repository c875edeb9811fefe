import type { ConstitutionConfig, IdentityConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { StrategyDocument } from "../reflection/strategy.js";
import { sanitizeContent } from "../safety/sanitize.js";
import type { Comment, DmMessage, Post } from "../social/types.js";

const SNIPPET_LIMIT = 200;

/** Sanitizes one piece of external text, logging anything it had to redact. */
export function clean(text: string, logger: Logger, source: string): string {
  const { cleaned, warnings } = sanitizeContent(text);
  if (warnings.length > 0) logger.warn({ source, warnings }, "Redacted injection attempt");
  return cleaned;
}

export function formatFeed(posts: Post[], logger: Logger): string {
  if (posts.length === 0) return "(the feed is empty)";
  return posts
    .map((p) => {
      const title = clean(p.title, logger, `post:${p.id}`);
      const body = clean(p.content.slice(0, SNIPPET_LIMIT), logger, `post:${p.id}`);
      return `[${p.id}] (${p.channel}) "${title}" by ${p.author}, ${p.commentCount} comments\n  ${body}`;
    })
    .join("\n");
}

export function formatComments(comments: Comment[], logger: Logger): string {
  if (comments.length === 0) return "(no comments yet)";
  return comments
    .map((c) => `${c.author}: ${clean(c.content.slice(0, SNIPPET_LIMIT), logger, `comment:${c.id}`)}`)
    .join("\n");
}

export function formatMessages(messages: DmMessage[], logger: Logger): string {
  return messages
    .map((m) => `${m.sender}: ${clean(m.content, logger, `dm:${m.id}`)}`)
    .join("\n");
}

export function buildSystemPrompt(
  agentName: string,
  identity: IdentityConfig,
  constitution: ConstitutionConfig,
  strategy: StrategyDocument,
  coreBlocks: string,
): string {
  const lines = [
    `You are ${agentName}, an autonomous AI agent in an online community of agents.`,
    identity.description,
    `Tone: ${identity.tone}. Length: ${identity.length}.`,
    "",
    "Values:",
    ...constitution.values.map((v) => `- ${v}`),
    "",
    "Safety rules (never break these):",
    ...constitution.safetyRules.map((r) => `- ${r}`),
    "",
    `Trust boundary: ${constitution.trustBoundary}`,
    "",
    `Mission: ${strategy.goals.mission}`,
    "Objectives:",
    ...strategy.goals.current_objectives.map((o) => `- ${o}`),
    `Primary interests: ${strategy.interests.primary.join(", ")}`,
    `Exploring: ${strategy.interests.exploring.join(", ")}`,
    `Style: ${strategy.engagement.style.tone}, ${strategy.engagement.style.length}`,
    "Heuristics:",
    ...strategy.engagement.heuristics.map((h) => `- ${h}`),
    `Active channels: ${strategy.channels.active.join(", ")}`,
    "",
    "Memory:",
    coreBlocks,
  ];
  return lines.join("\n");
}
