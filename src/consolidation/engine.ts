import { z } from "zod";
import type { ConsolidationConfig } from "../config/types.js";
import type { EventStore } from "../events/store.js";
import type { Logger } from "../logging/logger.js";
import type { CoreMemory } from "../memory/core.js";
import type { MemoryStore } from "../memory/store.js";
import { INSIGHT_CATEGORIES, type CoreBlockName, type Episode } from "../memory/types.js";
import { decodeWith, ParseError } from "../oracle/decode.js";
import type { Oracle } from "../oracle/types.js";

export interface ConsolidationSummary {
  compressed: number;
  insights_extracted: number;
  blocks_updated: number;
  contradictions_resolved: number;
  insights_pruned: number;
  events_pruned: number;
}

export interface ConsolidationEngineDeps {
  store: MemoryStore;
  core: CoreMemory;
  oracle: Oracle;
  events: Pick<EventStore, "pruneBefore">;
  config: ConsolidationConfig;
  logger: Logger;
}

const BATCH_SIZE = 10;
const MIN_COMPRESSIBLE = 3;
const SUMMARY_IMPORTANCE = 6;
const INSIGHT_WINDOW = 20;
const MIN_INSIGHT_EPISODES = 3;
const MAX_NEW_INSIGHTS = 3;
const MAX_SOURCE_IDS = 10;
const CORE_EPISODE_WINDOW = 15;
const CORE_INSIGHT_CONFIDENCE = 0.5;
const CORE_INSIGHT_LIMIT = 10;
const HOUR_MS = 3_600_000;
const DAY_MS = 24 * HOUR_MS;

const REWRITABLE_BLOCKS: readonly Exclude<CoreBlockName, "persona">[] = [
  "goals",
  "social_graph",
  "domain_knowledge",
];

const extractedInsightsSchema = z.array(
  z.object({
    insight: z.string().min(1),
    category: z.enum(INSIGHT_CATEGORIES).catch("strategy"),
  }),
);

const suppressedIdsSchema = z.array(z.coerce.number().int());

function episodeLines(episodes: Episode[], width: number): string {
  return episodes.map((e) => `- [${e.type}] ${e.content.slice(0, width)}`).join("\n");
}

/**
 * Sleep-time maintenance over episodic memory. Each stage catches its own
 * failures and reports zero, so a broken stage never stops the ones after it.
 */
export class ConsolidationEngine {
  private readonly store: MemoryStore;
  private readonly core: CoreMemory;
  private readonly oracle: Oracle;
  private readonly events: Pick<EventStore, "pruneBefore">;
  private readonly config: ConsolidationConfig;
  private readonly logger: Logger;

  constructor(deps: ConsolidationEngineDeps) {
    this.store = deps.store;
    this.core = deps.core;
    this.oracle = deps.oracle;
    this.events = deps.events;
    this.config = deps.config;
    this.logger = deps.logger;
  }

  async runCycle(): Promise<ConsolidationSummary> {
    this.logger.info("Consolidation cycle starting");
    const summary: ConsolidationSummary = {
      compressed: await this.guard("compress", () => this.compress()),
      insights_extracted: await this.guard("extract", () => this.extractInsights()),
      blocks_updated: await this.guard("core_blocks", () => this.updateCoreBlocks()),
      contradictions_resolved: await this.guard("contradictions", () => this.resolveContradictions()),
      insights_pruned: await this.guard("prune", async () => this.pruneInsights()),
      events_pruned: await this.guard("events", async () => this.pruneEvents()),
    };
    this.logger.info({ ...summary }, "Consolidation cycle completed");
    return summary;
  }

  // ── Compress ──

  async compress(): Promise<number> {
    const cutoff = Date.now() - this.config.compressionAgeHours * HOUR_MS;
    const candidates = this.store.compressionCandidates(
      cutoff,
      this.config.compressionImportanceThreshold,
    );
    if (candidates.length < MIN_COMPRESSIBLE) return 0;

    let compressed = 0;
    for (let i = 0; i < candidates.length; i += BATCH_SIZE) {
      const batch = candidates.slice(i, i + BATCH_SIZE);
      const prompt =
        "Summarize these agent activity episodes into 1-2 concise sentences " +
        "capturing the key information:\n\n" +
        episodeLines(batch, 200);
      try {
        const reply = (await this.oracle.infer(prompt, 256, { label: "compress" })).trim();
        if (reply.length === 0) {
          this.logger.warn({ batch: i / BATCH_SIZE }, "Empty compression summary, batch kept");
          continue;
        }
        const ids = batch.map((e) => e.id);
        this.store.replaceWithSummary(ids, {
          type: "compressed_summary",
          content: reply,
          importance: SUMMARY_IMPORTANCE,
          metadata: { original_count: batch.length, original_ids: ids },
        });
        compressed += batch.length;
      } catch (err) {
        this.logger.error({ err, batch: i / BATCH_SIZE }, "Compression batch failed");
      }
    }
    return compressed;
  }

  // ── Extract insights ──

  async extractInsights(): Promise<number> {
    const episodes = this.store.recentEpisodes(INSIGHT_WINDOW);
    if (episodes.length < MIN_INSIGHT_EPISODES) return 0;

    const existing = this.store.getInsights(0, INSIGHT_WINDOW);
    let prompt =
      "Analyze these recent agent activity episodes and extract actionable insights.\n\n" +
      `Recent episodes:\n${episodeLines(episodes, 200)}\n\n`;
    if (existing.length > 0) {
      prompt +=
        "Already known insights (do not repeat these):\n" +
        existing.map((i) => `- ${i.text}`).join("\n") +
        "\n\n";
    }
    prompt +=
      "Extract 0-3 NEW insights about:\n" +
      "- What content resonates in the community\n" +
      "- Social dynamics with other agents\n" +
      "- Strategy effectiveness\n\n" +
      "Return ONLY a JSON array:\n" +
      '[{"insight": "...", "category": "engagement|social|strategy|content"}]\n' +
      "Return [] if there are no new insights.";

    let extracted: z.infer<typeof extractedInsightsSchema>;
    try {
      const reply = await this.oracle.infer(prompt, 512, { label: "extract_insights" });
      extracted = decodeWith(reply, "array", extractedInsightsSchema);
    } catch (err) {
      this.logStageFailure("extract", err);
      return 0;
    }

    const sourceEpisodeIds = episodes.slice(0, MAX_SOURCE_IDS).map((e) => e.id);
    let added = 0;
    for (const item of extracted.slice(0, MAX_NEW_INSIGHTS)) {
      const text = item.insight.trim();
      const duplicate = this.store.findInsightByText(text);
      if (duplicate) {
        this.store.reinforceInsight(duplicate.id);
        this.logger.debug({ id: duplicate.id }, "Insight reinforced");
        continue;
      }
      this.store.addInsight({ text, category: item.category, sourceEpisodeIds });
      added++;
    }
    return added;
  }

  // ── Core blocks ──

  async updateCoreBlocks(): Promise<number> {
    const episodes = this.store.recentEpisodes(CORE_EPISODE_WINDOW);
    const insights = this.store.getInsights(CORE_INSIGHT_CONFIDENCE, CORE_INSIGHT_LIMIT);
    const insightText = insights.map((i) => `- ${i.text} (confidence: ${i.confidence.toFixed(2)})`).join("\n");

    let updated = 0;
    for (const name of REWRITABLE_BLOCKS) {
      const block = this.core.get(name);
      if (!block) continue;
      const prompt =
        `You maintain the '${name}' memory block for an AI agent.\n\n` +
        `Current content:\n${block.content}\n\n` +
        `Recent episodes:\n${episodeLines(episodes, 150)}\n\n` +
        `Known insights:\n${insightText || "(none)"}\n\n` +
        `Update the '${name}' block to reflect the latest information. ` +
        `Keep it under ${block.charLimit} characters. ` +
        "Return ONLY the updated content, nothing else.";
      try {
        const reply = await this.oracle.infer(prompt, 512, { label: "core_block" });
        if (this.core.update(name, reply)) updated++;
      } catch (err) {
        this.logger.error({ err, block: name }, "Core block update failed");
      }
    }
    return updated;
  }

  // ── Contradictions ──

  async resolveContradictions(): Promise<number> {
    const insights = this.store.getInsights();
    if (insights.length < 2) return 0;

    const prompt =
      "Review these insights for contradictions or outdated information.\n\n" +
      insights.map((i) => `[ID ${i.id}] ${i.text} (confidence: ${i.confidence.toFixed(2)})`).join("\n") +
      "\n\nReturn ONLY a JSON array of insight IDs that should be suppressed " +
      "because they contradict newer, stronger insights:\n[1, 5, ...]\n" +
      "Return [] if there are no contradictions.";

    let ids: number[];
    try {
      const reply = await this.oracle.infer(prompt, 128, { label: "contradictions" });
      ids = decodeWith(reply, "array", suppressedIdsSchema);
    } catch (err) {
      this.logStageFailure("contradictions", err);
      return 0;
    }

    const known = new Set(insights.map((i) => i.id));
    let resolved = 0;
    for (const id of new Set(ids)) {
      if (!known.has(id)) continue;
      this.store.suppressInsight(id);
      resolved++;
    }
    return resolved;
  }

  // ── Housekeeping ──

  pruneInsights(): number {
    const staleBefore = Date.now() - this.config.insightStaleDays * DAY_MS;
    const decayed = this.store.decayStaleInsights(staleBefore, this.config.insightDecay);
    const pruned = this.store.softDeleteInsightsBelow(this.config.insightFloor);
    if (decayed > 0 || pruned > 0) {
      this.logger.info({ decayed, pruned }, "Insights pruned");
    }
    return pruned;
  }

  pruneEvents(): number {
    const pruned = this.events.pruneBefore(Date.now() - this.config.eventRetentionDays * DAY_MS);
    if (pruned > 0) this.logger.info({ pruned }, "Old agent events pruned");
    return pruned;
  }

  private async guard(stage: string, fn: () => Promise<number>): Promise<number> {
    try {
      return await fn();
    } catch (err) {
      this.logger.error({ err, stage }, "Consolidation stage failed");
      return 0;
    }
  }

  private logStageFailure(stage: string, err: unknown): void {
    if (err instanceof ParseError) {
      this.logger.warn({ stage, kind: err.kind }, "Unparseable consolidation reply");
    } else {
      this.logger.error({ err, stage }, "Consolidation stage failed");
    }
  }
}
