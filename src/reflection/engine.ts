import { z } from "zod";
import type { ConstitutionConfig, ReflectionConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { EpisodicMemory } from "../memory/episodic.js";
import type { MemoryStore } from "../memory/store.js";
import { decodeWith, ParseError } from "../oracle/decode.js";
import type { Oracle } from "../oracle/types.js";
import type { SocialStore, AgentStats } from "../social/store.js";
import type { AuditLog } from "../store/audit.js";
import type { StrategyStore } from "./store.js";
import { applyPath, readPath, strategyDocumentSchema, type StrategyDocument } from "./strategy.js";

export type ReflectionTrigger = "scheduled" | "zero_engagement" | "operator";

export interface ReflectionMetrics {
  stats: AgentStats;
  recentEpisodes: number;
  actionDistribution: Record<string, number>;
  avgImportance: number;
  insightCount: number;
}

export interface Proposal {
  field: string;
  oldValue: unknown;
  newValue: unknown;
  reason: string;
}

export interface ValidatedProposal extends Proposal {
  approved: boolean;
  verdict: string;
}

export interface ReflectionResult {
  accepted: number;
  rejected: number;
  changes: string[];
  newVersion: number | null;
}

export interface ReflectionEngineDeps {
  memory: EpisodicMemory;
  store: MemoryStore;
  social: SocialStore;
  strategies: StrategyStore;
  audit: AuditLog;
  oracle: Oracle;
  constitution: ConstitutionConfig;
  config: ReflectionConfig;
  logger: Logger;
}

const METRICS_WINDOW = 20;
const MAX_PROPOSALS = 3;
const THOUGHT_LIMIT = 500;
const INSIGHT_CONFIDENCE = 0.3;

const proposalSchema = z.array(
  z
    .object({
      field: z.string().default(""),
      old_value: z.unknown(),
      new_value: z.unknown(),
      reason: z.string().default(""),
    })
    .passthrough(),
);

const verdictSchema = z.array(
  z
    .object({
      field: z.string().default(""),
      approved: z.boolean().default(false),
      reason: z.string().default(""),
    })
    .passthrough(),
);

function toJsonText(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/**
 * Five-stage self-critique: evaluate, reflect, propose, validate, commit.
 * The only path by which the strategy document changes.
 */
export class ReflectionEngine {
  private readonly memory: EpisodicMemory;
  private readonly store: MemoryStore;
  private readonly social: SocialStore;
  private readonly strategies: StrategyStore;
  private readonly audit: AuditLog;
  private readonly oracle: Oracle;
  private readonly constitution: ConstitutionConfig;
  private readonly config: ReflectionConfig;
  private readonly logger: Logger;

  constructor(deps: ReflectionEngineDeps) {
    this.memory = deps.memory;
    this.store = deps.store;
    this.social = deps.social;
    this.strategies = deps.strategies;
    this.audit = deps.audit;
    this.oracle = deps.oracle;
    this.constitution = deps.constitution;
    this.config = deps.config;
    this.logger = deps.logger;
  }

  /** The reason to reflect now, or null. */
  shouldTrigger(heartbeatCount: number): ReflectionTrigger | null {
    if (heartbeatCount > 0 && heartbeatCount % this.config.everyHeartbeats === 0) {
      return "scheduled";
    }
    if (this.social.pendingZeroEngagement() > 0) return "zero_engagement";
    return null;
  }

  async runCycle(trigger: ReflectionTrigger): Promise<ReflectionResult> {
    this.logger.info({ trigger }, "Reflection cycle starting");
    const current = this.strategies.latest();

    const metrics = this.evaluate();
    const thought = await this.reflect(current.document, metrics);
    const proposals = await this.propose(current.document, thought);
    const validated = await this.validate(proposals);
    const result = this.commit(validated, current.document, current.version, metrics, trigger);

    this.social.markZeroEngagementReviewed();
    await this.memory.remember(
      "reflection",
      `Reflection (${trigger}): ${result.accepted} accepted, ${result.rejected} rejected` +
        (result.changes.length > 0 ? `, changed ${result.changes.join(", ")}` : ""),
      { trigger, newVersion: result.newVersion },
    );
    this.logger.info({ trigger, ...result }, "Reflection cycle completed");
    return result;
  }

  // ── Stage 1 ──

  evaluate(): ReflectionMetrics {
    const episodes = this.store.recentEpisodes(METRICS_WINDOW);
    const actionDistribution: Record<string, number> = {};
    let importanceSum = 0;
    for (const episode of episodes) {
      actionDistribution[episode.type] = (actionDistribution[episode.type] ?? 0) + 1;
      importanceSum += episode.importance;
    }
    const avg = episodes.length > 0 ? importanceSum / episodes.length : 0;
    return {
      stats: this.social.getStats(),
      recentEpisodes: episodes.length,
      actionDistribution,
      avgImportance: Math.round(avg * 100) / 100,
      insightCount: this.store.countInsights(INSIGHT_CONFIDENCE),
    };
  }

  // ── Stage 2 ──

  private async reflect(strategy: StrategyDocument, metrics: ReflectionMetrics): Promise<string> {
    const prompt =
      "You are reflecting on your recent performance as an AI agent in a social community.\n\n" +
      `Current strategy:\n${toJsonText(strategy)}\n\n` +
      `Performance metrics:\n${toJsonText(metrics)}\n\n` +
      "Analyze:\n" +
      "1. What went well?\n" +
      "2. What could be improved?\n" +
      "3. Are your current interests and engagement heuristics working?\n" +
      "4. Any patterns in what resonates versus what gets ignored?\n\n" +
      "Be specific and honest. Write 3-5 paragraphs.";
    try {
      const thought = await this.oracle.infer(prompt, 1024, { label: "reflect" });
      await this.memory.remember("reflection_thought", thought.slice(0, THOUGHT_LIMIT), {
        metrics: { ...metrics },
      });
      return thought;
    } catch (err) {
      this.logger.error({ err }, "Reflection stage failed");
      return "Reflection failed, no changes proposed.";
    }
  }

  // ── Stage 3 ──

  private async propose(strategy: StrategyDocument, thought: string): Promise<Proposal[]> {
    const prompt =
      "Based on this self-reflection, propose specific strategy changes.\n\n" +
      `Reflection:\n${thought}\n\n` +
      `Current strategy:\n${toJsonText(strategy)}\n\n` +
      "Propose 0-3 changes. Each change must target an existing field by its dotted path.\n" +
      "Return ONLY a JSON array of objects:\n" +
      '[{"field": "path.to.field", "old_value": ..., "new_value": ..., "reason": "..."}]\n' +
      "Return [] if no changes are needed.";
    try {
      const reply = await this.oracle.infer(prompt, 1024, { label: "reflect_propose" });
      return decodeWith(reply, "array", proposalSchema)
        .filter((p) => p.field.length > 0 && p.new_value !== null && p.new_value !== undefined)
        .slice(0, MAX_PROPOSALS)
        .map((p) => ({
          field: p.field,
          oldValue: p.old_value ?? readPath(strategy, p.field) ?? null,
          newValue: p.new_value,
          reason: p.reason,
        }));
    } catch (err) {
      this.logStageFailure("propose", err);
      return [];
    }
  }

  // ── Stage 4 ──

  private async validate(proposals: Proposal[]): Promise<ValidatedProposal[]> {
    if (proposals.length === 0) return [];

    const prompt =
      "Validate these proposed strategy changes against constitutional rules.\n\n" +
      "Constitutional values:\n" +
      this.constitution.values.map((v) => `- ${v}`).join("\n") +
      "\n\nSafety rules:\n" +
      this.constitution.safetyRules.map((r) => `- ${r}`).join("\n") +
      "\n\nPerformance constraints:\n" +
      this.constitution.performance.map((p) => `- ${p}`).join("\n") +
      "\n\nProposals:\n" +
      toJsonText(
        proposals.map((p) => ({ field: p.field, old_value: p.oldValue, new_value: p.newValue, reason: p.reason })),
      ) +
      "\n\nFor each proposal, decide if it is SAFE to apply.\n" +
      'Return ONLY a JSON array with one entry per proposal: [{"field": "...", "approved": true/false, "reason": "..."}]';

    let verdicts: z.infer<typeof verdictSchema>;
    try {
      const reply = await this.oracle.infer(prompt, 1024, { label: "reflect_validate" });
      verdicts = decodeWith(reply, "array", verdictSchema);
    } catch (err) {
      this.logStageFailure("validate", err);
      return proposals.map((p) => ({ ...p, approved: false, verdict: "validation unavailable" }));
    }

    const remaining = [...verdicts];
    return proposals.map((proposal) => {
      const index = remaining.findIndex((v) => v.field === proposal.field);
      const verdict = index === -1 ? undefined : remaining.splice(index, 1)[0];
      return {
        ...proposal,
        approved: verdict?.approved === true,
        verdict: verdict ? verdict.reason : "no verdict returned",
      };
    });
  }

  // ── Stage 5 ──

  private commit(
    validated: ValidatedProposal[],
    current: StrategyDocument,
    currentVersion: number,
    metrics: ReflectionMetrics,
    trigger: ReflectionTrigger,
  ): ReflectionResult {
    const approved = validated.filter((p) => p.approved);
    const changes: string[] = [];
    const applied = new Set<ValidatedProposal>();

    let working: StrategyDocument = structuredClone(current);
    for (const proposal of approved) {
      const draft: Record<string, unknown> = structuredClone(working);
      if (!applyPath(draft, proposal.field, proposal.newValue)) {
        this.logger.warn({ field: proposal.field }, "Proposal targets a missing path, ignored");
        continue;
      }
      const parsed = strategyDocumentSchema.safeParse(draft);
      if (!parsed.success) {
        this.logger.warn({ field: proposal.field }, "Proposal breaks the strategy shape, ignored");
        continue;
      }
      working = parsed.data;
      changes.push(proposal.field);
      applied.add(proposal);
    }

    let newVersion: number | null = null;
    if (changes.length > 0) {
      const saved = this.strategies.append(working, "reflection", { ...metrics, trigger });
      newVersion = saved.version;
      this.logger.info({ version: newVersion, parent: currentVersion, changes }, "Strategy updated");
    }

    if (validated.length > 0) {
      this.audit.record("reflection", {
        trigger,
        proposals: validated.map((p) => ({
          field: p.field,
          old_value: p.oldValue,
          new_value: p.newValue,
          reason: p.reason,
          approved: p.approved,
          applied: applied.has(p),
          verdict: p.verdict,
        })),
        old_version: currentVersion,
        new_version: newVersion ?? currentVersion,
      });
    }

    return {
      accepted: approved.length,
      rejected: validated.length - approved.length,
      changes,
      newVersion,
    };
  }

  private logStageFailure(stage: string, err: unknown): void {
    if (err instanceof ParseError) {
      this.logger.warn({ stage, kind: err.kind }, "Unparseable reflection reply");
    } else {
      this.logger.error({ err, stage }, "Reflection stage failed");
    }
  }
}
