import { z } from "zod";
import type { ConstitutionConfig, SafetyFailMode } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { decodeWith, ParseError } from "../oracle/decode.js";
import type { Oracle } from "../oracle/types.js";
import { describeAction, type ActionDecision, type ActionKind } from "../agent/types.js";

export interface ShieldVerdict {
  safe: boolean;
  reason: string;
}

export interface ShieldGoals {
  mission: string;
  objectives: string[];
}

export interface ActionShieldDeps {
  oracle: Oracle;
  logger: Logger;
  constitution: ConstitutionConfig;
  failMode: SafetyFailMode;
}

const verdictSchema = z.object({
  safe: z.boolean().default(true),
  reason: z.string().default(""),
});

/** Actions still allowed in closed mode when the oracle cannot judge. */
const LOW_RISK_ACTIONS: ReadonlySet<ActionKind> = new Set(["skip", "upvote"]);

/**
 * Task Shield. Asks the oracle whether an action fits the mission and the
 * immutable safety rules. When the oracle fails the action is allowed
 * ("open"), or allowed only if low-risk ("closed").
 */
export class ActionShield {
  private readonly oracle: Oracle;
  private readonly logger: Logger;
  private readonly constitution: ConstitutionConfig;
  private readonly failMode: SafetyFailMode;

  constructor(deps: ActionShieldDeps) {
    this.oracle = deps.oracle;
    this.logger = deps.logger;
    this.constitution = deps.constitution;
    this.failMode = deps.failMode;
  }

  async validate(decision: ActionDecision, goals: ShieldGoals): Promise<ShieldVerdict> {
    const prompt =
      "You are a safety validator for an AI agent. Evaluate whether the following action " +
      "aligns with the agent's goals and safety rules.\n\n" +
      "Safety rules:\n" +
      this.constitution.safetyRules.map((r) => `- ${r}`).join("\n") +
      "\n\n" +
      `Mission: ${goals.mission}\n` +
      `Objectives: ${goals.objectives.join(", ")}\n\n` +
      `Action: ${describeAction(decision)}\n` +
      `Stated reason: ${decision.reason || "(none)"}\n\n` +
      'Reply ONLY with a JSON object: {"safe": true/false, "reason": "..."}';

    let reply: string;
    try {
      reply = await this.oracle.infer(prompt, 128, { label: "validate_action" });
    } catch (err) {
      this.logger.warn({ err, action: decision.action }, "Action validation failed");
      return this.fallback(decision, "Validation error");
    }

    try {
      return decodeWith(reply, "object", verdictSchema);
    } catch (err) {
      if (err instanceof ParseError) {
        this.logger.warn({ kind: err.kind, action: decision.action }, "Unparseable validation reply");
        return this.fallback(decision, "Could not parse validation response");
      }
      throw err;
    }
  }

  private fallback(decision: ActionDecision, cause: string): ShieldVerdict {
    if (this.failMode === "open" || LOW_RISK_ACTIONS.has(decision.action)) {
      return { safe: true, reason: `${cause}, defaulting to allow` };
    }
    return { safe: false, reason: `${cause}, blocking ${decision.action} in closed mode` };
  }
}
