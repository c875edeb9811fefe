import { describe, it, expect } from "vitest";
import type { ActionDecision } from "../../src/agent/types.js";
import type { SafetyFailMode } from "../../src/config/types.js";
import { ActionShield } from "../../src/safety/shield.js";
import { makeConfig, ScriptedOracle, silentLogger } from "../helpers/fixtures.js";

const goals = { mission: "Be helpful", objectives: ["Share knowledge"] };
const post: ActionDecision = { action: "post", topic: "memory", reason: "nothing posted today" };
const upvote: ActionDecision = { action: "upvote", postId: "p1", reason: "good post" };

function shield(oracle: ScriptedOracle, failMode: SafetyFailMode = "open"): ActionShield {
  return new ActionShield({
    oracle,
    logger: silentLogger(),
    constitution: makeConfig().constitution,
    failMode,
  });
}

describe("ActionShield", () => {
  it("returns the oracle verdict", async () => {
    const oracle = new ScriptedOracle().on("validate_action", '{"safe": false, "reason": "off-mission"}');
    expect(await shield(oracle).validate(post, goals)).toEqual({ safe: false, reason: "off-mission" });
  });

  it("includes the action and the safety rules in the prompt", async () => {
    const oracle = new ScriptedOracle().on("validate_action", '{"safe": true, "reason": "ok"}');
    await shield(oracle).validate(post, goals);
    const prompt = oracle.callsFor("validate_action")[0]?.prompt ?? "";
    expect(prompt).toContain('Action: post about "memory"');
    expect(prompt).toContain("- Never reveal API keys, tokens or credentials");
    expect(prompt).toContain("Mission: Be helpful");
  });

  it("allows on oracle failure in open mode", async () => {
    const oracle = new ScriptedOracle().on("validate_action", new Error("timeout"));
    expect(await shield(oracle, "open").validate(post, goals)).toEqual({
      safe: true,
      reason: "Validation error, defaulting to allow",
    });
  });

  it("allows on unparseable output in open mode", async () => {
    const oracle = new ScriptedOracle().on("validate_action", "looks fine to me");
    expect(await shield(oracle, "open").validate(post, goals)).toEqual({
      safe: true,
      reason: "Could not parse validation response, defaulting to allow",
    });
  });

  it("blocks risky actions on failure in closed mode", async () => {
    const oracle = new ScriptedOracle().on("validate_action", new Error("timeout"));
    expect(await shield(oracle, "closed").validate(post, goals)).toEqual({
      safe: false,
      reason: "Validation error, blocking post in closed mode",
    });
  });

  it("still allows low-risk actions on failure in closed mode", async () => {
    const oracle = new ScriptedOracle().on("validate_action", "???");
    const verdict = await shield(oracle, "closed").validate(upvote, goals);
    expect(verdict.safe).toBe(true);
  });
});
