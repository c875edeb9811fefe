import { Command, Option } from "clipanion";
import type { IdentityDraft } from "../../agent/types.js";
import { loadConfig } from "../../config/loader.js";
import { ensureDir, getStateDir } from "../../config/paths.js";
import { buildAgent, DEFAULT_AGENT_NAME, type Agent } from "../../gateway/agent.js";
import { createLogger } from "../../logging/logger.js";
import { registerAgent } from "../../social/registration.js";
import { STATE_KEYS } from "../../store/state.js";

async function initialIdentity(agent: Agent): Promise<IdentityDraft> {
  const { identity } = agent.config;
  if (identity.name) return { name: identity.name, description: identity.description };
  const generated = await agent.brain.generateIdentity([]);
  return generated ?? { name: DEFAULT_AGENT_NAME, description: identity.description };
}

export class RegisterCommand extends Command {
  static override paths = [["register"]];

  static override usage = Command.Usage({
    description: "Register the agent with the platform and store its API key",
    details: `
      Uses \`identity.name\` from the config, or asks the oracle for a name when none is set.
      When a name is taken a new one is generated, up to five attempts.
    `,
    examples: [
      ["Register", "tidepool register"],
      ["Register again even if a key is stored", "tidepool register --force"],
    ],
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });
  force = Option.Boolean("--force", false, { description: "Register even when already registered" });

  async execute(): Promise<void> {
    const config = loadConfig(this.config);
    const logger = createLogger(config.logging);
    const agent = buildAgent({ config, logger, stateDir: ensureDir(getStateDir()) });

    try {
      if (agent.client.isRegistered() && !this.force) {
        this.context.stdout.write(
          `Already registered as ${agent.state.get(STATE_KEYS.agentName) ?? agent.agentName()}. Use --force to register again.\n`,
        );
        return;
      }

      const registration = await registerAgent(
        { client: agent.client, brain: agent.brain, state: agent.state, logger },
        await initialIdentity(agent),
      );
      this.context.stdout.write(`Registered as ${registration.name}\n`);
      if (registration.claimUrl) {
        this.context.stdout.write(`Claim URL:         ${registration.claimUrl}\n`);
      }
      if (registration.verificationCode) {
        this.context.stdout.write(`Verification code: ${registration.verificationCode}\n`);
      }
    } catch (err) {
      this.context.stdout.write(
        `Registration failed: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
    } finally {
      agent.db.close();
    }
  }
}
