import { Command, Option } from "clipanion";
import { loadConfig, readConfigFile, type ConfigFile } from "../../config/loader.js";
import { parseConfig } from "../../config/schema.js";
import type { AgentConfig } from "../../config/types.js";

const REDACTED = "***REDACTED***";

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Copy of the config with every credential replaced. */
export function redactConfig(config: AgentConfig): AgentConfig {
  return {
    ...config,
    oracle: {
      ...config.oracle,
      providers: config.oracle.providers.map((p) => (p.apiKey ? { ...p, apiKey: REDACTED } : p)),
    },
    platform: config.platform.apiKey ? { ...config.platform, apiKey: REDACTED } : config.platform,
    operator: config.operator.token ? { ...config.operator, token: REDACTED } : config.operator,
  };
}

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the effective configuration (credentials redacted)",
    examples: [["Show config", "tidepool config show"]],
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  async execute(): Promise<void> {
    let config: AgentConfig;
    try {
      config = loadConfig(this.config);
    } catch (err) {
      this.context.stdout.write(`Failed to load config: ${describe(err)}\n`);
      process.exitCode = 1;
      return;
    }

    this.context.stdout.write(JSON.stringify(redactConfig(config), null, 2) + "\n");
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "tidepool config validate"],
      ["Validate specific file", "tidepool config validate ./agent.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<void> {
    const out = this.context.stdout;
    let file: ConfigFile;
    try {
      file = readConfigFile(this.configFile);
    } catch (err) {
      out.write(`Config is INVALID: ${this.configFile ?? "(default path)"}\n  ${describe(err)}\n`);
      process.exitCode = 1;
      return;
    }

    if (!file.found) {
      out.write(`Config file not found: ${file.path}\n`);
      process.exitCode = 1;
      return;
    }

    try {
      parseConfig(file.raw);
      out.write(`Config is valid: ${file.path}\n`);
    } catch (err) {
      out.write(`Config is INVALID: ${file.path}\n  ${describe(err)}\n`);
      process.exitCode = 1;
    }
  }
}
