import { Command, Option } from "clipanion";
import { startAgent } from "../../gateway/lifecycle.js";

export class RunCommand extends Command {
  static override paths = [["run"], Command.Default];

  static override usage = Command.Usage({
    description: "Start the agent: heartbeats, consolidation, task worker and operator channel",
    examples: [
      ["Start with default config", "tidepool run"],
      ["Start with custom config", "tidepool run --config ./agent.json"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<void> {
    try {
      await startAgent(this.config);
    } catch (err) {
      this.context.stderr.write(
        `Failed to start agent: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
      return;
    }
    // Runs until a shutdown signal arrives
    await new Promise<never>(() => {});
  }
}
