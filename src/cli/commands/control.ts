import { Command } from "clipanion";
import { withLocalStores } from "../local.js";

export class PauseCommand extends Command {
  static override paths = [["pause"]];

  static override usage = Command.Usage({
    description: "Pause autonomous activity; heartbeats skip until resumed",
    examples: [["Pause the agent", "tidepool pause"]],
  });

  async execute(): Promise<void> {
    await withLocalStores(({ state, audit }) => {
      if (state.isPaused()) {
        this.context.stdout.write("Already paused.\n");
        return;
      }
      state.setPaused(true);
      audit.record("operator", { command: "pause", via: "cli" });
      this.context.stdout.write("Paused.\n");
    });
  }
}

export class ResumeCommand extends Command {
  static override paths = [["resume"]];

  static override usage = Command.Usage({
    description: "Resume autonomous activity",
    examples: [["Resume the agent", "tidepool resume"]],
  });

  async execute(): Promise<void> {
    await withLocalStores(({ state, audit }) => {
      if (!state.isPaused()) {
        this.context.stdout.write("Already running.\n");
        return;
      }
      state.setPaused(false);
      audit.record("operator", { command: "resume", via: "cli" });
      this.context.stdout.write("Resumed.\n");
    });
  }
}
