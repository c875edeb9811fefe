import { Command } from "clipanion";
import { getConfigPath, getStateDir } from "../../config/paths.js";
import { STATE_KEYS } from "../../store/state.js";
import { withLocalStores } from "../local.js";

export class StatusCommand extends Command {
  static override paths = [["status"]];

  static override usage = Command.Usage({
    description: "Show agent state, activity stats and stability",
    examples: [["Show status", "tidepool status"]],
  });

  async execute(): Promise<void> {
    const out = this.context.stdout;
    await withLocalStores(({ state, social, strategies, stability }) => {
      const stats = social.getStats();
      const report = stability.compute();
      const last = state.get(STATE_KEYS.lastHeartbeatAt);

      out.write(`Tidepool Agent Status\n`);
      out.write(`---------------------\n`);
      out.write(`Config path:    ${getConfigPath()}\n`);
      out.write(`State dir:      ${getStateDir()}\n`);
      out.write(`Agent:          ${state.get(STATE_KEYS.agentName) ?? "(unregistered)"}\n`);
      out.write(`Registered:     ${state.isRegistered() ? "yes" : "no"}\n`);
      out.write(`State:          ${state.isPaused() ? "PAUSED" : "active"}\n`);
      out.write(`Heartbeats:     ${state.getNumber(STATE_KEYS.heartbeatCount)}\n`);
      out.write(`Last heartbeat: ${last === null ? "never" : new Date(Number(last)).toISOString()}\n`);
      out.write(`Strategy:       v${strategies.latest().version}\n`);
      out.write(
        `Stability:      ${report.overall.toFixed(2)}${report.alert ? " (ALERT)" : ""}\n`,
      );
      out.write(`Posts:          ${stats.totalPosts}\n`);
      out.write(`Comments today: ${stats.commentsToday}\n`);
      out.write(`Pending tasks:  ${stats.pendingTasks}\n`);
    });
  }
}
