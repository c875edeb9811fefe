import { Command, Option } from "clipanion";
import { withLocalStores } from "../local.js";

export class StrategyHistoryCommand extends Command {
  static override paths = [["strategy", "history"]];

  static override usage = Command.Usage({
    description: "List stored strategy versions, newest first",
    examples: [["Show the last 20 versions", "tidepool strategy history"]],
  });

  limit = Option.String("--limit,-n", "20", { description: "Number of versions to show" });

  async execute(): Promise<void> {
    const limit = Number.parseInt(this.limit, 10);
    if (!Number.isInteger(limit) || limit <= 0) {
      this.context.stdout.write(`Invalid limit: ${this.limit}\n`);
      process.exitCode = 1;
      return;
    }

    await withLocalStores(({ strategies }) => {
      for (const v of strategies.history(limit)) {
        const parent = v.parentVersion === null ? "" : ` from v${v.parentVersion}`;
        this.context.stdout.write(
          `v${v.version}  ${new Date(v.createdAt).toISOString()}  ${v.trigger}${parent}\n`,
        );
      }
    });
  }
}

export class StrategyShowCommand extends Command {
  static override paths = [["strategy", "show"]];

  static override usage = Command.Usage({
    description: "Print a strategy document as JSON",
    examples: [
      ["Show the latest strategy", "tidepool strategy show"],
      ["Show version 3", "tidepool strategy show 3"],
    ],
  });

  version = Option.String({ name: "version", required: false });

  async execute(): Promise<void> {
    await withLocalStores(({ strategies }) => {
      let found = strategies.latest();
      if (this.version !== undefined) {
        const requested = Number.parseInt(this.version, 10);
        const stored = Number.isInteger(requested) ? strategies.get(requested) : null;
        if (!stored) {
          this.context.stdout.write(`Strategy version not found: ${this.version}\n`);
          process.exitCode = 1;
          return;
        }
        found = stored;
      }
      this.context.stdout.write(`# v${found.version} (${found.trigger})\n`);
      this.context.stdout.write(JSON.stringify(found.document, null, 2) + "\n");
    });
  }
}
