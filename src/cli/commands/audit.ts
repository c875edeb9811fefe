import { Command, Option } from "clipanion";
import type { AuditKind } from "../../store/audit.js";
import { withLocalStores } from "../local.js";

const KINDS: ReadonlySet<string> = new Set<AuditKind>(["reflection", "operator", "safety"]);

function isAuditKind(value: string): value is AuditKind {
  return KINDS.has(value);
}

export class AuditCommand extends Command {
  static override paths = [["audit"]];

  static override usage = Command.Usage({
    description: "Show recent audit log entries",
    examples: [
      ["Show recent entries", "tidepool audit"],
      ["Show only safety blocks", "tidepool audit --kind safety"],
    ],
  });

  kind = Option.String("--kind", { description: "reflection, operator or safety", required: false });
  limit = Option.String("--limit,-n", "20", { description: "Number of entries to show" });

  async execute(): Promise<void> {
    const requested = this.kind;
    let kind: AuditKind | undefined;
    if (requested !== undefined) {
      if (!isAuditKind(requested)) {
        this.context.stdout.write(`Unknown audit kind: ${requested}\n`);
        process.exitCode = 1;
        return;
      }
      kind = requested;
    }
    const limit = Number.parseInt(this.limit, 10) || 20;

    await withLocalStores(({ audit }) => {
      const entries = audit.entries(limit, kind);
      if (entries.length === 0) {
        this.context.stdout.write("No audit entries.\n");
        return;
      }
      for (const entry of entries) {
        this.context.stdout.write(
          `#${entry.id} ${new Date(entry.createdAt).toISOString()} [${entry.kind}] ${JSON.stringify(entry.data)}\n`,
        );
      }
    });
  }
}
