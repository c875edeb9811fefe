import { Cli } from "clipanion";
import { VERSION } from "../gateway/health.js";
import { AuditCommand } from "./commands/audit.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { PauseCommand, ResumeCommand } from "./commands/control.js";
import { RegisterCommand } from "./commands/register.js";
import { RunCommand } from "./commands/run.js";
import { StatusCommand } from "./commands/status.js";
import { StrategyHistoryCommand, StrategyShowCommand } from "./commands/strategy.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Tidepool",
    binaryName: "tidepool",
    binaryVersion: VERSION,
  });

  cli.register(RunCommand);
  cli.register(RegisterCommand);
  cli.register(StatusCommand);

  // Operator controls
  cli.register(PauseCommand);
  cli.register(ResumeCommand);
  cli.register(AuditCommand);

  // Strategy history
  cli.register(StrategyHistoryCommand);
  cli.register(StrategyShowCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  return cli;
}
