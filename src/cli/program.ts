import { Cli } from "clipanion";
import { GatewayRunCommand } from "./commands/gateway.js";
import { StatusCommand } from "./commands/status.js";
import {
  ConfigShowCommand,
  ConfigValidateCommand,
} from "./commands/config-cmd.js";
import {
  PlansCancelCommand,
  PlansDueCommand,
  PlansListCommand,
} from "./commands/plans.js";
import { EventSendCommand } from "./commands/event.js";
import { VERSION } from "../version.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "nudgebot",
    binaryName: "nudgebot",
    binaryVersion: VERSION,
  });

  cli.register(GatewayRunCommand);

  // Status
  cli.register(StatusCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  // Plan commands
  cli.register(PlansListCommand);
  cli.register(PlansDueCommand);
  cli.register(PlansCancelCommand);

  // Test events
  cli.register(EventSendCommand);

  return cli;
}
