import { Command, Option } from "clipanion";
import { startGateway } from "../../gateway/lifecycle.js";
import { VERSION } from "../../version.js";
import { printBanner } from "../banner.js";

export class GatewayRunCommand extends Command {
  static override paths = [["gateway", "run"], Command.Default];

  static override usage = Command.Usage({
    description: "Start the inbound endpoint and the proactive scheduler",
    examples: [
      ["Start with default config", "nudgebot gateway run"],
      ["Start with custom config", "nudgebot gateway run --config ./my-config.json"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<void> {
    printBanner(VERSION);

    try {
      await startGateway(this.config);
    } catch (err) {
      console.error("Failed to start gateway:", err);
      process.exit(1);
    }
    // The HTTP server keeps the process alive until a shutdown signal.
  }
}
