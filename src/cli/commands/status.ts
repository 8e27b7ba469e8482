import { Command, Option } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { getConfigPath, getDbPath, getStateDir } from "../../config/paths.js";
import type { BotConfig } from "../../config/types.js";

export class StatusCommand extends Command {
  static override paths = [["status"]];

  static override usage = Command.Usage({
    description: "Show configuration paths and proactive settings",
    examples: [["Show status", "nudgebot status"]],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<void> {
    const configPath = this.config ?? getConfigPath();
    const stateDir = getStateDir();

    let config: BotConfig;
    try {
      config = loadConfig(configPath);
    } catch (err) {
      this.context.stdout.write(`Config: INVALID (${configPath})\n`);
      this.context.stdout.write(
        `  Error: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
      return;
    }

    const { proactive } = config;
    const quiet = config.quietHours.map((q) => `${q.start}-${q.end}`).join(", ") || "(none)";

    this.context.stdout.write(`nudgebot status\n`);
    this.context.stdout.write(`---------------\n`);
    this.context.stdout.write(`Config path: ${configPath}\n`);
    this.context.stdout.write(`State dir:   ${stateDir}\n`);
    this.context.stdout.write(`Database:    ${getDbPath(config.runtime.dbPath)}\n`);
    this.context.stdout.write(`Listen:      ${config.runtime.host}:${config.runtime.port}\n`);
    this.context.stdout.write(`Timezone:    ${config.timezone}\n`);
    this.context.stdout.write(`Connector:   ${config.connector.type}\n`);
    this.context.stdout.write(
      `Proactive:   ${proactive.enabled ? "enabled" : "disabled"}` +
        ` (max/day=${proactive.maxPerDay}, cooldown=${proactive.cooldownHours}h,` +
        ` min-confidence=${proactive.minConfidence}, max-pending=${proactive.maxPendingPerChat})\n`,
    );
    this.context.stdout.write(`Quiet hours: ${quiet}\n`);
    this.context.stdout.write(
      `Groups:      proactive=${config.groups.allowProactive ? "on" : "off"},` +
        ` mention-only=${config.groups.replyOnlyWhenMentioned ? "on" : "off"}\n`,
    );
  }
}
