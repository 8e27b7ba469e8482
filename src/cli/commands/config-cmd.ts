import { Command, Option } from "clipanion";
import { readFileSync } from "node:fs";
import { loadConfig, parseConfigText } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";
import type { BotConfig } from "../../config/types.js";

const REDACTED = "***REDACTED***";

export function redactConfig(config: BotConfig): BotConfig {
  const connector =
    config.connector.type === "http" && config.connector.token
      ? { ...config.connector, token: REDACTED }
      : config.connector;

  return {
    ...config,
    security: { ...config.security, sharedSecret: REDACTED },
    llm: config.llm.apiKey ? { ...config.llm, apiKey: REDACTED } : config.llm,
    connector,
  };
}

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show current configuration (secrets redacted)",
    examples: [["Show config", "nudgebot config show"]],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<void> {
    let config: BotConfig;
    try {
      config = loadConfig(this.config);
    } catch (err) {
      this.context.stdout.write(
        `Failed to load config: ${err instanceof Error ? err.message : String(err)}\n`,
      );
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
      ["Validate default config", "nudgebot config validate"],
      ["Validate specific file", "nudgebot config validate ./my-config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<void> {
    const configPath = this.configFile ?? getConfigPath();

    let content: string;
    try {
      content = readFileSync(configPath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") {
        this.context.stdout.write(`Config file not found: ${configPath}\n`);
        process.exitCode = 1;
        return;
      }
      throw err;
    }

    try {
      parseConfigText(content);
      this.context.stdout.write(`Config is valid: ${configPath}\n`);
    } catch (err) {
      this.context.stdout.write(
        `Config is INVALID: ${configPath}\n` +
          `  ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
    }
  }
}
