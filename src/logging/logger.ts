import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

export function createLogger(config?: Partial<LoggingConfig>): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  const transport = isJson
    ? undefined
    : {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss" },
      };

  const options: pino.LoggerOptions = {
    level,
    base: { app: "nudgebot" },
    ...(transport ? { transport } : {}),
  };

  if (config?.file) {
    return pino({ level, base: { app: "nudgebot" } }, pino.destination(config.file));
  }

  return pino(options);
}
