import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

export function getStateDir(): string {
  return process.env["NUDGEBOT_STATE_DIR"] ?? join(homedir(), ".nudgebot");
}

export function getConfigPath(): string {
  return process.env["NUDGEBOT_CONFIG_PATH"] ?? "nudgebot.config.json";
}

export function getDbPath(dbPath: string | undefined): string {
  return dbPath ?? join(getStateDir(), "nudgebot.db");
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
