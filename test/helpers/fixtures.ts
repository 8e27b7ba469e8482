import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import pino from "pino";
import { parseConfig } from "../../src/config/schema.js";
import type { BotConfig } from "../../src/config/types.js";
import type { Logger } from "../../src/logging/logger.js";
import { StateDB } from "../../src/storage/db.js";
import type { PlanDraft } from "../../src/proactive/types.js";

export const TEST_SECRET = "test-secret";

/** Config built through the real schema so every default applies. */
export function makeConfig(overrides: Record<string, unknown> = {}): BotConfig {
  return parseConfig({ security: { sharedSecret: TEST_SECRET }, ...overrides });
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export interface TempState {
  dir: string;
  db: StateDB;
  cleanup(): void;
}

export function makeTempState(prefix = "nudgebot-test-"): TempState {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  const db = new StateDB(join(dir, "state.db"));
  return {
    dir,
    db,
    cleanup: () => {
      db.close();
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

export function makeDraft(overrides: Partial<PlanDraft> = {}): PlanDraft {
  return {
    sendAt: Date.UTC(2026, 0, 15, 12),
    text: "Checking in",
    gifTag: null,
    reason: "follow up",
    confidence: 0.9,
    ...overrides,
  };
}
