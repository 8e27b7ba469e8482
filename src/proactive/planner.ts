import type { BotConfig, ChatKind } from "../config/types.js";
import type { Conversation } from "../conversation/types.js";
import type { Logger } from "../logging/logger.js";
import type { PlanStore } from "./store.js";
import type { DropReason, PlanDraft, PlanItem, PlanningAction, PlanningOutcome } from "./types.js";
import {
  canUsePlan,
  cooldownBoundary,
  effectiveDailyCount,
  parseSendAt,
  sanitizeScheduleTime,
  shouldScheduleProactive,
} from "./policy.js";
import { parseQuietBlocks } from "./quiet-hours.js";
import { localDateKey, zoned } from "../utils/time.js";

export interface PlannerDeps {
  readonly plans: PlanStore;
  readonly config: BotConfig;
  readonly logger: Logger;
  readonly now?: () => number;
}

export interface PlanningInput {
  readonly chatId: string;
  readonly chatKind: ChatKind;
  readonly action: PlanningAction;
  readonly item: PlanItem | null;
  readonly pendingCount: number;
  readonly conversation: Conversation;
}

/**
 * Turn one model planning directive into a plan-store mutation. Directives the
 * policy rejects are dropped without surfacing anything to the chat.
 */
export function applyPlanning(deps: PlannerDeps, input: PlanningInput): PlanningOutcome {
  const { plans, config, logger } = deps;
  const now = deps.now?.() ?? Date.now();
  const { chatId, action, item } = input;
  const log = logger.child({ chatId, action });

  if (action === "cancel_all") {
    const count = plans.cancelAllPlans(chatId, now);
    log.info({ count }, "Canceled pending plans");
    return { kind: "canceled", count };
  }

  if (!item) {
    if (action === "replace_all") {
      const count = plans.cancelAllPlans(chatId, now);
      log.info({ count }, "Replace with no item cleared pending plans");
      return { kind: "canceled", count };
    }
    return { kind: "none" };
  }

  const drop = (reason: DropReason): PlanningOutcome => {
    log.info({ reason }, "Dropped planning directive");
    return { kind: "dropped", reason };
  };

  if (!shouldScheduleProactive(config, input.chatKind)) return drop("proactive_disabled");
  if (!canUsePlan(item, config)) return drop("low_confidence");

  const today = localDateKey(now, config.timezone);
  if (effectiveDailyCount(input.conversation, today) >= config.proactive.maxPerDay) {
    return drop("daily_cap");
  }

  const desired = parseSendAt(item.sendAt, config.timezone, log);
  if (!desired) return drop("unparsable_send_at");

  let candidate = desired;
  const cooldownUntil = cooldownBoundary(input.conversation.lastBotAt, config.proactive.cooldownHours);
  if (cooldownUntil !== null && candidate.epochMs < cooldownUntil) {
    candidate = zoned(cooldownUntil, config.timezone);
  }

  const sendAt = sanitizeScheduleTime(
    candidate,
    zoned(now, config.timezone),
    parseQuietBlocks(config.quietHours),
  ).epochMs;

  const draft: PlanDraft = {
    sendAt,
    text: item.text.trim() || "(empty)",
    gifTag: item.gifTag ?? null,
    reason: item.reason,
    confidence: item.confidence,
  };

  if (action === "replace_all") {
    plans.replacePlans(chatId, [draft], now);
    log.info({ sendAt }, "Replaced pending plans");
    return { kind: "scheduled", mode: "replace", sendAt };
  }

  if (action === "append") {
    if (input.pendingCount >= config.proactive.maxPendingPerChat) return drop("pending_cap");
    // Another turn may have appended while the model was generating.
    if (!plans.appendPlans(chatId, [draft], now, config.proactive.maxPendingPerChat)) {
      return drop("pending_cap");
    }
    log.info({ sendAt }, "Appended plan");
    return { kind: "scheduled", mode: "append", sendAt };
  }

  return { kind: "none" };
}
