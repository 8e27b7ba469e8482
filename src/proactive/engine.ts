import type { PlanStore } from "./store.js";
import type { Plan, TickReport } from "./types.js";
import type { BotConfig } from "../config/types.js";
import type { ConversationStore } from "../conversation/store.js";
import type { Connector } from "../connectors/connector.js";
import type { GifLibrary } from "../media/gif-library.js";
import type { Logger } from "../logging/logger.js";
import {
  allowGif,
  cooldownBoundary,
  shouldScheduleProactive,
  type RandomSource,
} from "./policy.js";
import {
  isWithinQuietHours,
  nextAllowedTime,
  parseQuietBlocks,
  type QuietBlock,
} from "./quiet-hours.js";
import { DEFAULT_DUE_LIMIT } from "./store.js";
import { MS_PER_SECOND, localDateKey, zoned } from "../utils/time.js";

export interface ProactiveEngineDeps {
  plans: PlanStore;
  conversations: ConversationStore;
  connector: Connector;
  gifs: GifLibrary;
  logger: Logger;
  config: BotConfig;
  random?: RandomSource;
  now?: () => number;
}

type PlanResult = "sent" | "canceled" | "rescheduled";

/**
 * Sends due plans. Every policy check is repeated at send time because
 * settings, counters and cooldowns may have changed since the plan was made.
 */
export class ProactiveEngine {
  private readonly plans: PlanStore;
  private readonly conversations: ConversationStore;
  private readonly connector: Connector;
  private readonly gifs: GifLibrary;
  private readonly logger: Logger;
  private readonly config: BotConfig;
  private readonly random: RandomSource;
  private readonly now: () => number;
  private readonly blocks: QuietBlock[];

  private timer: ReturnType<typeof setInterval> | null = null;
  private ticking = false;

  constructor(deps: ProactiveEngineDeps) {
    this.plans = deps.plans;
    this.conversations = deps.conversations;
    this.connector = deps.connector;
    this.gifs = deps.gifs;
    this.logger = deps.logger.child({ component: "proactive" });
    this.config = deps.config;
    this.random = deps.random ?? Math.random;
    this.now = deps.now ?? Date.now;
    this.blocks = parseQuietBlocks(deps.config.quietHours);
  }

  start(): void {
    if (this.timer) return;
    const intervalMs = this.config.runtime.schedulerIntervalSeconds * MS_PER_SECOND;
    this.timer = setInterval(() => {
      this.tick().catch((err) => {
        this.logger.error({ err }, "Proactive tick error");
      });
    }, intervalMs);
    this.timer.unref();
    this.logger.info({ intervalMs }, "Proactive engine started");
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.logger.info("Proactive engine stopped");
  }

  async tick(): Promise<TickReport> {
    const report = { due: 0, sent: 0, canceled: 0, rescheduled: 0, failed: 0 };
    if (this.ticking) {
      this.logger.debug("Previous tick still running, skipping");
      return report;
    }

    this.ticking = true;
    try {
      const due = this.plans.getDuePlans(this.now(), DEFAULT_DUE_LIMIT);
      report.due = due.length;

      for (const plan of due) {
        try {
          const result = await this.processPlan(plan);
          report[result]++;
        } catch (err) {
          report.failed++;
          this.logger.error({ err, planId: plan.id, chatId: plan.chatId }, "Failed processing plan");
        }
      }
    } finally {
      this.ticking = false;
    }

    if (report.due > 0) this.logger.debug(report, "Proactive tick finished");
    return report;
  }

  private async processPlan(plan: Plan): Promise<PlanResult> {
    const now = this.now();
    const log = this.logger.child({ planId: plan.id, chatId: plan.chatId });
    let conversation = this.conversations.getConversation(plan.chatId);

    if (!shouldScheduleProactive(this.config, conversation.chatKind)) {
      this.plans.markPlanCanceled(plan.id, now);
      log.info("Canceled plan: proactive disabled");
      return "canceled";
    }

    const today = localDateKey(now, this.config.timezone);
    conversation = this.conversations.rollDailyCounter(conversation, today);
    if (conversation.dailyCount >= this.config.proactive.maxPerDay) {
      this.plans.markPlanCanceled(plan.id, now);
      log.info({ dailyCount: conversation.dailyCount }, "Canceled plan: daily limit reached");
      return "canceled";
    }

    const localNow = zoned(now, this.config.timezone);
    if (isWithinQuietHours(localNow, this.blocks)) {
      const next = nextAllowedTime(localNow, this.blocks).epochMs;
      this.plans.reschedulePlan(plan.id, next, now);
      log.info({ sendAt: next }, "Rescheduled plan: quiet hours");
      return "rescheduled";
    }

    const cooldownUntil = cooldownBoundary(conversation.lastBotAt, this.config.proactive.cooldownHours);
    if (cooldownUntil !== null && now < cooldownUntil) {
      this.plans.reschedulePlan(plan.id, cooldownUntil, now);
      log.info({ sendAt: cooldownUntil }, "Rescheduled plan: cooldown");
      return "rescheduled";
    }

    await this.connector.sendText(plan.chatId, plan.text);
    this.conversations.addMessage({
      chatId: plan.chatId,
      senderId: "bot",
      role: "bot",
      ts: now,
      content: plan.text,
      msgType: "text",
    });

    if (plan.gifTag && allowGif(this.config.gifRate, this.random)) {
      await this.sendGif(plan, now, log);
    }

    if (!this.plans.markPlanSent(plan.id, now)) {
      log.warn("Plan was no longer pending after delivery");
    }
    this.conversations.updateLastBotAt(plan.chatId, now);
    this.conversations.updateDailyCounter(plan.chatId, conversation.dailyCount + 1, today);
    log.info("Proactive message sent");
    return "sent";
  }

  private async sendGif(plan: Plan, now: number, log: Logger): Promise<void> {
    const gifPath = this.gifs.pickGif(plan.gifTag);
    if (!gifPath) return;
    try {
      await this.connector.sendGif(plan.chatId, gifPath);
    } catch (err) {
      // The text already went out; keep the plan from being re-sent over a gif.
      log.warn({ err, gifPath }, "Gif send failed");
      return;
    }
    this.conversations.addMessage({
      chatId: plan.chatId,
      senderId: "bot",
      role: "bot",
      ts: now,
      content: gifPath,
      msgType: "gif",
    });
  }
}
