import type { BotConfig } from "../config/types.js";
import type { Conversation, MessageRecord } from "../conversation/types.js";
import type { Plan } from "../proactive/types.js";
import type { LlmContext } from "./types.js";
import { formatZoned } from "../utils/time.js";

export const SYSTEM_PROMPT = `You are a chat assistant. Respond ONLY with valid JSON that matches the schema provided.
Rules:
- Keep replies short and natural.
- Do not schedule unless proactive is enabled and it improves the conversation.
- Do not schedule generic spam.
- Prefer replace_all when rescheduling.
- Never schedule inside quiet hours; if needed, schedule at the next allowed time.
- At most one scheduled item.
- If no schedule, set planning.action to "none" and planning.items to [].`;

export const SCHEMA_HINT = {
  reply: { text: "string", send_gif: true, gif_tag: "string|null" },
  planning: {
    action: "none|cancel_all|replace_all|append",
    items: [
      {
        send_at: "2026-01-18T21:30:00-05:00",
        text: "string",
        gif_tag: "string|null",
        reason: "string",
        confidence: 0.0,
      },
    ],
  },
  memory_updates: [{ type: "preference|fact|none", key: "string", value: "string" }],
} as const;

export interface ContextInput {
  readonly config: BotConfig;
  readonly conversation: Conversation;
  readonly incomingText: string;
  readonly recent: readonly MessageRecord[];
  readonly pending: readonly Plan[];
  readonly now: number;
}

export function buildLlmContext(input: ContextInput): LlmContext {
  const { config, conversation, now } = input;
  const tz = config.timezone;

  return {
    incomingText: input.incomingText,
    localTime: formatZoned(now, tz),
    timezone: tz,
    settings: {
      tone: config.tone,
      gif_rate: config.gifRate,
      proactive: {
        enabled: config.proactive.enabled,
        max_per_day: config.proactive.maxPerDay,
        cooldown_hours: config.proactive.cooldownHours,
        min_confidence: config.proactive.minConfidence,
        max_pending_per_chat: config.proactive.maxPendingPerChat,
      },
      quiet_hours: config.quietHours.map((q) => ({ start: q.start, end: q.end })),
      groups: {
        allow_proactive: config.groups.allowProactive,
        reply_only_when_mentioned: config.groups.replyOnlyWhenMentioned,
      },
    },
    summary: conversation.summary,
    recentMessages: input.recent.map((msg) => ({
      role: msg.role,
      content: msg.content,
      ts: formatZoned(msg.ts, tz),
      msg_type: msg.msgType,
    })),
    pendingPlans: input.pending.map((plan) => ({
      send_at: formatZoned(plan.sendAt, tz),
      text: plan.text,
      gif_tag: plan.gifTag,
      status: plan.status,
      reason: plan.reason,
      confidence: plan.confidence,
    })),
    counters: {
      last_bot_at: conversation.lastBotAt === null ? null : formatZoned(conversation.lastBotAt, tz),
      daily_count: conversation.dailyCount,
      daily_date: conversation.dailyDate,
    },
  };
}

/** User message carrying the schema hint and the turn context as JSON. */
export function buildUserPrompt(context: LlmContext): string {
  return JSON.stringify({
    schema: SCHEMA_HINT,
    context: {
      local_time: context.localTime,
      timezone: context.timezone,
      settings: context.settings,
      summary: context.summary,
      recent_messages: context.recentMessages,
      pending_plans: context.pendingPlans,
      policy_counters: context.counters,
      incoming_text: context.incomingText,
    },
  });
}
