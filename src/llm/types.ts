import { z } from "zod";
import type { PlanItem, PlanningDirective } from "../proactive/types.js";

// Wire shape requested from the model. Keys stay snake_case to match the
// schema hint sent in the prompt.

const replySchema = z.object({
  text: z.string(),
  send_gif: z.boolean().default(false),
  gif_tag: z.string().nullable().default(null),
});

const planItemSchema = z.object({
  send_at: z.string(),
  text: z.string(),
  gif_tag: z.string().nullable().default(null),
  reason: z.string().default(""),
  confidence: z.number().default(0),
});

const planningSchema = z.object({
  action: z.enum(["none", "cancel_all", "replace_all", "append"]).default("none"),
  items: z.array(planItemSchema).default([]),
});

const memoryUpdateSchema = z.object({
  type: z.enum(["preference", "fact", "none"]).default("none"),
  key: z.string().default(""),
  value: z.string().default(""),
});

export const llmOutputSchema = z.object({
  reply: replySchema,
  planning: planningSchema,
  memory_updates: z.array(memoryUpdateSchema).default([]),
});

export type LlmOutputWire = z.infer<typeof llmOutputSchema>;

export interface ModelReply {
  readonly text: string;
  readonly sendGif: boolean;
  readonly gifTag: string | null;
}

export interface MemoryUpdate {
  readonly type: "preference" | "fact" | "none";
  readonly key: string;
  readonly value: string;
}

export interface ModelOutput {
  readonly reply: ModelReply;
  readonly planning: PlanningDirective;
  readonly memoryUpdates: readonly MemoryUpdate[];
}

export interface ContextMessage {
  readonly role: string;
  readonly content: string;
  readonly ts: string;
  readonly msg_type: string;
}

export interface ContextPlan {
  readonly send_at: string;
  readonly text: string;
  readonly gif_tag: string | null;
  readonly status: string;
  readonly reason: string;
  readonly confidence: number;
}

/** Everything the model sees for one turn. */
export interface LlmContext {
  readonly incomingText: string;
  readonly localTime: string;
  readonly timezone: string;
  readonly settings: Record<string, unknown>;
  readonly summary: string;
  readonly recentMessages: readonly ContextMessage[];
  readonly pendingPlans: readonly ContextPlan[];
  readonly counters: {
    readonly last_bot_at: string | null;
    readonly daily_count: number;
    readonly daily_date: string | null;
  };
}

export interface ModelClient {
  generate(context: LlmContext): Promise<ModelOutput>;
}

export function toModelOutput(wire: LlmOutputWire): ModelOutput {
  return {
    reply: {
      text: wire.reply.text,
      sendGif: wire.reply.send_gif,
      gifTag: wire.reply.gif_tag,
    },
    planning: {
      action: wire.planning.action,
      items: wire.planning.items.map(
        (item): PlanItem => ({
          sendAt: item.send_at,
          text: item.text,
          gifTag: item.gif_tag,
          reason: item.reason,
          confidence: item.confidence,
        }),
      ),
    },
    memoryUpdates: wire.memory_updates,
  };
}
