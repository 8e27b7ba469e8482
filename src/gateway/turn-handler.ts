import type { BotConfig, ChatKind } from "../config/types.js";
import type { Connector } from "../connectors/connector.js";
import type { ConversationStore } from "../conversation/store.js";
import type { Conversation } from "../conversation/types.js";
import type { ModelClient } from "../llm/types.js";
import type { Logger } from "../logging/logger.js";
import type { GifLibrary } from "../media/gif-library.js";
import type { PlanStore } from "../proactive/store.js";
import type { PlanningOutcome } from "../proactive/types.js";
import { buildLlmContext } from "../llm/context.js";
import { applyPlanning } from "../proactive/planner.js";
import { allowGif, shouldReplyInGroup, type RandomSource } from "../proactive/policy.js";
import { updateSummary } from "../conversation/summary.js";
import { localDateKey } from "../utils/time.js";

/** Normalized inbound chat message. `ts` is epoch milliseconds. */
export interface InboundMessage {
  readonly chatId: string;
  readonly chatKind: ChatKind;
  readonly senderId: string;
  readonly ts: number;
  readonly text: string;
  readonly isMention: boolean;
}

export type TurnResult =
  | { readonly kind: "replied"; readonly reply: string; readonly planning: PlanningOutcome }
  | { readonly kind: "skipped"; readonly reason: "group_not_mentioned" };

export interface TurnHandlerDeps {
  conversations: ConversationStore;
  plans: PlanStore;
  connector: Connector;
  gifs: GifLibrary;
  model: ModelClient;
  config: BotConfig;
  logger: Logger;
  random?: RandomSource;
  now?: () => number;
}

export class TurnHandler {
  private readonly logger: Logger;
  private readonly random: RandomSource;
  private readonly now: () => number;

  constructor(private readonly deps: TurnHandlerDeps) {
    this.logger = deps.logger.child({ component: "turn" });
    this.random = deps.random ?? Math.random;
    this.now = deps.now ?? Date.now;
  }

  async handle(msg: InboundMessage): Promise<TurnResult> {
    const { conversations, plans, connector, config } = this.deps;
    const log = this.logger.child({ chatId: msg.chatId });

    let conversation = conversations.ensureConversation(msg.chatId, msg.chatKind);
    conversations.addMessage({
      chatId: msg.chatId,
      senderId: msg.senderId,
      role: "user",
      ts: msg.ts,
      content: msg.text,
      msgType: "text",
    });
    conversations.updateLastUserAt(msg.chatId, msg.ts);
    conversation = conversations.rollDailyCounter(
      conversation,
      localDateKey(this.now(), config.timezone),
    );

    if (msg.chatKind === "group" && !shouldReplyInGroup(msg.isMention, config.groups)) {
      this.refreshSummary(conversation);
      log.debug("Group message without mention, not replying");
      return { kind: "skipped", reason: "group_not_mentioned" };
    }

    const recent = conversations.getRecentMessages(msg.chatId, config.memory.recentMessages);
    const pending = plans.getPendingPlans(msg.chatId);
    const context = buildLlmContext({
      config,
      conversation,
      incomingText: msg.text,
      recent,
      pending,
      now: this.now(),
    });
    const output = await this.deps.model.generate(context);

    const reply = output.reply.text.trim() || "Got it.";
    await connector.sendText(msg.chatId, reply);
    const sentAt = this.now();
    conversations.addMessage({
      chatId: msg.chatId,
      senderId: "bot",
      role: "bot",
      ts: sentAt,
      content: reply,
      msgType: "text",
    });
    conversations.updateLastBotAt(msg.chatId, sentAt);
    conversation = { ...conversation, lastBotAt: sentAt };

    if (output.reply.sendGif && allowGif(config.gifRate, this.random)) {
      const gifPath = this.deps.gifs.pickGif(output.reply.gifTag);
      if (gifPath) {
        await connector.sendGif(msg.chatId, gifPath);
        conversations.addMessage({
          chatId: msg.chatId,
          senderId: "bot",
          role: "bot",
          ts: sentAt,
          content: gifPath,
          msgType: "gif",
        });
      }
    }

    const planning = applyPlanning(
      { plans, config, logger: log, now: this.now },
      {
        chatId: msg.chatId,
        chatKind: msg.chatKind,
        action: output.planning.action,
        item: output.planning.items[0] ?? null,
        pendingCount: pending.length,
        conversation,
      },
    );

    this.refreshSummary(conversation);
    return { kind: "replied", reply, planning };
  }

  private refreshSummary(conversation: Conversation): void {
    const { conversations, config } = this.deps;
    const recent = conversations.getRecentMessages(conversation.chatId, config.memory.recentMessages);
    conversations.updateSummary(
      conversation.chatId,
      updateSummary(conversation.summary, recent, config.memory.summaryMaxChars),
    );
  }
}
