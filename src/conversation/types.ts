import type { ChatKind } from "../config/types.js";

export interface Conversation {
  readonly chatId: string;
  readonly chatKind: ChatKind;
  readonly summary: string;
  readonly lastUserAt: number | null;
  readonly lastBotAt: number | null;
  /** Proactive sends on dailyDate; meaningless on any other local date. */
  readonly dailyCount: number;
  readonly dailyDate: string | null;
}

export type MessageRole = "user" | "bot";
export type MessageType = "text" | "gif";

export interface MessageRecord {
  readonly chatId: string;
  readonly senderId: string;
  readonly role: MessageRole;
  readonly ts: number;
  readonly content: string;
  readonly msgType: MessageType;
}
