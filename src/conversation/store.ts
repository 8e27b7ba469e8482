import type { StateDB } from "../storage/db.js";
import type { ChatKind } from "../config/types.js";
import type { Conversation, MessageRecord, MessageRole, MessageType } from "./types.js";

interface ConversationRow {
  chat_id: string;
  chat_kind: ChatKind;
  summary: string;
  last_user_at: number | null;
  last_bot_at: number | null;
  daily_count: number;
  daily_date: string | null;
}

interface MessageRow {
  chat_id: string;
  sender_id: string;
  role: MessageRole;
  ts: number;
  content: string;
  msg_type: MessageType;
}

export class ConversationNotFoundError extends Error {
  constructor(readonly chatId: string) {
    super(`Conversation not found: ${chatId}`);
    this.name = "ConversationNotFoundError";
  }
}

export class ConversationStore {
  private readonly db;

  constructor(stateDb: StateDB) {
    this.db = stateDb.raw();
  }

  // ── Conversations ──

  ensureConversation(chatId: string, chatKind: ChatKind): Conversation {
    const ensure = this.db.transaction(() => {
      const existing = this.findRow(chatId);
      if (!existing) {
        this.db
          .prepare("INSERT INTO conversations (chat_id, chat_kind, summary, daily_count) VALUES (?, ?, '', 0)")
          .run(chatId, chatKind);
      } else if (existing.chat_kind !== chatKind) {
        this.db
          .prepare("UPDATE conversations SET chat_kind = ? WHERE chat_id = ?")
          .run(chatKind, chatId);
      }
    });
    ensure();
    return this.getConversation(chatId);
  }

  getConversation(chatId: string): Conversation {
    const row = this.findRow(chatId);
    if (!row) throw new ConversationNotFoundError(chatId);
    return this.toConversation(row);
  }

  updateSummary(chatId: string, summary: string): void {
    this.db.prepare("UPDATE conversations SET summary = ? WHERE chat_id = ?").run(summary, chatId);
  }

  updateLastUserAt(chatId: string, ts: number): void {
    this.db.prepare("UPDATE conversations SET last_user_at = ? WHERE chat_id = ?").run(ts, chatId);
  }

  updateLastBotAt(chatId: string, ts: number): void {
    this.db.prepare("UPDATE conversations SET last_bot_at = ? WHERE chat_id = ?").run(ts, chatId);
  }

  updateDailyCounter(chatId: string, dailyCount: number, dailyDate: string): void {
    this.db
      .prepare("UPDATE conversations SET daily_count = ?, daily_date = ? WHERE chat_id = ?")
      .run(dailyCount, dailyDate, chatId);
  }

  /**
   * Reset the daily counter when `today` differs from the stored date.
   * Returns the conversation as it stands afterwards.
   */
  rollDailyCounter(conversation: Conversation, today: string): Conversation {
    if (conversation.dailyDate === today) return conversation;
    this.updateDailyCounter(conversation.chatId, 0, today);
    return { ...conversation, dailyCount: 0, dailyDate: today };
  }

  // ── Message history ──

  addMessage(record: MessageRecord): void {
    this.db
      .prepare(
        `INSERT INTO messages (chat_id, sender_id, role, ts, content, msg_type)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(record.chatId, record.senderId, record.role, record.ts, record.content, record.msgType);
  }

  /** Most recent `limit` messages, oldest first. */
  getRecentMessages(chatId: string, limit: number): MessageRecord[] {
    const rows = this.db
      .prepare<[string, number], MessageRow>(
        `SELECT chat_id, sender_id, role, ts, content, msg_type FROM messages
         WHERE chat_id = ?
         ORDER BY ts DESC, id DESC LIMIT ?`,
      )
      .all(chatId, limit);
    return rows.reverse().map((r) => ({
      chatId: r.chat_id,
      senderId: r.sender_id,
      role: r.role,
      ts: r.ts,
      content: r.content,
      msgType: r.msg_type,
    }));
  }

  // ── Row mappers ──

  private findRow(chatId: string): ConversationRow | undefined {
    return this.db
      .prepare<[string], ConversationRow>("SELECT * FROM conversations WHERE chat_id = ?")
      .get(chatId);
  }

  private toConversation(row: ConversationRow): Conversation {
    return {
      chatId: row.chat_id,
      chatKind: row.chat_kind,
      summary: row.summary,
      lastUserAt: row.last_user_at,
      lastBotAt: row.last_bot_at,
      dailyCount: row.daily_count,
      dailyDate: row.daily_date,
    };
  }
}
