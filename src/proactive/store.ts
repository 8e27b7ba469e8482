import type { StateDB } from "../storage/db.js";
import type { Plan, PlanDraft, PlanStatus } from "./types.js";

export const DEFAULT_DUE_LIMIT = 50;

interface PlanRow {
  id: number;
  chat_id: string;
  send_at: number;
  text: string;
  gif_tag: string | null;
  status: PlanStatus;
  reason: string | null;
  confidence: number;
  created_at: number;
  updated_at: number;
}

/**
 * Scheduled proactive messages. better-sqlite3 runs every statement
 * synchronously, so each method completes before any other caller's; every
 * single-row transition only touches rows that are still pending.
 */
export class PlanStore {
  private readonly db;

  constructor(stateDb: StateDB) {
    this.db = stateDb.raw();
  }

  // ── Queries ──

  getPlan(id: number): Plan | null {
    const row = this.db.prepare<[number], PlanRow>("SELECT * FROM plans WHERE id = ?").get(id);
    return row ? this.toPlan(row) : null;
  }

  getPendingPlans(chatId: string): Plan[] {
    const rows = this.db
      .prepare<[string], PlanRow>(
        `SELECT * FROM plans
         WHERE chat_id = ? AND status = 'pending'
         ORDER BY send_at ASC, id ASC`,
      )
      .all(chatId);
    return rows.map((r) => this.toPlan(r));
  }

  countPendingPlans(chatId: string): number {
    const row = this.db
      .prepare<[string], { cnt: number }>(
        "SELECT COUNT(*) AS cnt FROM plans WHERE chat_id = ? AND status = 'pending'",
      )
      .get(chatId);
    return row?.cnt ?? 0;
  }

  getDuePlans(now: number, limit = DEFAULT_DUE_LIMIT): Plan[] {
    const rows = this.db
      .prepare<[number, number], PlanRow>(
        `SELECT * FROM plans
         WHERE status = 'pending' AND send_at <= ?
         ORDER BY send_at ASC, id ASC LIMIT ?`,
      )
      .all(now, limit);
    return rows.map((r) => this.toPlan(r));
  }

  // ── Mutations ──

  addPlan(chatId: string, draft: PlanDraft, now: number): number {
    const result = this.db
      .prepare(
        `INSERT INTO plans
         (chat_id, send_at, text, gif_tag, status, reason, confidence, created_at, updated_at)
         VALUES (?, ?, ?, ?, 'pending', ?, ?, ?, ?)`,
      )
      .run(chatId, draft.sendAt, draft.text, draft.gifTag, draft.reason, draft.confidence, now, now);
    return Number(result.lastInsertRowid);
  }

  /** Cancel every pending plan for the chat and insert `drafts`, atomically. */
  replacePlans(chatId: string, drafts: readonly PlanDraft[], now: number): number[] {
    const replace = this.db.transaction(() => {
      this.cancelPending(chatId, now);
      return drafts.map((draft) => this.addPlan(chatId, draft, now));
    });
    return replace();
  }

  /**
   * Insert `drafts` alongside existing pending plans. The pending count is
   * checked inside the same transaction; returns null, inserting nothing, when
   * the chat would end up with more than `maxPending` pending plans.
   */
  appendPlans(
    chatId: string,
    drafts: readonly PlanDraft[],
    now: number,
    maxPending = Number.POSITIVE_INFINITY,
  ): number[] | null {
    const append = this.db.transaction(() => {
      if (this.countPendingPlans(chatId) + drafts.length > maxPending) return null;
      return drafts.map((draft) => this.addPlan(chatId, draft, now));
    });
    return append();
  }

  cancelAllPlans(chatId: string, now: number): number {
    return this.cancelPending(chatId, now);
  }

  markPlanSent(id: number, now: number): boolean {
    return this.transition(id, "sent", now);
  }

  markPlanCanceled(id: number, now: number): boolean {
    return this.transition(id, "canceled", now);
  }

  reschedulePlan(id: number, sendAt: number, now: number): boolean {
    const result = this.db
      .prepare("UPDATE plans SET send_at = ?, updated_at = ? WHERE id = ? AND status = 'pending'")
      .run(sendAt, now, id);
    return result.changes > 0;
  }

  private cancelPending(chatId: string, now: number): number {
    const result = this.db
      .prepare(
        "UPDATE plans SET status = 'canceled', updated_at = ? WHERE chat_id = ? AND status = 'pending'",
      )
      .run(now, chatId);
    return result.changes;
  }

  private transition(id: number, status: Exclude<PlanStatus, "pending">, now: number): boolean {
    const result = this.db
      .prepare("UPDATE plans SET status = ?, updated_at = ? WHERE id = ? AND status = 'pending'")
      .run(status, now, id);
    return result.changes > 0;
  }

  // ── Row mappers ──

  private toPlan(row: PlanRow): Plan {
    return {
      id: row.id,
      chatId: row.chat_id,
      sendAt: row.send_at,
      text: row.text,
      gifTag: row.gif_tag,
      status: row.status,
      reason: row.reason ?? "",
      confidence: row.confidence,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
