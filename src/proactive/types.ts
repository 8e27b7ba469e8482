export type PlanStatus = "pending" | "sent" | "canceled";

export interface Plan {
  readonly id: number;
  readonly chatId: string;
  readonly sendAt: number;
  readonly text: string;
  readonly gifTag: string | null;
  readonly status: PlanStatus;
  readonly reason: string;
  readonly confidence: number;
  readonly createdAt: number;
  readonly updatedAt: number;
}

/** A plan row before insertion. */
export interface PlanDraft {
  readonly sendAt: number;
  readonly text: string;
  readonly gifTag: string | null;
  readonly reason: string;
  readonly confidence: number;
}

export type PlanningAction = "none" | "cancel_all" | "replace_all" | "append";

/** Candidate follow-up proposed by the model for one turn. */
export interface PlanItem {
  /** ISO-8601 instant, or local wall-clock time when no offset is given. */
  readonly sendAt: string;
  readonly text: string;
  readonly gifTag?: string | null;
  readonly reason: string;
  readonly confidence: number;
}

export interface PlanningDirective {
  readonly action: PlanningAction;
  readonly items: readonly PlanItem[];
}

export type DropReason =
  | "proactive_disabled"
  | "low_confidence"
  | "daily_cap"
  | "unparsable_send_at"
  | "pending_cap";

export type PlanningOutcome =
  | { readonly kind: "none" }
  | { readonly kind: "canceled"; readonly count: number }
  | { readonly kind: "dropped"; readonly reason: DropReason }
  | {
      readonly kind: "scheduled";
      readonly mode: "replace" | "append";
      readonly sendAt: number;
    };

export interface TickReport {
  readonly due: number;
  readonly sent: number;
  readonly canceled: number;
  readonly rescheduled: number;
  readonly failed: number;
}
