import type { BotConfig, ChatKind, GroupsConfig } from "../config/types.js";
import type { Conversation } from "../conversation/types.js";
import type { Logger } from "../logging/logger.js";
import type { PlanItem } from "./types.js";
import { isWithinQuietHours, nextAllowedTime, type QuietBlock } from "./quiet-hours.js";
import {
  MS_PER_HOUR,
  MS_PER_MINUTE,
  MS_PER_SECOND,
  zoned,
  zonedEpoch,
  type ZonedInstant,
} from "../utils/time.js";

/** Uniform draw in [0, 1). */
export type RandomSource = () => number;

export const MIN_SCHEDULE_DELAY_MS = 60 * MS_PER_SECOND;

const GIF_RATE_PROBABILITY = new Map<string, number>([
  ["off", 0],
  ["low", 0.2],
  ["medium", 0.5],
  ["high", 0.8],
]);

export function shouldReplyInGroup(isMention: boolean, groups: GroupsConfig): boolean {
  if (!groups.replyOnlyWhenMentioned) return true;
  return isMention;
}

export function allowGif(gifRate: string, random: RandomSource = Math.random): boolean {
  const probability = GIF_RATE_PROBABILITY.get(gifRate) ?? 0;
  if (probability <= 0) return false;
  return random() < probability;
}

export function shouldScheduleProactive(config: BotConfig, chatKind: ChatKind): boolean {
  if (!config.proactive.enabled) return false;
  if (chatKind === "group" && !config.groups.allowProactive) return false;
  return true;
}

export function canUsePlan(item: Pick<PlanItem, "confidence">, config: BotConfig): boolean {
  return item.confidence >= config.proactive.minConfidence;
}

/** Count of proactive sends that applies on `today`; stale dates count as zero. */
export function effectiveDailyCount(
  conversation: Pick<Conversation, "dailyCount" | "dailyDate">,
  today: string,
): number {
  return conversation.dailyDate === today ? conversation.dailyCount : 0;
}

export function cooldownBoundary(lastBotAt: number | null, cooldownHours: number): number | null {
  if (lastBotAt === null) return null;
  return lastBotAt + cooldownHours * MS_PER_HOUR;
}

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?(Z|[+-]\d{2}(?::?\d{2})?)?)?$/;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function parseOffsetMinutes(raw: string): number | null {
  if (raw === "Z") return 0;
  const sign = raw.startsWith("-") ? -1 : 1;
  const digits = raw.slice(1).replace(":", "");
  const hours = parseInt(digits.slice(0, 2), 10);
  const minutes = digits.length > 2 ? parseInt(digits.slice(2), 10) : 0;
  if (hours > 23 || minutes > 59) return null;
  return sign * (hours * 60 + minutes);
}

/**
 * Parse a model-proposed send time. Values without an offset are read as
 * wall-clock time in `timeZone`. The result is expressed in `timeZone`.
 */
export function parseSendAt(raw: string, timeZone: string, logger?: Logger): ZonedInstant | null {
  const match = ISO_PATTERN.exec(raw.trim());
  if (!match) return null;

  const [, y, mo, d, h, mi, s, frac, offset] = match;
  const wall = {
    year: Number(y),
    month: Number(mo),
    day: Number(d),
    hour: h ? Number(h) : 0,
    minute: mi ? Number(mi) : 0,
    second: s ? Number(s) : 0,
    millisecond: frac ? Number(`${frac}00`.slice(0, 3)) : 0,
  };

  if (
    wall.month < 1 ||
    wall.month > 12 ||
    wall.day < 1 ||
    wall.day > daysInMonth(wall.year, wall.month) ||
    wall.hour > 23 ||
    wall.minute > 59 ||
    wall.second > 59
  ) {
    return null;
  }

  if (offset) {
    const offsetMinutes = parseOffsetMinutes(offset);
    if (offsetMinutes === null) return null;
    const asUtc = Date.UTC(
      wall.year,
      wall.month - 1,
      wall.day,
      wall.hour,
      wall.minute,
      wall.second,
      wall.millisecond,
    );
    return zoned(asUtc - offsetMinutes * MS_PER_MINUTE, timeZone);
  }

  logger?.warn({ sendAt: raw, timeZone }, "send_at has no offset, assuming configured timezone");
  return zoned(zonedEpoch(wall, timeZone), timeZone);
}

/**
 * Push `candidate` to at least MIN_SCHEDULE_DELAY_MS after `localNow`, then out
 * of any quiet block.
 */
export function sanitizeScheduleTime(
  candidate: ZonedInstant,
  localNow: ZonedInstant,
  blocks: readonly QuietBlock[],
): ZonedInstant {
  const earliest = localNow.epochMs + MIN_SCHEDULE_DELAY_MS;
  let sendAt = zoned(Math.max(candidate.epochMs, earliest), localNow.timeZone);
  if (isWithinQuietHours(sendAt, blocks)) {
    sendAt = nextAllowedTime(sendAt, blocks);
  }
  return sendAt;
}
