/**
 * Wall-clock helpers on top of Intl. Instants are epoch milliseconds; a
 * ZonedInstant pairs one with the IANA zone its wall-clock fields are read in.
 */

export interface WallClock {
  readonly year: number;
  /** 1-12 */
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly millisecond: number;
}

export interface ZonedInstant {
  readonly epochMs: number;
  readonly timeZone: string;
}

export const MS_PER_SECOND = 1_000;
export const MS_PER_MINUTE = 60_000;
export const MS_PER_HOUR = 3_600_000;
export const MS_PER_DAY = 86_400_000;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
    formatters.set(timeZone, fmt);
  }
  return fmt;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    formatterFor(timeZone);
    return true;
  } catch {
    return false;
  }
}

export function zoned(epochMs: number, timeZone: string): ZonedInstant {
  return { epochMs, timeZone };
}

export function wallClockAt(epochMs: number, timeZone: string): WallClock {
  const parts = formatterFor(timeZone).formatToParts(new Date(epochMs));
  const get = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find((p) => p.type === type);
    return part ? parseInt(part.value, 10) : 0;
  };
  return {
    year: get("year"),
    month: get("month"),
    day: get("day"),
    hour: get("hour") % 24,
    minute: get("minute"),
    second: get("second"),
    millisecond: ((epochMs % MS_PER_SECOND) + MS_PER_SECOND) % MS_PER_SECOND,
  };
}

function wallAsUtc(wall: WallClock): number {
  return Date.UTC(
    wall.year,
    wall.month - 1,
    wall.day,
    wall.hour,
    wall.minute,
    wall.second,
    wall.millisecond,
  );
}

/** Offset of `timeZone` from UTC at the given instant, in ms (east positive). */
export function zoneOffsetMs(epochMs: number, timeZone: string): number {
  return wallAsUtc(wallClockAt(epochMs, timeZone)) - epochMs;
}

/**
 * Resolve wall-clock fields in `timeZone` to an instant. Ambiguous times
 * resolve to their first occurrence; times inside a DST gap take the offset
 * in force before the transition, which moves them forward by the gap length.
 */
export function zonedEpoch(wall: WallClock, timeZone: string): number {
  const asUtc = wallAsUtc(wall);
  const before = asUtc - zoneOffsetMs(asUtc - MS_PER_DAY, timeZone);
  const after = asUtc - zoneOffsetMs(asUtc + MS_PER_DAY, timeZone);
  const matches = [before, after].filter(
    (candidate) => wallAsUtc(wallClockAt(candidate, timeZone)) === asUtc,
  );
  return matches.length > 0 ? Math.min(...matches) : before;
}

export function addDays(wall: WallClock, days: number): WallClock {
  const d = new Date(Date.UTC(wall.year, wall.month - 1, wall.day + days));
  return {
    ...wall,
    year: d.getUTCFullYear(),
    month: d.getUTCMonth() + 1,
    day: d.getUTCDate(),
  };
}

export function msOfDay(wall: WallClock): number {
  return (
    wall.hour * MS_PER_HOUR +
    wall.minute * MS_PER_MINUTE +
    wall.second * MS_PER_SECOND +
    wall.millisecond
  );
}

export function withTimeOfDay(wall: WallClock, timeOfDayMs: number): WallClock {
  return {
    ...wall,
    hour: Math.floor(timeOfDayMs / MS_PER_HOUR),
    minute: Math.floor((timeOfDayMs % MS_PER_HOUR) / MS_PER_MINUTE),
    second: Math.floor((timeOfDayMs % MS_PER_MINUTE) / MS_PER_SECOND),
    millisecond: timeOfDayMs % MS_PER_SECOND,
  };
}

const pad = (n: number, width = 2): string => String(n).padStart(width, "0");

/** Local calendar date as YYYY-MM-DD. */
export function localDateKey(epochMs: number, timeZone: string): string {
  const wall = wallClockAt(epochMs, timeZone);
  return `${pad(wall.year, 4)}-${pad(wall.month)}-${pad(wall.day)}`;
}

/** ISO-8601 with the zone's offset, e.g. 2026-01-18T21:30:00-05:00. */
export function formatZoned(epochMs: number, timeZone: string): string {
  const wall = wallClockAt(epochMs, timeZone);
  const offsetMin = Math.round(zoneOffsetMs(epochMs, timeZone) / MS_PER_MINUTE);
  const sign = offsetMin < 0 ? "-" : "+";
  const abs = Math.abs(offsetMin);
  return (
    `${pad(wall.year, 4)}-${pad(wall.month)}-${pad(wall.day)}` +
    `T${pad(wall.hour)}:${pad(wall.minute)}:${pad(wall.second)}` +
    `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`
  );
}
