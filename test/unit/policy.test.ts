import { describe, it, expect, vi } from "vitest";
import {
  MIN_SCHEDULE_DELAY_MS,
  allowGif,
  canUsePlan,
  cooldownBoundary,
  effectiveDailyCount,
  parseSendAt,
  sanitizeScheduleTime,
  shouldReplyInGroup,
  shouldScheduleProactive,
} from "../../src/proactive/policy.js";
import { isWithinQuietHours, parseQuietBlocks } from "../../src/proactive/quiet-hours.js";
import { MS_PER_HOUR, formatZoned, zoned } from "../../src/utils/time.js";
import { makeConfig, silentLogger } from "../helpers/fixtures.js";

describe("shouldReplyInGroup", () => {
  it("requires a mention when configured", () => {
    const groups = { allowProactive: false, replyOnlyWhenMentioned: true };
    expect(shouldReplyInGroup(false, groups)).toBe(false);
    expect(shouldReplyInGroup(true, groups)).toBe(true);
  });

  it("always replies when mentions are not required", () => {
    expect(shouldReplyInGroup(false, { allowProactive: false, replyOnlyWhenMentioned: false })).toBe(true);
  });
});

describe("allowGif", () => {
  it("never allows gifs when off", () => {
    expect(allowGif("off", () => 0)).toBe(false);
  });

  it("compares the draw against the rate probability", () => {
    expect(allowGif("low", () => 0.19)).toBe(true);
    expect(allowGif("low", () => 0.2)).toBe(false);
    expect(allowGif("medium", () => 0.49)).toBe(true);
    expect(allowGif("high", () => 0.79)).toBe(true);
    expect(allowGif("high", () => 0.8)).toBe(false);
  });

  it("treats unknown rates as off", () => {
    expect(allowGif("sometimes", () => 0)).toBe(false);
  });
});

describe("shouldScheduleProactive", () => {
  it("is off unless proactive is enabled", () => {
    expect(shouldScheduleProactive(makeConfig(), "direct")).toBe(false);
    expect(shouldScheduleProactive(makeConfig({ proactive: { enabled: true } }), "direct")).toBe(true);
  });

  it("requires allowProactive for groups", () => {
    const config = makeConfig({ proactive: { enabled: true } });
    expect(shouldScheduleProactive(config, "group")).toBe(false);
    const groups = makeConfig({ proactive: { enabled: true }, groups: { allowProactive: true } });
    expect(shouldScheduleProactive(groups, "group")).toBe(true);
  });
});

describe("canUsePlan", () => {
  it("accepts confidence at or above the threshold", () => {
    const config = makeConfig();
    expect(canUsePlan({ confidence: 0.6 }, config)).toBe(true);
    expect(canUsePlan({ confidence: 0.59 }, config)).toBe(false);
  });
});

describe("daily counter and cooldown", () => {
  it("counts only sends on the current local date", () => {
    expect(effectiveDailyCount({ dailyCount: 1, dailyDate: "2026-01-15" }, "2026-01-15")).toBe(1);
    expect(effectiveDailyCount({ dailyCount: 1, dailyDate: "2026-01-14" }, "2026-01-15")).toBe(0);
    expect(effectiveDailyCount({ dailyCount: 0, dailyDate: null }, "2026-01-15")).toBe(0);
  });

  it("computes the cooldown boundary from the last bot send", () => {
    expect(cooldownBoundary(null, 6)).toBeNull();
    expect(cooldownBoundary(1_000, 6)).toBe(1_000 + 6 * MS_PER_HOUR);
  });
});

describe("parseSendAt", () => {
  it("parses an explicit offset", () => {
    const result = parseSendAt("2026-01-18T21:30:00-05:00", "UTC");
    expect(result).toEqual({ epochMs: Date.UTC(2026, 0, 19, 2, 30), timeZone: "UTC" });
  });

  it("accepts Z, compact offsets and fractional seconds", () => {
    expect(parseSendAt("2026-01-18T21:30:00.250Z", "UTC")?.epochMs).toBe(
      Date.UTC(2026, 0, 18, 21, 30, 0, 250),
    );
    expect(parseSendAt("2026-01-18T10:00:00+0530", "UTC")?.epochMs).toBe(
      Date.UTC(2026, 0, 18, 4, 30),
    );
    expect(parseSendAt("2026-01-18 10:00+02", "UTC")?.epochMs).toBe(Date.UTC(2026, 0, 18, 8));
  });

  it("reads naive times in the configured zone and warns", () => {
    const logger = silentLogger();
    const warn = vi.spyOn(logger, "warn");
    const result = parseSendAt("2026-01-18T21:30:00", "America/New_York", logger);
    expect(result).toEqual({
      epochMs: Date.UTC(2026, 0, 19, 2, 30),
      timeZone: "America/New_York",
    });
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("reads an ambiguous naive time as its first occurrence", () => {
    expect(parseSendAt("2026-10-25T02:30:00", "Europe/Berlin")?.epochMs).toBe(
      Date.UTC(2026, 9, 25, 0, 30),
    );
  });

  it("treats a bare date as local midnight", () => {
    expect(parseSendAt("2026-01-18", "UTC")?.epochMs).toBe(Date.UTC(2026, 0, 18));
  });

  it("rejects malformed or out-of-range values", () => {
    expect(parseSendAt("tomorrow evening", "UTC")).toBeNull();
    expect(parseSendAt("", "UTC")).toBeNull();
    expect(parseSendAt("2026-02-30T10:00:00Z", "UTC")).toBeNull();
    expect(parseSendAt("2026-01-18T24:00:00Z", "UTC")).toBeNull();
    expect(parseSendAt("2026-01-18T10:00:00+25:00", "UTC")).toBeNull();
  });
});

describe("sanitizeScheduleTime", () => {
  const blocks = parseQuietBlocks([{ start: "22:00", end: "07:00" }]);
  const now = zoned(Date.UTC(2026, 0, 15, 12), "UTC");

  it("enforces the minimum delay", () => {
    const past = zoned(Date.UTC(2026, 0, 15, 11), "UTC");
    expect(sanitizeScheduleTime(past, now, blocks).epochMs).toBe(now.epochMs + MIN_SCHEDULE_DELAY_MS);
  });

  it("keeps an allowed future time", () => {
    const later = zoned(Date.UTC(2026, 0, 15, 18), "UTC");
    expect(sanitizeScheduleTime(later, now, blocks).epochMs).toBe(later.epochMs);
  });

  it("moves a quiet time to the end of the block", () => {
    const quiet = zoned(Date.UTC(2026, 0, 15, 23), "UTC");
    const result = sanitizeScheduleTime(quiet, now, blocks);
    expect(result.epochMs).toBe(Date.UTC(2026, 0, 16, 7));
    expect(isWithinQuietHours(result, blocks)).toBe(false);
  });

  it("is idempotent", () => {
    const quiet = zoned(Date.UTC(2026, 0, 15, 23), "UTC");
    const once = sanitizeScheduleTime(quiet, now, blocks);
    expect(sanitizeScheduleTime(once, now, blocks)).toEqual(once);
  });

  it("leaves a block whose end falls in a spring-forward gap", () => {
    const tz = "America/New_York";
    const early = parseQuietBlocks([{ start: "01:00", end: "02:30" }]);
    const localNow = zoned(Date.UTC(2026, 2, 8, 5), tz);
    const candidate = zoned(Date.UTC(2026, 2, 8, 6, 15), tz);

    const result = sanitizeScheduleTime(candidate, localNow, early);

    expect(formatZoned(result.epochMs, tz)).toBe("2026-03-08T03:30:00-04:00");
    expect(isWithinQuietHours(result, early)).toBe(false);
  });

  it("expresses the result in the zone of now", () => {
    const candidate = zoned(Date.UTC(2026, 0, 15, 18), "Asia/Tokyo");
    const local = zoned(Date.UTC(2026, 0, 15, 12), "America/New_York");
    expect(sanitizeScheduleTime(candidate, local, []).timeZone).toBe("America/New_York");
  });
});
