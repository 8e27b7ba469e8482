import type { QuietHoursConfig } from "../config/types.js";
import {
  MS_PER_HOUR,
  MS_PER_MINUTE,
  MS_PER_SECOND,
  addDays,
  msOfDay,
  wallClockAt,
  withTimeOfDay,
  zonedEpoch,
  type ZonedInstant,
} from "../utils/time.js";

export interface QuietBlock {
  /** Milliseconds since local midnight. */
  readonly start: number;
  readonly end: number;
}

/** Passes over the block list before nextAllowedTime gives up. */
export const MAX_QUIET_PASSES = 5;

export function parseTimeOfDay(value: string): number {
  const [h = "0", m = "0", s = "0"] = value.split(":");
  return (
    parseInt(h, 10) * MS_PER_HOUR +
    parseInt(m, 10) * MS_PER_MINUTE +
    parseInt(s, 10) * MS_PER_SECOND
  );
}

export function parseQuietBlocks(config: readonly QuietHoursConfig[]): QuietBlock[] {
  return config.map((block) => ({
    start: parseTimeOfDay(block.start),
    end: parseTimeOfDay(block.end),
  }));
}

function blockContains(block: QuietBlock, timeOfDay: number): boolean {
  if (block.start <= block.end) {
    return block.start <= timeOfDay && timeOfDay < block.end;
  }
  // Overnight block: 22:00 - 07:00
  return timeOfDay >= block.start || timeOfDay < block.end;
}

export function isWithinQuietHours(
  local: ZonedInstant,
  blocks: readonly QuietBlock[],
): boolean {
  const timeOfDay = msOfDay(wallClockAt(local.epochMs, local.timeZone));
  return blocks.some((block) => blockContains(block, timeOfDay));
}

/**
 * Move `local` forward to the end of whichever quiet block contains it,
 * re-checking every block after each jump since blocks may overlap or chain.
 * Returns the last candidate if it is still inside a block after
 * MAX_QUIET_PASSES jumps.
 */
export function nextAllowedTime(
  local: ZonedInstant,
  blocks: readonly QuietBlock[],
): ZonedInstant {
  let candidate = local;

  for (let pass = 0; pass < MAX_QUIET_PASSES; pass++) {
    const wall = wallClockAt(candidate.epochMs, candidate.timeZone);
    const timeOfDay = msOfDay(wall);
    const hit = blocks.find((block) => blockContains(block, timeOfDay));
    if (!hit) return candidate;

    // Only the pre-midnight half of an overnight block ends on the next day.
    const nextDay = hit.start > hit.end && timeOfDay >= hit.start;
    const target = withTimeOfDay(nextDay ? addDays(wall, 1) : wall, hit.end);
    candidate = {
      epochMs: zonedEpoch(target, candidate.timeZone),
      timeZone: candidate.timeZone,
    };
  }

  return candidate;
}
