import type { MessageRecord } from "./types.js";

const SUMMARY_LINES = 6;
const LINE_MAX_CHARS = 160;

/** Clamp to `maxChars` code points, ending in "..." when cut. */
export function clampText(value: string, maxChars: number): string {
  const chars = Array.from(value);
  if (chars.length <= maxChars) return value;
  return chars.slice(0, Math.max(0, maxChars - 3)).join("") + "...";
}

/**
 * Rolling plain-text summary: the previous summary (clamped to half the
 * budget) followed by the last few messages as `U:` / `B:` lines.
 */
export function updateSummary(
  previous: string,
  recent: readonly MessageRecord[],
  maxChars: number,
): string {
  const lines = recent.slice(-SUMMARY_LINES).map((msg) => {
    const role = msg.role === "user" ? "U" : "B";
    return `${role}: ${clampText(msg.content.replace(/\n/g, " "), LINE_MAX_CHARS)}`;
  });

  const base = previous.trim();
  const combined = base
    ? `${clampText(base, Math.floor(maxChars / 2))}\nRecent:\n${lines.join("\n")}`
    : `Recent:\n${lines.join("\n")}`;

  return clampText(combined, maxChars);
}
