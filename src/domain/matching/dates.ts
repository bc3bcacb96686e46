// ============================================================================
// Deadline helpers shared by eligibility, scoring and request filters
// ============================================================================

const DAY_MS = 24 * 60 * 60 * 1000;

const MONTHS = [
  "Jan", "Feb", "Mar", "Apr", "May", "Jun",
  "Jul", "Aug", "Sep", "Oct", "Nov", "Dec",
];

/**
 * Parse an ISO timestamp to epoch ms. Returns null for absent or
 * unparseable input, which callers treat as "no deadline".
 */
export function parseTimestamp(value: string | undefined): number | null {
  if (!value) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
}

/** Format as "Mon DD, YYYY" in UTC, e.g. "Mar 01, 2025". */
export function formatDeadline(ms: number): string {
  const d = new Date(ms);
  const day = String(d.getUTCDate()).padStart(2, "0");
  return `${MONTHS[d.getUTCMonth()]} ${day}, ${d.getUTCFullYear()}`;
}

/** Whole and fractional days from `now` until `deadlineMs` (negative once passed). */
export function daysUntil(deadlineMs: number, now: number): number {
  return (deadlineMs - now) / DAY_MS;
}
