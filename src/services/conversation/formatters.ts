/**
 * Text helpers for the conversation flow.
 */

const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

const KICKOFF_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * `2025-03-05T14:30:00Z` → `March 05, 2025 at 14:30 UTC`.
 * Anything that is not a real UTC timestamp in that exact shape is returned as-is.
 */
export function formatKickoff(raw: string): string {
  const match = KICKOFF_PATTERN.exec(raw);
  if (!match) return raw;

  const [, year, month, day, hour, minute, second] = match;
  const parts = [year, month, day, hour, minute, second].map(Number);
  const [y, mo, d, h, mi, s] = parts;
  const date = new Date(Date.UTC(y, mo - 1, d, h, mi, s));
  date.setUTCFullYear(y);

  const roundTrips =
    date.getUTCFullYear() === y &&
    date.getUTCMonth() === mo - 1 &&
    date.getUTCDate() === d &&
    date.getUTCHours() === h &&
    date.getUTCMinutes() === mi &&
    date.getUTCSeconds() === s;
  if (!roundTrips) return raw;

  return `${MONTH_NAMES[mo - 1]} ${day}, ${year} at ${hour}:${minute} UTC`;
}

/**
 * Convert a 1-based numeric reply into a 0-based index.
 * Returns null when the text is not an integer at all.
 */
export function parseSelection(text: string): number | null {
  if (!INTEGER_PATTERN.test(text)) return null;
  return Number.parseInt(text, 10) - 1;
}

export function isInRange(index: number, length: number): boolean {
  return index >= 0 && index < length;
}

/** Lines `1. a`, `2. b`, … */
export function numbered<T>(items: readonly T[], render: (item: T) => string): string[] {
  return items.map((item, idx) => `${idx + 1}. ${render(item)}`);
}

export function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}
