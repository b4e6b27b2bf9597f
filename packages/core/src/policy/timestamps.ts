/**
 * Timestamp helpers
 *
 * @license Apache-2.0
 */

const ISO_WITH_OFFSET =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,9})?)?(Z|[+-]\d{2}:\d{2})$/;

/**
 * Parse an ISO-8601 timestamp that carries an explicit offset (`Z` or
 * `±HH:MM`). Returns `null` for local times and invalid dates.
 */
export function parseTimestamp(raw: string): Date | null {
  const match = ISO_WITH_OFFSET.exec(raw.trim().replace(/z$/, 'Z'));
  if (!match) return null;

  const [, year, month, day, hour, minute, second, offset] = match;
  const y = Number(year);
  const m = Number(month);
  const d = Number(day);
  if (m < 1 || m > 12) return null;
  const daysInMonth = new Date(Date.UTC(y, m, 0)).getUTCDate();
  if (d < 1 || d > daysInMonth) return null;
  if (Number(hour) > 23 || Number(minute) > 59 || Number(second ?? '0') > 59) return null;
  if (offset && offset !== 'Z') {
    const [oh, om] = offset.slice(1).split(':').map(Number);
    if ((oh ?? 0) > 23 || (om ?? 0) > 59) return null;
  }

  const parsed = new Date(raw.trim().replace(/z$/, 'Z'));
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * Render a date as an ISO-8601 UTC timestamp ending in `Z`.
 */
export function formatUtc(date: Date): string {
  return date.toISOString();
}
