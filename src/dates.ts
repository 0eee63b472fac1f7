/**
 * Calendar helpers. Stored dates are local calendar days (`YYYY-MM-DD`);
 * instants are ISO strings. Nothing here renders relative times.
 */

export const DAY_MS = 24 * 60 * 60 * 1000;

export const MONTHS: Record<string, number> = {
  january: 0, jan: 0,
  february: 1, feb: 1,
  march: 2, mar: 2,
  april: 3, apr: 3,
  may: 4,
  june: 5, jun: 5,
  july: 6, jul: 6,
  august: 7, aug: 7,
  september: 8, sep: 8, sept: 8,
  october: 9, oct: 9,
  november: 10, nov: 10,
  december: 11, dec: 11,
};

/** Local calendar date as YYYY-MM-DD. */
export function formatLocalDate(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

/** Build a local date, or null when the parts do not name a real day. */
export function localDate(year: number, monthIndex: number, day: number): Date | null {
  const date = new Date(year, monthIndex, day);
  if (date.getFullYear() !== year || date.getMonth() !== monthIndex || date.getDate() !== day) return null;
  return date;
}

/** Parse YYYY-MM-DD as local midnight. Returns null for anything else. */
export function parseLocalDate(value: string): Date | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (!match) return null;
  return localDate(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
}

/**
 * Parse the date forms accepted in headings: `2026-01-02`, `01/02/2026`
 * (month first) and `January 2, 2026`. Returns YYYY-MM-DD or null.
 */
export function parseHeadingDate(value: string): string | null {
  const text = value.trim();
  const iso = parseLocalDate(text);
  if (iso) return formatLocalDate(iso);

  const us = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(text);
  if (us) {
    const date = localDate(Number(us[3]), Number(us[1]) - 1, Number(us[2]));
    return date ? formatLocalDate(date) : null;
  }

  const verbal = /^([A-Za-z]+)\s+(\d{1,2}),?\s+(\d{4})$/.exec(text);
  if (verbal) {
    const month = MONTHS[verbal[1].toLowerCase()];
    if (month === undefined) return null;
    const date = localDate(Number(verbal[3]), month, Number(verbal[2]));
    return date ? formatLocalDate(date) : null;
  }
  return null;
}

export function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

export function addDays(date: Date, days: number): Date {
  const next = new Date(date.getTime());
  next.setDate(next.getDate() + days);
  return next;
}

/** Whole and fractional days from `from` to `to`; never negative. */
export function ageInDays(from: Date, to: Date): number {
  return Math.max(0, (to.getTime() - from.getTime()) / DAY_MS);
}
