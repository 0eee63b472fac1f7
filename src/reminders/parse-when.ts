/**
 * Natural-language due expressions for reminders.
 */

import { MalformedTriggerError } from '../errors.js';
import { MONTHS, addDays, formatLocalDate, localDate, parseLocalDate, startOfDay } from '../dates.js';
import { NEXT_SESSION, type Trigger } from './types.js';

const WEEKDAYS = ['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday'];
const WEEKDAY_ABBREV: Record<string, number> = { sun: 0, mon: 1, tue: 2, tues: 2, wed: 3, thu: 4, thur: 4, thurs: 4, fri: 5, sat: 6 };

const CONTEXT_FORMS: RegExp[] = [
  /^when\s+i\s+mention\s+(.+)$/,
  /^when\s+(?:we|i)(?:'re|'m|\s+are|\s+am)?\s+(?:work|working)\s+on\s+(.+)$/,
  /^when\s+(.+?)\s+comes?\s+up$/,
  /^when\s+(.+)$/,
];

const RELATIVE = /^in\s+(\d+|an?)\s+(minute|min|hour|hr|day|week|month)s?$/;
const ISO_DATE_TIME = /^\d{4}-\d{2}-\d{2}[t ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(z|[+-]\d{2}:?\d{2})?$/;

export function splitKeywords(text: string): string[] {
  return text
    .toLowerCase()
    .split(/,|\band\b|\bor\b/)
    .map(k => k.replace(/\|/g, '').trim())
    .filter(Boolean);
}

function weekday(name: string): number | undefined {
  const full = WEEKDAYS.indexOf(name);
  return full >= 0 ? full : WEEKDAY_ABBREV[name];
}

function parseVerbalDate(text: string, now: Date): string | null {
  const monthFirst = /^([a-z]+)\s+(\d{1,2})(?:st|nd|rd|th)?(?:,?\s+(\d{4}))?$/.exec(text);
  const dayFirst = /^(\d{1,2})(?:st|nd|rd|th)?\s+([a-z]+)(?:,?\s+(\d{4}))?$/.exec(text);
  let monthName: string;
  let day: number;
  let year: string | undefined;
  if (monthFirst) {
    [, monthName, , year] = monthFirst;
    day = Number(monthFirst[2]);
  } else if (dayFirst) {
    [, , monthName, year] = dayFirst;
    day = Number(dayFirst[1]);
  } else {
    return null;
  }

  const month = MONTHS[monthName];
  if (month === undefined) return null;

  if (year) {
    const date = localDate(Number(year), month, day);
    return date ? formatLocalDate(date) : null;
  }
  const thisYear = localDate(now.getFullYear(), month, day);
  if (thisYear && thisYear.getTime() >= startOfDay(now).getTime()) return formatLocalDate(thisYear);
  const nextYear = localDate(now.getFullYear() + 1, month, day);
  return nextYear ? formatLocalDate(nextYear) : null;
}

const MAX_YEAR = 9999;

function parseRelative(count: number, unit: string, now: Date): string {
  let due: Date;
  let withTime = false;
  switch (unit) {
    case 'minute':
    case 'min':
      due = new Date(now.getTime() + count * 60_000);
      withTime = true;
      break;
    case 'hour':
    case 'hr':
      due = new Date(now.getTime() + count * 3_600_000);
      withTime = true;
      break;
    case 'day':
      due = addDays(now, count);
      break;
    case 'week':
      due = addDays(now, count * 7);
      break;
    default:
      due = startOfDay(now);
      due.setMonth(due.getMonth() + count);
  }
  // Beyond this the due date cannot be written back as YYYY-MM-DD
  if (Number.isNaN(due.getTime()) || due.getFullYear() > MAX_YEAR) {
    throw new MalformedTriggerError(`Reminder time is out of range: in ${count} ${unit}(s)`);
  }
  return withTime ? due.toISOString() : formatLocalDate(due);
}

/**
 * Parse a due expression. Throws MalformedTriggerError for anything that is
 * not one of the recognised forms.
 */
export function parseWhen(expr: string, now: Date): Trigger {
  const text = expr.trim().toLowerCase().replace(/\s+/g, ' ');
  if (!text) throw new MalformedTriggerError('Empty reminder time');

  if (text === NEXT_SESSION || text === 'next time') return { kind: 'time', value: NEXT_SESSION };
  if (text === 'today') return { kind: 'time', value: formatLocalDate(now) };
  if (text === 'tomorrow') return { kind: 'time', value: formatLocalDate(addDays(now, 1)) };

  const dayName = /^(?:next\s+|on\s+)?([a-z]+)$/.exec(text);
  const target = dayName ? weekday(dayName[1]) : undefined;
  if (target !== undefined) {
    const ahead = (target - now.getDay() + 7) % 7 || 7;
    return { kind: 'time', value: formatLocalDate(addDays(now, ahead)) };
  }

  const relative = RELATIVE.exec(text);
  if (relative) {
    const count = /^\d+$/.test(relative[1]) ? Number(relative[1]) : 1;
    return { kind: 'time', value: parseRelative(count, relative[2], now) };
  }

  if (parseLocalDate(text)) return { kind: 'time', value: text };

  if (ISO_DATE_TIME.test(text)) {
    // Without an offset, Date parses date-times as local time
    const instant = new Date(expr.trim().toUpperCase().replace(' ', 'T'));
    if (!Number.isNaN(instant.getTime())) return { kind: 'time', value: instant.toISOString() };
  }

  const verbal = parseVerbalDate(text.replace(/^on\s+/, ''), now);
  if (verbal) return { kind: 'time', value: verbal };

  for (const form of CONTEXT_FORMS) {
    const match = form.exec(text);
    if (!match) continue;
    const keywords = splitKeywords(match[1]);
    if (keywords.length) return { kind: 'context', value: keywords.join(',') };
  }

  throw new MalformedTriggerError(
    `Cannot understand "${expr}". Try "tomorrow", "in 2 hours", "next session", "2025-06-01" or "when I mention auth".`,
  );
}

/** The instant a time trigger falls due; null for next-session and context triggers. */
export function dueInstant(trigger: Trigger): Date | null {
  if (trigger.kind !== 'time' || trigger.value === NEXT_SESSION) return null;
  const date = parseLocalDate(trigger.value);
  if (date) return date;
  const instant = new Date(trigger.value);
  return Number.isNaN(instant.getTime()) ? null : instant;
}
