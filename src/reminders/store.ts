/**
 * REMINDERS.md: one reminder per line,
 *
 *   - [ ] 2025-06-01 | time | renew the certificate
 *   - [ ] next session | next_session | review the PR
 *   - [x] auth,login | context | check the security audit
 *
 * Malformed lines are reported and skipped; they never abort a batch.
 */

import { dueInstant, splitKeywords } from './parse-when.js';
import { NEXT_SESSION, type MalformedLine, type Reminder, type Trigger } from './types.js';

const LINE_KINDS = ['time', 'next_session', 'context'] as const;
type LineKind = (typeof LINE_KINDS)[number];

function isLineKind(value: string): value is LineKind {
  return (LINE_KINDS as readonly string[]).includes(value);
}

const REMINDER_LINE = /^-\s+\[( |x|X)\]\s+(.+?)\s+\|\s+(time|next_session|context)\s+\|\s+(.+)$/;

export interface ParsedReminders {
  reminders: Reminder[];
  malformed: MalformedLine[];
}

function lineKind(trigger: Trigger): LineKind {
  if (trigger.kind === 'context') return 'context';
  return trigger.value === NEXT_SESSION ? 'next_session' : 'time';
}

function toTrigger(kind: LineKind, due: string): Trigger | string {
  switch (kind) {
    case 'next_session':
      return { kind: 'time', value: NEXT_SESSION };
    case 'context': {
      const keywords = splitKeywords(due);
      return keywords.length ? { kind: 'context', value: keywords.join(',') } : 'no keywords';
    }
    case 'time': {
      const trigger: Trigger = { kind: 'time', value: due };
      return dueInstant(trigger) ? trigger : `unreadable time "${due}"`;
    }
  }
}

export function parseReminders(content: string): ParsedReminders {
  const reminders: Reminder[] = [];
  const malformed: MalformedLine[] = [];

  content.split('\n').forEach((raw, index) => {
    const text = raw.trim();
    if (!text.startsWith('- ')) return;
    const match = REMINDER_LINE.exec(text);
    if (!match) {
      malformed.push({ line: index + 1, text, reason: 'expected "- [ ] <due> | <kind> | <message>"' });
      return;
    }
    const kind = match[3];
    if (!isLineKind(kind)) return;
    const trigger = toTrigger(kind, match[2].trim());
    if (typeof trigger === 'string') {
      malformed.push({ line: index + 1, text, reason: trigger });
      return;
    }
    reminders.push({
      id: reminders.length + 1,
      message: match[4].trim(),
      trigger,
      status: match[1] === ' ' ? 'pending' : 'done',
      keywords: trigger.kind === 'context' ? trigger.value.split(',') : [],
      line: index + 1,
    });
  });

  return { reminders, malformed };
}

export function formatReminderLine(trigger: Trigger, message: string, done = false): string {
  const oneLine = message.replace(/\s+/g, ' ').trim();
  return `- [${done ? 'x' : ' '}] ${trigger.value} | ${lineKind(trigger)} | ${oneLine}`;
}

export function appendReminder(content: string, trigger: Trigger, message: string): string {
  const body = content.replace(/\n+$/, '');
  return `${body ? `${body}\n` : ''}${formatReminderLine(trigger, message)}\n`;
}

/** Mark the given reminders done. Unknown ids are ignored. */
export function markDone(content: string, reminders: readonly Reminder[], ids: readonly number[]): string {
  const lines = content.split('\n');
  for (const reminder of reminders) {
    if (!ids.includes(reminder.id)) continue;
    const index = reminder.line - 1;
    if (index >= 0 && index < lines.length) {
      lines[index] = lines[index].replace(/\[ \]/, '[x]');
    }
  }
  return lines.join('\n');
}

export interface ReminderEvaluation {
  due: Reminder[];
  pending: Reminder[];
  /** Next-session reminders that should be marked done once surfaced. */
  autoDone: number[];
}

export interface EvaluationContext {
  now: Date;
  turnText?: string;
}

export function evaluateReminders(reminders: readonly Reminder[], context: EvaluationContext): ReminderEvaluation {
  const result: ReminderEvaluation = { due: [], pending: [], autoDone: [] };
  const turn = context.turnText?.toLowerCase() ?? '';

  for (const reminder of reminders) {
    if (reminder.status === 'done') continue;
    let isDue = false;
    if (reminder.trigger.kind === 'context') {
      isDue = mentions(reminder, turn);
    } else if (reminder.trigger.value === NEXT_SESSION) {
      isDue = true;
      result.autoDone.push(reminder.id);
    } else {
      const instant = dueInstant(reminder.trigger);
      isDue = instant !== null && context.now.getTime() >= instant.getTime();
    }
    if (isDue) result.due.push({ ...reminder, status: 'due' });
    else result.pending.push(reminder);
  }
  return result;
}

function mentions(reminder: Reminder, lowerText: string): boolean {
  return lowerText.length > 0 && reminder.keywords.some(k => lowerText.includes(k));
}

/** Open context reminders whose keywords appear in `text`. */
export function matchContextReminders(reminders: readonly Reminder[], text: string): Reminder[] {
  const lower = text.toLowerCase();
  return reminders
    .filter(r => r.status !== 'done' && r.trigger.kind === 'context' && mentions(r, lower))
    .map(r => ({ ...r, status: 'due' as const }));
}
