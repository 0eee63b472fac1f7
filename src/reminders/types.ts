export const NEXT_SESSION = 'next session';

export type Trigger =
  /** ISO date, ISO date-time, or NEXT_SESSION */
  | { kind: 'time'; value: string }
  /** Comma-joined lowercase keywords */
  | { kind: 'context'; value: string };

export type ReminderStatus = 'pending' | 'due' | 'done';

export interface Reminder {
  /** One-based position among the reminders in the file. */
  id: number;
  message: string;
  trigger: Trigger;
  status: ReminderStatus;
  keywords: string[];
  /** One-based line in REMINDERS.md. */
  line: number;
}

export interface MalformedLine {
  line: number;
  text: string;
  reason: string;
}
