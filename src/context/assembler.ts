/**
 * Renders the recall context: reminders first, then project state, then the
 * ranked memory categories, then the session. Output depends only on its
 * inputs, so identical inputs render byte-identically.
 */

import { stripLabel } from '../memory/extractor.js';
import { declaredNextStep } from '../memory/memory-file.js';
import type { MemoryEntry, MemoryKind, ParsedMemory } from '../memory/types.js';
import { BUFFER_CATEGORIES } from '../memory/types.js';
import { loadMessages } from '../messages.js';
import { NEXT_SESSION, type Reminder } from '../reminders/types.js';
import type { SessionBuffer } from '../session/buffer.js';
import { rankItems, type RankSignals, type RankWeights } from './ranker.js';

export interface ContextCategory {
  title: string;
  kinds: readonly MemoryKind[];
  /** Only entries that are not resolved. */
  openOnly?: boolean;
  showDate: boolean;
}

export const CONTEXT_CATEGORIES: readonly ContextCategory[] = [
  { title: 'Recent Decisions', kinds: ['decision'], showDate: true },
  { title: 'Open Issues', kinds: ['issue', 'problem'], openOnly: true, showDate: true },
  { title: 'Gotchas', kinds: ['gotcha', 'learning'], showDate: false },
];

export interface ContextInput {
  projectName: string;
  parsed: ParsedMemory;
  buffer: SessionBuffer;
  dueReminders: readonly Reminder[];
  /** Pending context reminders, listed so the assistant knows what to watch for. */
  watchReminders: readonly Reminder[];
  signals: Omit<RankSignals, 'nextStep'>;
  weights: RankWeights;
  budget: number;
  minConfidence: number;
}

export function describeReminder(reminder: Reminder): string {
  const { trigger } = reminder;
  let when: string;
  if (trigger.kind === 'context') when = `mentioned: ${reminder.keywords.join(', ')}`;
  else if (trigger.value === NEXT_SESSION) when = NEXT_SESSION;
  else when = `due ${trigger.value}`;
  return `[#${reminder.id}] ${reminder.message} (${when})`;
}

function eligible(entry: MemoryEntry, category: ContextCategory, minConfidence: number): boolean {
  if (entry.supersededBy || entry.confidence < minConfidence) return false;
  if (!category.kinds.includes(entry.kind)) return false;
  return !(category.openOnly && entry.status === 'resolved');
}

function projectStateLines(parsed: ParsedMemory): string[] {
  const state = parsed.projectState;
  const lines: string[] = [];
  if (state.goal) lines.push(`- Goal: ${state.goal}`);
  if (state.stack.length) lines.push(`- Stack: ${state.stack.join(', ')}`);
  if (state.blockedBy) lines.push(`- Blocked: ${state.blockedBy}`);
  const next = declaredNextStep(parsed);
  if (next) lines.push(`- Next: ${next}`);
  return lines;
}

function sessionLines(parsed: ParsedMemory, buffer: SessionBuffer): string[] {
  const lines: string[] = [];
  const last = parsed.sessionSummaries.at(-1);
  if (last) {
    lines.push(`- Last session ${last.date}: ${last.summary || '(no summary)'}${last.mood ? ` (mood: ${last.mood})` : ''}`);
  }
  const counts = BUFFER_CATEGORIES.map(c => `${c} ${buffer[c].length}`);
  if (BUFFER_CATEGORIES.some(c => buffer[c].length > 0)) {
    lines.push(`- Unpromoted notes: ${counts.join(', ')}`);
  }
  for (const blocker of buffer.blocker) lines.push(`- Blocker: ${blocker}`);
  return lines;
}

function section(title: string, lines: readonly string[]): string {
  return [title, ...(lines.length ? lines : ['- none'])].join('\n');
}

export function assembleContext(input: ContextInput): string {
  const messages = loadMessages().guidance;
  const nextStep = declaredNextStep(input.parsed);
  const signals: RankSignals = nextStep ? { ...input.signals, nextStep } : { ...input.signals };
  const blocks: string[] = [`# Project Memory: ${input.projectName}`];

  if (input.dueReminders.length) {
    blocks.push(section(messages.reminders_header, input.dueReminders.map(r => `- ${describeReminder(r)}`)));
  }

  const live = input.parsed.entries.filter(e => !e.supersededBy);
  if (live.length === 0) blocks.push(messages.empty_memory);

  blocks.push(section('## Project State', projectStateLines(input.parsed)));

  for (const category of CONTEXT_CATEGORIES) {
    const pool = input.parsed.entries.filter(e => eligible(e, category, input.minConfidence));
    const picked = rankItems(pool, signals, input.weights).slice(0, input.budget);
    blocks.push(section(
      `## ${category.title}`,
      picked.map(({ entry }) => `- ${stripLabel(entry.text)}${category.showDate ? ` (${entry.createdAt})` : ''}`),
    ));
  }

  if (input.watchReminders.length) {
    blocks.push(section('## Context Reminders', input.watchReminders.map(r => `- ${describeReminder(r)}`)));
  }

  blocks.push(section(messages.session_header, sessionLines(input.parsed, input.buffer)));
  return blocks.join('\n\n') + '\n';
}
