import type { BlockerResult, LogResult, PromotionSummary, RecallResult, ReminderList, SearchHit } from './engine.js';
import type { HealthReport } from './health.js';
import type { Reminder } from './reminders/types.js';
import type { ParsedBuffer } from './session/buffer.js';
import { SECTION_HEADINGS } from './session/buffer.js';
import { BUFFER_CATEGORIES, MEMORY_KINDS } from './memory/types.js';
import { describeReminder } from './context/assembler.js';
import { formatLoopWarning } from './memory/loop-detector.js';

export function textResult(text: string) {
  return { content: [{ type: 'text' as const, text }] };
}

function formatPromotion(promotion: PromotionSummary): string {
  return `Promoted ${promotion.inserted + promotion.superseded + promotion.linked} note(s) ` +
    `(${promotion.inserted} new, ${promotion.superseded} superseding, ${promotion.linked} linked), ` +
    `skipped ${promotion.skipped}.`;
}

export function formatRecall(result: RecallResult): string {
  const { sessionInfo, health } = result;
  const notes: string[] = [];
  if (sessionInfo.status === 'boundary') {
    notes.push(`New session (${sessionInfo.reason ?? 'unknown'}).`);
  }
  if (sessionInfo.promotion) notes.push(formatPromotion(sessionInfo.promotion));
  if (health.repaired.created.length) {
    notes.push(`Created ${health.repaired.created.length} missing file(s).`);
  }
  if (health.repaired.repairedSections.length) {
    notes.push(`Restored SESSION.md sections: ${health.repaired.repairedSections.join(', ')}.`);
  }
  for (const warning of health.warnings) notes.push(`Warning: ${warning}`);

  return notes.length ? `${result.contextText}\n---\n${notes.join('\n')}` : result.contextText;
}

export function formatLogResult(result: LogResult): string {
  const where = result.storedAs === 'memory' ? 'MEMORY.md' : 'SESSION.md';
  const lines = [
    `Logged ${result.category} to ${where}:${result.line} (confidence ${result.confidence.toFixed(2)}` +
      `${result.lowConfidence ? ', tentative' : ''}).`,
  ];
  if (result.loopWarning) {
    lines.push('', formatLoopWarning(result.loopWarning));
  }
  if (result.triggeredReminders.length) {
    lines.push('', 'Reminders triggered:');
    for (const reminder of result.triggeredReminders) lines.push(`- ${describeReminder(reminder)}`);
  }
  return lines.join('\n');
}

export function formatSearchResults(hits: readonly SearchHit[], query: string): string {
  if (hits.length === 0) return `No results for "${query}".`;
  const lines = [`Found ${hits.length} result(s) for "${query}":`, ''];
  hits.forEach((hit, i) => {
    const origin = hit.source === 'memory'
      ? `${hit.kind}, ${hit.createdAt ?? 'undated'}`
      : `session ${hit.kind}`;
    lines.push(`${i + 1}. [${origin}] ${hit.text} (score ${hit.score.toFixed(2)})`);
  });
  return lines.join('\n');
}

export function formatBlocker(result: BlockerResult): string {
  const lines = [formatLogResult(result.logged), ''];
  if (result.keywords.length === 0) {
    lines.push('No keywords to search memory with.');
  } else if (result.relatedMemories.length === 0) {
    lines.push(`No related memories for: ${result.keywords.join(', ')}.`);
  } else {
    lines.push(`Related memories (${result.keywords.join(', ')}):`);
    for (const hit of result.relatedMemories) lines.push(`- ${hit.text} (${hit.createdAt ?? 'undated'})`);
  }
  return lines.join('\n');
}

export function formatReminderCreated(reminder: Reminder): string {
  return `Reminder set: ${describeReminder(reminder)}`;
}

export function formatReminderList(list: ReminderList): string {
  const lines: string[] = [];
  lines.push(`Due (${list.due.length}):`);
  for (const r of list.due) lines.push(`- ${describeReminder(r)}`);
  lines.push(`Pending (${list.pending.length}):`);
  for (const r of list.pending) lines.push(`- ${describeReminder(r)}`);
  if (list.malformed.length) {
    lines.push(`Unreadable lines (${list.malformed.length}):`);
    for (const m of list.malformed) lines.push(`- line ${m.line}: ${m.reason}`);
  }
  return lines.join('\n');
}

export function formatStatus(report: HealthReport): string {
  const { files } = report;
  const file = (name: string, f: { exists: boolean; bytes: number }) =>
    `  ${name.padEnd(13)} ${f.exists ? `${f.bytes} bytes` : 'missing'}`;

  const lines = [
    'Files:',
    file('MEMORY.md', files.memory),
    file('SESSION.md', files.session),
    file('REMINDERS.md', files.reminders),
    '',
    'Entries:',
    ...MEMORY_KINDS.map(k => `  ${k.padEnd(13)} ${report.entryCounts[k]}`),
    `  ${'superseded'.padEnd(13)} ${report.supersededCount}`,
    '',
    'Session buffer:',
    ...BUFFER_CATEGORIES.map(c => `  ${c.padEnd(13)} ${report.bufferCounts[c]}`),
    '',
    `Reminders: ${report.reminderCounts.open} open, ${report.reminderCounts.done} done`,
    `Last activity: ${report.lastActivity ?? 'never'}`,
  ];
  if (report.warnings.length) {
    lines.push('', 'Warnings:');
    for (const w of report.warnings) lines.push(`- ${w}`);
  }
  return lines.join('\n');
}

export function formatSession(session: ParsedBuffer): string {
  const lines: string[] = [];
  for (const category of BUFFER_CATEGORIES) {
    const notes = session.buffer[category];
    lines.push(`${SECTION_HEADINGS[category]} (${notes.length}):`);
    for (const note of notes) lines.push(`- ${note}`);
  }
  if (session.missingSections.length) {
    lines.push('', `Missing sections: ${session.missingSections.join(', ')}`);
  }
  return lines.join('\n');
}
