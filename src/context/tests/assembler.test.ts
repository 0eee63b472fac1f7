import { describe, it, expect } from 'vitest';
import { assembleContext, describeReminder, type ContextInput } from '../assembler.js';
import { parseMemory } from '../../memory/memory-file.js';
import { emptyBuffer } from '../../session/buffer.js';
import type { ParsedMemory } from '../../memory/types.js';
import type { Reminder } from '../../reminders/types.js';
import { SAMPLE_MEMORY } from '../../__tests__/fixtures.js';

const NOW = new Date(2025, 2, 3, 12, 0);

function input(parsed: ParsedMemory, overrides: Partial<ContextInput> = {}): ContextInput {
  return {
    projectName: 'demo',
    parsed,
    buffer: emptyBuffer(),
    dueReminders: [],
    watchReminders: [],
    signals: { now: NOW, accessCounts: new Map(), keywords: parsed.projectState.stack },
    weights: { frequency: 0.15, stack: 0.3, continuity: 0.5 },
    budget: 5,
    minConfidence: 0.5,
    ...overrides,
  };
}

function sample(): ParsedMemory {
  return parseMemory(SAMPLE_MEMORY, { file: 'MEMORY.md', now: NOW });
}

function reminder(id: number, message: string, trigger: Reminder['trigger'], keywords: string[] = []): Reminder {
  return { id, message, trigger, status: 'due', keywords, line: id };
}

describe('assembleContext', () => {
  it('renders every section for the sample store', () => {
    expect(assembleContext(input(sample()))).toBe(
      [
        '# Project Memory: demo',
        '',
        '## Project State',
        '- Goal: ship the sync service',
        '- Stack: TypeScript, SQLite',
        '- Next: promotion engine',
        '',
        '## Recent Decisions',
        '- use SQLite for the access log because it needs no server (2025-03-01)',
        '',
        '## Open Issues',
        '- flaky login test on CI (2025-03-01)',
        '',
        '## Gotchas',
        '- Windows paths -> normalize to forward slashes',
        '- vitest forks pool isolates native modules',
        '',
        '## Session',
        '- Last session 2025-03-02: wired the extractor (mood: good)',
        '',
      ].join('\n'),
    );
  });

  it('renders byte-identical output for identical inputs', () => {
    expect(assembleContext(input(sample()))).toBe(assembleContext(input(sample())));
  });

  it('renders an empty store as valid empty sections', () => {
    const empty: ParsedMemory = { entries: [], projectState: { stack: [] }, sessionSummaries: [] };
    expect(assembleContext(input(empty))).toBe(
      [
        '# Project Memory: demo',
        '',
        'No memories yet. Log decisions, issues and learnings with mind_log as you work.',
        '',
        '## Project State',
        '- none',
        '',
        '## Recent Decisions',
        '- none',
        '',
        '## Open Issues',
        '- none',
        '',
        '## Gotchas',
        '- none',
        '',
        '## Session',
        '- none',
        '',
      ].join('\n'),
    );
  });

  it('puts due reminders first regardless of the budget', () => {
    const due = [
      reminder(1, 'renew cert', { kind: 'time', value: '2025-03-01' }),
      reminder(2, 'review the PR', { kind: 'time', value: 'next session' }),
      reminder(3, 'rotate keys', { kind: 'context', value: 'auth,login' }, ['auth', 'login']),
    ];
    const text = assembleContext(input(sample(), { dueReminders: due, budget: 1 }));
    expect(text.split('\n').slice(0, 7)).toEqual([
      '# Project Memory: demo',
      '',
      '## Reminders Due',
      '- [#1] renew cert (due 2025-03-01)',
      '- [#2] review the PR (next session)',
      '- [#3] rotate keys (mentioned: auth, login)',
      '',
    ]);
  });

  it('limits each category to the budget, newest first', () => {
    const parsed = parseMemory(
      [
        '## 2025-02-20',
        '- **Decided:** use pnpm',
        '## 2025-02-25',
        '- **Decided:** use vitest',
        '## 2025-03-02',
        '- **Decided:** use zod',
      ].join('\n'),
      { file: 'MEMORY.md', now: NOW },
    );
    const text = assembleContext(input(parsed, { budget: 2 }));
    expect(text).toContain('## Recent Decisions\n- use zod (2025-03-02)\n- use vitest (2025-02-25)\n\n');
    expect(text).not.toContain('use pnpm');
  });

  it('drops superseded, low-confidence and resolved entries', () => {
    const parsed = parseMemory(
      [
        '## 2025-03-01',
        '- **Decided:** use MySQL <!-- superseded-by: abc123abc123 -->',
        '- **Decided:** use Postgres',
        '- maybe use Redis for caching',
        '- **Issue:** login bug fixed in the retry path',
        '- **Issue:** export times out',
      ].join('\n'),
      { file: 'MEMORY.md', now: NOW },
    );
    const text = assembleContext(input(parsed));
    expect(text).toContain('## Recent Decisions\n- use Postgres (2025-03-01)\n\n');
    expect(text).toContain('## Open Issues\n- export times out (2025-03-01)\n\n');
  });

  it('lists pending context reminders and buffer blockers', () => {
    const buffer = emptyBuffer();
    buffer.blocker.push('CI runner out of disk');
    buffer.rejected.push('tried polling, too slow');
    const watch = [{ ...reminder(4, 'check the audit', { kind: 'context', value: 'auth' }, ['auth']), status: 'pending' as const }];
    const text = assembleContext(input(sample(), { buffer, watchReminders: watch }));
    expect(text.endsWith(
      [
        '## Context Reminders',
        '- [#4] check the audit (mentioned: auth)',
        '',
        '## Session',
        '- Last session 2025-03-02: wired the extractor (mood: good)',
        '- Unpromoted notes: experience 0, blocker 1, rejected 1, assumption 0',
        '- Blocker: CI runner out of disk',
        '',
      ].join('\n'),
    )).toBe(true);
  });
});

describe('describeReminder', () => {
  it('shows the instant for time reminders', () => {
    expect(describeReminder(reminder(7, 'deploy', { kind: 'time', value: '2025-03-04T09:00:00.000Z' })))
      .toBe('[#7] deploy (due 2025-03-04T09:00:00.000Z)');
  });
});
