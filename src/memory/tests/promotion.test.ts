import { describe, it, expect } from 'vitest';
import {
  planPromotion,
  applyPromotion,
  plannedWrites,
  hasTechnicalSignal,
  hasRejectionReasoning,
} from '../promotion.js';
import { parseMemory, entryId } from '../memory-file.js';
import { emptyBuffer, type SessionBuffer } from '../../session/buffer.js';

const now = new Date(2025, 2, 5, 12, 0);
const DEFAULTS = { categories: ['rejected', 'experience'] as const };

function buffer(parts: Partial<SessionBuffer>): SessionBuffer {
  return { ...emptyBuffer(), ...parts };
}

function store(content: string) {
  return parseMemory(content, { file: 'MEMORY.md', now }).entries;
}

const MONGO = 'mongo because joins replication sharding costs licensing tooling backups';
const KAFKA = 'kafka because ordering retention replay';

describe('gating', () => {
  it('skips rejected lines without reasoning', () => {
    const plan = planPromotion(buffer({ rejected: ['Redis'] }), [], DEFAULTS);
    expect(plan.skipped).toEqual([{ category: 'rejected', text: 'Redis', reason: 'no-reasoning' }]);
    expect(plan.inserted).toEqual([]);
  });

  it('promotes reasoned rejections as decision entries', () => {
    const plan = planPromotion(buffer({ rejected: ['GraphQL because the schema churns'] }), [], DEFAULTS);
    expect(plan.inserted).toEqual([
      {
        action: 'INSERT',
        category: 'rejected',
        kind: 'decision',
        id: entryId('**Rejected:** GraphQL because the schema churns'),
        line: '**Rejected:** GraphQL because the schema churns',
        sourceText: 'GraphQL because the schema churns',
      },
    ]);
  });

  it('skips experience without a technical signal', () => {
    const plan = planPromotion(buffer({ experience: ['the meeting went long'] }), [], DEFAULTS);
    expect(plan.skipped[0].reason).toBe('no-technical-signal');
  });

  it('promotes technical experience as learnings', () => {
    const plan = planPromotion(buffer({ experience: ['`npm ci` beats a fresh install'] }), [], DEFAULTS);
    expect(plan.inserted[0].kind).toBe('learning');
    expect(plan.inserted[0].line).toBe('**Learned:** `npm ci` beats a fresh install');
  });

  it('skips categories that are not enabled', () => {
    const plan = planPromotion(buffer({ blocker: ['staging is down'] }), [], DEFAULTS);
    expect(plan.skipped[0].reason).toBe('category-not-eligible');
  });

  it('promotes blockers and assumptions ungated when enabled', () => {
    const plan = planPromotion(
      buffer({ blocker: ['staging is down'], assumption: ['users stay logged in'] }),
      [],
      { categories: ['blocker', 'assumption'] },
    );
    expect(plan.inserted.map(p => [p.kind, p.line])).toEqual([
      ['problem', '**Problem:** staging is down'],
      ['learning', '**Assumption:** users stay logged in'],
    ]);
  });

  it('reports empty lines', () => {
    expect(planPromotion(buffer({ rejected: ['  '] }), [], DEFAULTS).skipped[0].reason).toBe('empty');
  });
});

describe('similarity against the store', () => {
  it('skips duplicates of existing entries', () => {
    const existing = store('## 2025-03-01\n- **Rejected:** GraphQL because the schema churns\n');
    const plan = planPromotion(buffer({ rejected: ['GraphQL because the schema churns'] }), existing, DEFAULTS);
    expect(plan.skipped).toEqual([
      { category: 'rejected', text: 'GraphQL because the schema churns', reason: 'duplicate', matchId: existing[0].id },
    ]);
  });

  it('skips duplicates within the same batch', () => {
    const line = 'GraphQL because the schema churns';
    const plan = planPromotion(buffer({ rejected: [line, line] }), [], DEFAULTS);
    expect(plan.inserted).toHaveLength(1);
    expect(plan.skipped[0].reason).toBe('duplicate');
  });

  it('supersedes near-duplicates', () => {
    const existing = store(`## 2025-03-01\n- **Rejected:** ${MONGO}\n`);
    const plan = planPromotion(buffer({ rejected: [`${MONGO} migrations`] }), existing, DEFAULTS);
    expect(plan.inserted[0].action).toBe('SUPERSEDE');
    expect(plan.inserted[0].target?.id).toBe(existing[0].id);
    expect(plan.inserted[0].target?.line).toBe(2);
    expect(plan.inserted[0].target?.score).toBeGreaterThanOrEqual(0.9);
    expect(plan.inserted[0].target?.score).toBeLessThan(0.95);
  });

  it('links similar entries and keeps both', () => {
    const existing = store(`## 2025-03-01\n- **Rejected:** ${KAFKA}\n`);
    const plan = planPromotion(buffer({ rejected: [`${KAFKA} throughput`] }), existing, DEFAULTS);
    expect(plan.inserted).toEqual([]);
    expect(plan.linked).toHaveLength(1);
    expect(plan.linked[0].action).toBe('LINK');
    expect(plan.linked[0].target?.id).toBe(existing[0].id);
  });

  it('ignores entries that are already superseded', () => {
    const existing = store('## 2025-03-01\n- **Rejected:** GraphQL because the schema churns <!-- superseded-by: abc -->\n');
    const plan = planPromotion(buffer({ rejected: ['GraphQL because the schema churns'] }), existing, DEFAULTS);
    expect(plan.inserted).toHaveLength(1);
  });
});

describe('applyPromotion', () => {
  it('marks the superseded line and appends under the date heading', () => {
    const content = `## 2025-03-01\n- **Rejected:** ${MONGO}\n`;
    const plan = planPromotion(buffer({ rejected: [`${MONGO} migrations`] }), store(content), DEFAULTS);
    const next = applyPromotion(content, plan, '2025-03-05');
    const newId = plan.inserted[0].id;
    expect(next).toBe(
      `## 2025-03-01\n- **Rejected:** ${MONGO} <!-- superseded-by: ${newId} -->\n\n## 2025-03-05\n- **Rejected:** ${MONGO} migrations\n`,
    );
    const reparsed = parseMemory(next, { file: 'MEMORY.md', now });
    expect(reparsed.entries[0].supersededBy).toBe(newId);
    expect(reparsed.entries[1].id).toBe(newId);
  });

  it('writes a related marker for links', () => {
    const content = `## 2025-03-01\n- **Rejected:** ${KAFKA}\n`;
    const existing = store(content);
    const plan = planPromotion(buffer({ rejected: [`${KAFKA} throughput`] }), existing, DEFAULTS);
    const next = applyPromotion(content, plan, '2025-03-01');
    expect(next).toBe(
      `## 2025-03-01\n- **Rejected:** ${KAFKA}\n- **Rejected:** ${KAFKA} throughput <!-- related: ${existing[0].id} -->\n`,
    );
  });

  it('lists inserts before links', () => {
    const plan = planPromotion(
      buffer({ rejected: [`${KAFKA} throughput`, 'GraphQL because the schema churns'] }),
      store(`- **Rejected:** ${KAFKA}\n`),
      DEFAULTS,
    );
    expect(plannedWrites(plan).map(p => p.action)).toEqual(['INSERT', 'LINK']);
  });
});

describe('signals', () => {
  it('detects technical signals', () => {
    expect(hasTechnicalSignal('edit src/index.ts first')).toBe(true);
    expect(hasTechnicalSignal('call parseConfig early')).toBe(true);
    expect(hasTechnicalSignal('the user_id column is nullable')).toBe(true);
    expect(hasTechnicalSignal('run build() twice')).toBe(true);
    expect(hasTechnicalSignal('redis eviction surprised us')).toBe(true);
    expect(hasTechnicalSignal('lunch was good')).toBe(false);
  });

  it('accepts rejection reasoning beyond causal words', () => {
    expect(hasRejectionReasoning('webpack, too slow for local dev')).toBe(true);
    expect(hasRejectionReasoning('webpack')).toBe(false);
  });
});
