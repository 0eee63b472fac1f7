import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import { MindEngine, extractKeywords } from '../engine.js';
import { AccessLog } from '../memory/access-log.js';
import { emptyBuffer, renderBuffer } from '../session/buffer.js';
import { MalformedTriggerError, PromotionError } from '../errors.js';
import { cleanupTempDir, createTempProject, FakeClock, testConfig } from './fixtures.js';
import type { Config } from '../config.js';

const START = new Date(2025, 5, 10, 9, 0);

describe('MindEngine', () => {
  let dir: string;
  let clock: FakeClock;
  let engine: MindEngine;

  function makeEngine(config: Partial<Config> = {}): MindEngine {
    return new MindEngine(dir, { config: testConfig(config), now: clock.now, projectName: 'demo' });
  }

  beforeEach(() => {
    dir = createTempProject();
    clock = new FakeClock(START);
    engine = makeEngine();
  });

  afterEach(() => {
    engine.close();
    vi.restoreAllMocks();
    cleanupTempDir(dir);
  });

  describe('recall', () => {
    it('creates the stores on first run and renders an empty context', () => {
      const result = engine.recall();
      expect(result.sessionInfo.status).toBe('boundary');
      expect(result.sessionInfo.reason).toBe('first-run');
      expect(result.health.repaired.created).toHaveLength(4);
      expect(result.contextText.startsWith('# Project Memory: demo\n\nNo memories yet.')).toBe(true);
      expect(fs.existsSync(engine.paths.state)).toBe(true);
    });

    it('is idempotent for immediate repeat calls', () => {
      const first = engine.recall();
      const parses = engine.reparseCount;
      const second = engine.recall();
      expect(second.sessionInfo.status).toBe('fresh');
      expect(second.contextText).toBe(first.contextText);
      expect(engine.reparseCount).toBe(parses);
    });

    it('detects a session gap only past the configured minutes', () => {
      engine.recall();
      clock.advanceMinutes(29);
      expect(engine.recall().sessionInfo.status).toBe('fresh');
      clock.advanceMinutes(30);
      expect(engine.recall().sessionInfo.status).toBe('fresh');
      clock.advanceMinutes(31);
      const result = engine.recall();
      expect(result.sessionInfo.reason).toBe('gap');
      expect(result.sessionInfo.elapsedMs).toBe(31 * 60_000);
    });

    it('treats an outside edit of MEMORY.md as a boundary', () => {
      engine.recall();
      fs.appendFileSync(engine.paths.memory, '\n## 2025-06-09\n- **Issue:** export times out\n');
      const result = engine.recall();
      expect(result.sessionInfo.reason).toBe('content-changed');
      expect(result.contextText).toContain('## Open Issues\n- export times out (2025-06-09)\n');
    });

    it('recovers from a corrupt state record as a first run', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      engine.recall();
      fs.writeFileSync(engine.paths.state, '{ not json');
      expect(engine.recall().sessionInfo.reason).toBe('first-run');
      expect(warn).toHaveBeenCalledWith('[mindfile] State record is not valid JSON; treating as first run');
    });
  });

  describe('log', () => {
    it('appends permanent kinds under today and keeps the session fresh', () => {
      engine.recall();
      const result = engine.log('use zod for config because it infers types', 'decision');
      expect(result).toEqual({
        storedAs: 'memory',
        category: 'decision',
        confidence: 0.99,
        lowConfidence: false,
        line: 15,
        triggeredReminders: [],
      });
      expect(fs.readFileSync(engine.paths.memory, 'utf-8')).toContain(
        '\n## 2025-06-10\n- **Decided:** use zod for config because it infers types\n',
      );

      const next = engine.recall();
      expect(next.sessionInfo.status).toBe('fresh');
      expect(next.contextText).toContain(
        '## Recent Decisions\n- use zod for config because it infers types (2025-06-10)\n',
      );
    });

    it('stores hedged text in the tentative form', () => {
      const result = engine.log('maybe use Redis for caching', 'decision');
      expect(result.confidence).toBe(0.4);
      expect(result.lowConfidence).toBe(true);
      expect(fs.readFileSync(engine.paths.memory, 'utf-8')).toContain('- **Decided?:** maybe use Redis for caching\n');

      const hits = engine.search('redis caching');
      expect(hits[0].text).toBe('**Decided?:** maybe use Redis for caching');
      expect(engine.recall().contextText).not.toContain('Redis');
    });

    it('writes buffer kinds to their section', () => {
      const result = engine.log('tried polling the API but it was too slow because of rate limits', 'rejected');
      expect(result.storedAs).toBe('session');
      expect(result.line).toBe(8);
      expect(engine.session().buffer.rejected).toEqual([
        'tried polling the API but it was too slow because of rate limits',
      ]);
    });

    it('files notes without a kind by their wording', () => {
      expect(engine.log('stuck on the auth flow').category).toBe('blocker');
      expect(engine.log('reading the auth module').category).toBe('experience');
      expect(engine.session().buffer.blocker).toEqual(['stuck on the auth flow']);
    });

    it('warns when a rejection repeats one already in the buffer', () => {
      expect(engine.log('polling the status endpoint every second', 'rejected').loopWarning).toBeUndefined();
      const result = engine.log('polling the status endpoint every second', 'rejected');
      expect(result.loopWarning?.severity).toBe('critical');
      expect(result.loopWarning?.source).toBe('session');
      expect(result.loopWarning?.matchedText).toBe('polling the status endpoint every second');
    });

    it('does not compare other kinds against rejections', () => {
      engine.log('polling the status endpoint every second', 'rejected');
      expect(engine.log('polling the status endpoint every second', 'experience').loopWarning).toBeUndefined();
      expect(engine.log('polling the status endpoint every second', 'decision').loopWarning).toBeUndefined();
    });

    it('warns when a rejection repeats one promoted in an earlier session', () => {
      const rejection = 'tried polling the API but it was too slow because of rate limits';
      engine.recall();
      engine.log(rejection, 'rejected');
      clock.advanceMinutes(31);
      expect(engine.recall().sessionInfo.promotion?.inserted).toBe(1);
      expect(engine.session().buffer.rejected).toEqual([]);

      const result = engine.log(rejection, 'rejected');
      expect(result.loopWarning?.severity).toBe('critical');
      expect(result.loopWarning?.source).toBe('memory');
      expect(result.loopWarning?.matchedText).toBe(`**Rejected:** ${rejection}`);
    });

    it('scores a permanent note by the rule its wording matches', () => {
      const keyword = engine.log('decided to use zod for config', 'decision');
      expect(keyword.confidence).toBe(0.7);
      expect(keyword.lowConfidence).toBe(false);
      expect(engine.log('**Gotcha:** the WAL file grows until a checkpoint', 'gotcha').confidence).toBe(0.9);
    });

    it('reports context reminders the note mentions', () => {
      engine.remind('check the audit', 'when I mention auth');
      const result = engine.log('refactored the auth middleware', 'experience');
      expect(result.triggeredReminders.map(r => r.message)).toEqual(['check the audit']);
    });
  });

  describe('promotion', () => {
    it('promotes eligible buffer lines at the next boundary and clears the buffer', () => {
      engine.recall();
      engine.log('tried polling the API but it was too slow because of rate limits', 'rejected');
      engine.log('the `sync.ts` worker batches writes with better-sqlite3 transactions', 'experience');

      clock.advanceMinutes(31);
      const result = engine.recall();

      expect(result.sessionInfo.promotion).toEqual({ inserted: 2, superseded: 0, linked: 0, skipped: 0 });
      expect(fs.readFileSync(engine.paths.memory, 'utf-8')).toContain(
        '## 2025-06-10\n' +
          '- **Learned:** the `sync.ts` worker batches writes with better-sqlite3 transactions\n' +
          '- **Rejected:** tried polling the API but it was too slow because of rate limits\n',
      );
      expect(fs.readFileSync(engine.paths.session, 'utf-8')).toBe(renderBuffer(emptyBuffer()));
      expect(result.contextText).toContain(
        '## Recent Decisions\n- tried polling the API but it was too slow because of rate limits (2025-06-10)\n',
      );
      expect(result.contextText).toContain(
        '## Gotchas\n- the `sync.ts` worker batches writes with better-sqlite3 transactions\n',
      );
      expect(engine.promotionHistory().map(h => h.event)).toEqual(['INSERT', 'INSERT']);
    });

    it('records lines it skips', () => {
      engine.recall();
      engine.log('tried a different approach', 'rejected');
      clock.advanceMinutes(31);
      expect(engine.recall().sessionInfo.promotion).toEqual({ inserted: 0, superseded: 0, linked: 0, skipped: 1 });
      const history = engine.promotionHistory();
      expect(history).toHaveLength(1);
      expect(history[0].event).toBe('SKIP');
      expect(history[0].reason).toBe('no-reasoning');
    });

    it('keeps the buffer when MEMORY.md cannot be written', () => {
      engine.recall();
      engine.log('tried polling the API but it was too slow because of rate limits', 'rejected');
      const before = fs.readFileSync(engine.paths.session, 'utf-8');

      const realWrite = fs.writeFileSync;
      vi.spyOn(fs, 'writeFileSync').mockImplementation((file, data, options) => {
        if (String(file).includes('MEMORY.md')) throw new Error('disk full');
        realWrite(file, data, options);
      });

      clock.advanceMinutes(31);
      expect(() => engine.recall()).toThrow(PromotionError);
      expect(fs.readFileSync(engine.paths.session, 'utf-8')).toBe(before);
    });

    it('skips lines left in the buffer by a failed clear as duplicates', () => {
      engine.recall();
      engine.log('tried polling the API but it was too slow because of rate limits', 'rejected');

      const realWrite = fs.writeFileSync;
      const writeSpy = vi.spyOn(fs, 'writeFileSync').mockImplementation((file, data, options) => {
        if (String(file).includes('SESSION.md')) throw new Error('read-only');
        realWrite(file, data, options);
      });
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

      clock.advanceMinutes(31);
      expect(engine.recall().sessionInfo.promotion).toEqual({ inserted: 1, superseded: 0, linked: 0, skipped: 0 });
      expect(warn).toHaveBeenCalledWith(expect.stringContaining('Could not clear'));
      expect(engine.session().buffer.rejected).toHaveLength(1);
      writeSpy.mockRestore();

      clock.advanceMinutes(31);
      expect(engine.recall().sessionInfo.promotion).toEqual({ inserted: 0, superseded: 0, linked: 0, skipped: 1 });
      const skips = engine.promotionHistory().filter(h => h.event === 'SKIP');
      expect(skips).toHaveLength(1);
      expect(skips[0].reason).toBe('duplicate');
      expect(fs.readFileSync(engine.paths.memory, 'utf-8').match(/\*\*Rejected:\*\*/g)).toHaveLength(1);
      expect(engine.session().buffer.rejected).toEqual([]);
    });

    it('runs on checkpoint and records the session summary', () => {
      engine.recall();
      engine.log('the `db.ts` pool needs a close() on shutdown', 'experience');
      const result = engine.checkpoint({ summary: 'wired recall', mood: 'good', next: 'hooks' });

      expect(result.sessionInfo.reason).toBe('forced');
      expect(result.sessionInfo.promotion?.inserted).toBe(1);
      expect(fs.readFileSync(engine.paths.memory, 'utf-8')).toContain('## 2025-06-10 | wired recall | mood: good | next: hooks\n');
      expect(result.contextText).toContain('- Next: hooks\n');
      expect(result.contextText).toContain('- Last session 2025-06-10: wired recall (mood: good)\n');
    });
  });

  describe('search and blocker', () => {
    beforeEach(() => {
      engine.log('use SQLite WAL mode for the access log', 'decision');
      engine.log('pooling connections cut latency in `db.ts`', 'experience');
    });

    it('ranks permanent entries and bumps their access counts', () => {
      const hits = engine.search('sqlite wal');
      expect(hits).toHaveLength(1);
      expect(hits[0]).toMatchObject({
        source: 'memory',
        kind: 'decision',
        text: '**Decided:** use SQLite WAL mode for the access log',
        createdAt: '2025-06-10',
      });

      const counts = new AccessLog(engine.paths.accessDb);
      expect(counts.counts().get(hits[0].id)).toBe(1);
      counts.close();
    });

    it('includes buffer notes unless asked not to', () => {
      expect(engine.search('latency').map(h => [h.source, h.kind])).toEqual([['session', 'experience']]);
      expect(engine.search('latency', { includeUnpromoted: false })).toEqual([]);
    });

    it('logs a blocker and looks up related memories', () => {
      const result = engine.blocker('sqlite database locked during tests');
      expect(result.logged.storedAs).toBe('session');
      expect(result.logged.category).toBe('blocker');
      expect(result.keywords).toEqual(['sqlite', 'database', 'locked', 'tests']);
      expect(result.relatedMemories.map(h => h.text)).toEqual(['**Decided:** use SQLite WAL mode for the access log']);
    });
  });

  describe('reminders', () => {
    it('moves reminders through their lifecycle', () => {
      expect(engine.remind('review the PR', 'next session').created.id).toBe(1);
      expect(engine.remind('renew cert', 'tomorrow').created.trigger).toEqual({ kind: 'time', value: '2025-06-11' });
      engine.remind('check the audit', 'when I mention auth');

      expect(engine.reminders().due.map(r => r.id)).toEqual([1]);

      const first = engine.recall();
      expect(first.contextText).toContain('## Reminders Due\n- [#1] review the PR (next session)\n');
      expect(first.contextText).toContain('## Context Reminders\n- [#3] check the audit (mentioned: auth)\n');
      expect(first.sessionInfo.remindersCompleted).toEqual([1]);
      expect(engine.recall().contextText).not.toContain('[#1]');

      clock.advanceMinutes(24 * 60);
      expect(engine.recall().contextText).toContain('- [#2] renew cert (due 2025-06-11)\n');
      expect(engine.recall({ turnText: 'fix the AUTH flow' }).contextText).toContain(
        '- [#3] check the audit (mentioned: auth)\n',
      );

      expect(engine.reminderDone(2)?.status).toBe('done');
      expect(engine.reminders()).toMatchObject({ due: [], pending: [{ id: 3 }] });
      expect(engine.reminderDone(99)).toBeNull();
    });

    it('rejects an unreadable time without writing anything', () => {
      expect(() => engine.remind('ship it', 'in two weeks')).toThrow(MalformedTriggerError);
      expect(() => engine.remind('ship it', 'in 99999999999 days')).toThrow(MalformedTriggerError);
      expect(fs.existsSync(engine.paths.reminders)).toBe(false);
    });
  });

  describe('status', () => {
    it('summarizes the stores and flags outside edits', () => {
      engine.log('use SQLite WAL mode for the access log', 'decision');
      engine.log('pooling helped', 'experience');

      let status = engine.status();
      expect(status.entryCounts.decision).toBe(1);
      expect(status.bufferCounts.experience).toBe(1);
      expect(status.stale).toBe(false);

      fs.appendFileSync(engine.paths.memory, '- **Issue:** flaky export\n');
      status = engine.status();
      expect(status.stale).toBe(true);
      expect(status.entryCounts.issue).toBe(1);
    });
  });

  describe('inline comments', () => {
    it('merges MEMORY comments into the context when enabled', () => {
      fs.mkdirSync(`${dir}/src`, { recursive: true });
      fs.writeFileSync(`${dir}/src/config.ts`, '// MEMORY: decided to use zod because it infers types\n');

      engine.close();
      engine = makeEngine({ scanInline: true });
      expect(engine.recall().contextText).toContain('- decided to use zod because it infers types (');

      engine.close();
      engine = makeEngine();
      expect(engine.recall({ forceRefresh: true }).contextText).not.toContain('decided to use zod');
    });
  });
});

describe('extractKeywords', () => {
  it('puts named technologies first and caps the list', () => {
    expect(extractKeywords('flaky login with redis session store under load', 3)).toEqual(['redis', 'flaky', 'login']);
  });
});
