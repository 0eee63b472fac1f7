import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { AccessLog } from '../access-log.js';
import { join } from 'node:path';
import { createTempProject, cleanupTempDir } from '../../__tests__/fixtures.js';

describe('AccessLog', () => {
  let dir: string;
  let log: AccessLog;
  const at = new Date('2025-03-01T10:00:00.000Z');

  beforeEach(() => {
    dir = createTempProject();
    log = new AccessLog(join(dir, '.mind', '.mind.db'), () => at);
  });

  afterEach(() => {
    log.close();
    cleanupTempDir(dir);
  });

  it('starts with no counts', () => {
    expect(log.counts().size).toBe(0);
  });

  it('bumps counts per entry', () => {
    log.bump(['a', 'b']);
    log.bump(['a']);
    expect(log.counts()).toEqual(new Map([['a', 2], ['b', 1]]));
  });

  it('ignores an empty bump', () => {
    log.bump([]);
    expect(log.counts().size).toBe(0);
  });

  it('records promotion events in order', () => {
    log.recordPromotion('INSERT', '**Rejected:** x because y', 'id1');
    log.recordPromotion('SUPERSEDE', '**Learned:** z', 'id2', 'id0');
    log.recordPromotion('SKIP', 'lunch', null, null, 'no-technical-signal');

    const all = log.getHistory();
    expect(all.map(h => h.event)).toEqual(['INSERT', 'SUPERSEDE', 'SKIP']);
    expect(all[1].target_id).toBe('id0');
    expect(all[2].entry_id).toBeNull();
    expect(all[2].reason).toBe('no-technical-signal');
    expect(all[0].created_at).toBe('2025-03-01T10:00:00.000Z');
  });

  it('filters history by entry id', () => {
    log.recordPromotion('INSERT', 'a', 'id1');
    log.recordPromotion('LINK', 'b', 'id2', 'id1');
    expect(log.getHistory('id2').map(h => h.event)).toEqual(['LINK']);
    expect(log.getHistory('missing')).toEqual([]);
  });

  it('persists across instances', () => {
    log.bump(['a']);
    log.close();
    log = new AccessLog(join(dir, '.mind', '.mind.db'), () => at);
    expect(log.counts().get('a')).toBe(1);
  });
});
