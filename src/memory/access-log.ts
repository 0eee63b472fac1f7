import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

export type PromotionEvent = 'INSERT' | 'SUPERSEDE' | 'LINK' | 'SKIP';

export interface PromotionHistoryEntry {
  id: number;
  entry_id: string | null;
  event: PromotionEvent;
  text: string;
  target_id: string | null;
  reason: string | null;
  created_at: string;
}

interface CountRow {
  entry_id: string;
  count: number;
}

/**
 * Machine-local bookkeeping next to the markdown stores: how often each
 * entry was returned by search, and what every promotion did.
 */
export class AccessLog {
  private db: Database.Database;

  constructor(dbPath: string, private now: () => Date = () => new Date()) {
    mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS access_counts (
        entry_id TEXT PRIMARY KEY,
        count INTEGER NOT NULL DEFAULT 0,
        last_accessed TEXT NOT NULL
      );
      CREATE TABLE IF NOT EXISTS promotion_history (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        entry_id TEXT,
        event TEXT NOT NULL,
        text TEXT NOT NULL,
        target_id TEXT,
        reason TEXT,
        created_at TEXT NOT NULL
      );
    `);
  }

  bump(entryIds: readonly string[]): void {
    if (entryIds.length === 0) return;
    const stmt = this.db.prepare<[string, string]>(`
      INSERT INTO access_counts (entry_id, count, last_accessed) VALUES (?, 1, ?)
      ON CONFLICT(entry_id) DO UPDATE SET count = count + 1, last_accessed = excluded.last_accessed
    `);
    const at = this.now().toISOString();
    this.db.transaction((ids: readonly string[]) => {
      for (const id of ids) stmt.run(id, at);
    })(entryIds);
  }

  counts(): Map<string, number> {
    const rows = this.db.prepare<[], CountRow>('SELECT entry_id, count FROM access_counts').all();
    return new Map(rows.map(r => [r.entry_id, r.count]));
  }

  recordPromotion(
    event: PromotionEvent,
    text: string,
    entryId: string | null = null,
    targetId: string | null = null,
    reason: string | null = null,
  ): void {
    this.db
      .prepare<[string | null, string, string, string | null, string | null, string]>(
        `
      INSERT INTO promotion_history (entry_id, event, text, target_id, reason, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `,
      )
      .run(entryId, event, text, targetId, reason, this.now().toISOString());
  }

  getHistory(entryId?: string): PromotionHistoryEntry[] {
    if (entryId === undefined) {
      return this.db
        .prepare<[], PromotionHistoryEntry>('SELECT * FROM promotion_history ORDER BY id ASC')
        .all();
    }
    return this.db
      .prepare<[string], PromotionHistoryEntry>('SELECT * FROM promotion_history WHERE entry_id = ? ORDER BY id ASC')
      .all(entryId);
  }

  close(): void {
    this.db.close();
  }
}
