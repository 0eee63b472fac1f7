import path from 'node:path';
import { getConfig, type Config } from './config.js';
import { MindError, PromotionError } from './errors.js';
import { getMindPaths, type MindPaths } from './paths.js';
import { formatLocalDate } from './dates.js';
import { readTextFile, writeFileAtomic } from './storage/fs-utils.js';
import { ensureMindFiles, buildHealthReport, type HealthReport, type RepairReport } from './health.js';
import { AccessLog, type PromotionHistoryEntry } from './memory/access-log.js';
import { classifyLine, labelFor, scoreConfidence, stripLabel } from './memory/extractor.js';
import { loadIndexCache, writeIndexCache } from './memory/index-cache.js';
import { detectLoop, type LoopWarning } from './memory/loop-detector.js';
import {
  appendEntry,
  appendSessionSummary,
  fingerprint,
  parseMemory,
} from './memory/memory-file.js';
import { applyPromotion, planPromotion, plannedWrites, type PromotionResult } from './memory/promotion.js';
import { TfIdfIndex, tokenize } from './memory/similarity.js';
import { techTerms } from './memory/wordlists.js';
import {
  BUFFER_CATEGORIES,
  isBufferCategory,
  type BufferCategory,
  type LogKind,
  type MemoryEntry,
  type MemoryKind,
  type ParsedMemory,
  type SourceLocation,
} from './memory/types.js';
import { assembleContext } from './context/assembler.js';
import { scanInline, type InlineScanResult } from './inline/scanner.js';
import { parseWhen } from './reminders/parse-when.js';
import {
  appendReminder,
  evaluateReminders,
  markDone,
  matchContextReminders,
  parseReminders,
} from './reminders/store.js';
import type { MalformedLine, Reminder } from './reminders/types.js';
import { appendToBuffer, bufferSize, emptyBuffer, parseBuffer, renderBuffer, type ParsedBuffer } from './session/buffer.js';
import { categorizeSessionNote } from './session/categorize.js';
import { evaluateSession, touchState, type SessionCheck } from './session/lifecycle.js';
import { readState, writeState } from './session/state.js';

export interface EngineOptions {
  config?: Config;
  now?: () => Date;
  /** Shown in the context title and the MEMORY.md template. Defaults to the directory name. */
  projectName?: string;
}

export interface PromotionSummary {
  inserted: number;
  superseded: number;
  linked: number;
  skipped: number;
}

export interface RecallOptions {
  forceRefresh?: boolean;
  turnText?: string;
}

export interface RecallResult {
  contextText: string;
  sessionInfo: SessionCheck & {
    promotion: PromotionSummary | null;
    /** Next-session reminders surfaced and marked done by this recall. */
    remindersCompleted: number[];
  };
  health: {
    repaired: RepairReport;
    warnings: string[];
  };
}

export interface LogResult {
  storedAs: 'memory' | 'session';
  category: LogKind;
  confidence: number;
  lowConfidence: boolean;
  /** One-based line in the file written to. */
  line: number;
  loopWarning?: LoopWarning;
  triggeredReminders: Reminder[];
}

export interface SearchOptions {
  includeUnpromoted?: boolean;
  limit?: number;
}

export interface SearchHit {
  source: 'memory' | 'session';
  id: string;
  kind: MemoryKind | BufferCategory;
  text: string;
  score: number;
  createdAt?: string;
  location?: SourceLocation;
}

export interface BlockerResult {
  logged: LogResult;
  keywords: string[];
  relatedMemories: SearchHit[];
}

export interface ReminderList {
  due: Reminder[];
  pending: Reminder[];
  malformed: MalformedLine[];
}

export interface CheckpointInput {
  summary?: string;
  mood?: string;
  next?: string;
}

const DEFAULT_SEARCH_LIMIT = 10;
const BLOCKER_KEYWORDS = 5;
const KEY_PREFIX = /^(?:\*\*)?(?:key|important)(?::\*\*|\*\*:|:)\s*/i;

function oneLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Up to `limit` distinct terms, named technologies first. */
export function extractKeywords(text: string, limit = BLOCKER_KEYWORDS): string[] {
  const terms = [...new Set(tokenize(text))];
  const tech = techTerms();
  return [...terms.filter(t => tech.has(t)), ...terms.filter(t => !tech.has(t))].slice(0, limit);
}

/**
 * Every operation on one project's `.mind/` directory. Synchronous and
 * stateless between calls apart from the access log connection; everything
 * else is read from disk each time.
 */
export class MindEngine {
  readonly paths: MindPaths;
  readonly config: Config;
  readonly projectName: string;
  private readonly now: () => Date;
  private accessLog: AccessLog | null = null;
  private reparses = 0;

  constructor(projectPath: string, options: EngineOptions = {}) {
    this.config = options.config ?? getConfig();
    this.now = options.now ?? (() => new Date());
    this.paths = getMindPaths(projectPath, this.config.mindDirName);
    this.projectName = options.projectName ?? path.basename(this.paths.projectPath);
  }

  /** Full parses of MEMORY.md performed by this engine. */
  get reparseCount(): number {
    return this.reparses;
  }

  close(): void {
    this.accessLog?.close();
    this.accessLog = null;
  }

  recall(options: RecallOptions = {}): RecallResult {
    const now = this.now();
    const repaired = ensureMindFiles(this.paths, this.projectName);
    const state = readState(this.paths.state);

    let content = readTextFile(this.paths.memory);
    let fp = fingerprint(content);
    const check = evaluateSession(state, {
      now,
      fingerprint: fp,
      gapMs: this.config.sessionGapMinutes * 60_000,
      force: options.forceRefresh,
    });

    let parsed: ParsedMemory;
    let promotion: PromotionSummary | null = null;
    if (check.status === 'boundary') {
      parsed = this.reparse(content, fp);
      const promoted = this.promote(content, parsed, now);
      if (promoted) {
        promotion = promoted.summary;
        if (promoted.content !== content) {
          content = promoted.content;
          fp = fingerprint(content);
          parsed = this.reparse(content, fp);
        }
      }
    } else {
      parsed = this.loadMemory(content, fp);
    }

    writeState(this.paths.state, touchState(state, now, fp));

    const remindersContent = readTextFile(this.paths.reminders);
    const { reminders } = parseReminders(remindersContent);
    const evaluation = evaluateReminders(reminders, { now, turnText: options.turnText });
    if (evaluation.autoDone.length) {
      writeFileAtomic(this.paths.reminders, markDone(remindersContent, reminders, evaluation.autoDone));
    }

    const buffer = parseBuffer(readTextFile(this.paths.session));
    const contextText = assembleContext({
      projectName: this.projectName,
      parsed: this.withInline(parsed),
      buffer: buffer.buffer,
      dueReminders: evaluation.due,
      watchReminders: evaluation.pending.filter(r => r.trigger.kind === 'context'),
      signals: {
        now,
        accessCounts: this.access().counts(),
        keywords: [...parsed.projectState.stack, ...(options.turnText ? tokenize(options.turnText) : [])],
      },
      weights: {
        frequency: this.config.frequencyWeight,
        stack: this.config.stackWeight,
        continuity: this.config.continuityWeight,
      },
      budget: this.config.contextBudget,
      minConfidence: this.config.minConfidence,
    });

    const health = this.health(parsed, buffer, fp, fp, now.toISOString());
    return {
      contextText,
      sessionInfo: { ...check, promotion, remindersCompleted: evaluation.autoDone },
      health: { repaired, warnings: health.warnings },
    };
  }

  /**
   * Record a note. Permanent kinds go to MEMORY.md under today's heading,
   * buffer kinds to their SESSION.md section; a note without a kind is
   * filed into the buffer by its wording.
   */
  log(text: string, kind?: LogKind): LogResult {
    const body = oneLine(text);
    if (!body) throw new MindError('Nothing to log: text is empty');
    ensureMindFiles(this.paths, this.projectName);
    const now = this.now();
    const category: LogKind = kind ?? categorizeSessionNote(body);

    const memoryContent = readTextFile(this.paths.memory);
    const parsed = this.loadMemory(memoryContent, fingerprint(memoryContent));
    const bufferContent = readTextFile(this.paths.session);

    // Only a new rejection is compared against earlier ones
    const loop = category === 'rejected'
      ? detectLoop(body, parseBuffer(bufferContent).buffer.rejected, parsed.entries)
      : null;
    const triggeredReminders = matchContextReminders(
      parseReminders(readTextFile(this.paths.reminders)).reminders,
      body,
    );

    let result: Omit<LogResult, 'loopWarning' | 'triggeredReminders'>;
    if (isBufferCategory(category)) {
      const appended = appendToBuffer(bufferContent, category, body);
      writeFileAtomic(this.paths.session, appended.content);
      const confidence = classifyLine(body)?.confidence ?? scoreConfidence('keyword', body);
      result = {
        storedAs: 'session',
        category,
        confidence,
        lowConfidence: confidence < this.config.minConfidence,
        line: appended.line,
      };
    } else {
      result = this.appendMemory(memoryContent, body, category, now);
    }

    return {
      ...result,
      ...(loop ? { loopWarning: loop } : {}),
      triggeredReminders,
    };
  }

  search(query: string, options: SearchOptions = {}): SearchHit[] {
    const { includeUnpromoted = true, limit = DEFAULT_SEARCH_LIMIT } = options;
    const content = readTextFile(this.paths.memory);
    const parsed = this.withInline(this.loadMemory(content, fingerprint(content)));

    const index = new TfIdfIndex();
    const entries = new Map<string, MemoryEntry>();
    for (const entry of parsed.entries) {
      if (entry.supersededBy) continue;
      const key = `memory:${entry.id}`;
      entries.set(key, entry);
      index.add(key, stripLabel(entry.text));
    }

    const notes = new Map<string, { category: BufferCategory; text: string }>();
    if (includeUnpromoted) {
      const { buffer } = parseBuffer(readTextFile(this.paths.session));
      for (const category of BUFFER_CATEGORIES) {
        buffer[category].forEach((text, i) => {
          const key = `session:${category}:${i}`;
          notes.set(key, { category, text });
          index.add(key, text);
        });
      }
    }

    const hits: SearchHit[] = [];
    for (const match of index.rank(query, { limit })) {
      const entry = entries.get(match.id);
      if (entry) {
        hits.push({
          source: 'memory',
          id: entry.id,
          kind: entry.kind,
          text: entry.text,
          score: match.score,
          createdAt: entry.createdAt,
          location: entry.sourceLocation,
        });
        continue;
      }
      const note = notes.get(match.id);
      if (note) {
        hits.push({ source: 'session', id: match.id, kind: note.category, text: note.text, score: match.score });
      }
    }

    this.access().bump(hits.filter(h => h.source === 'memory').map(h => h.id));
    return hits;
  }

  blocker(description: string): BlockerResult {
    const logged = this.log(description, 'blocker');
    const keywords = extractKeywords(description);
    const relatedMemories = keywords.length
      ? this.search(keywords.join(' '), { includeUnpromoted: false, limit: BLOCKER_KEYWORDS })
      : [];
    return { logged, keywords, relatedMemories };
  }

  remind(message: string, when: string): { created: Reminder } {
    const text = oneLine(message);
    if (!text) throw new MindError('Reminder message is empty');
    const trigger = parseWhen(when, this.now());
    ensureMindFiles(this.paths, this.projectName);

    const next = appendReminder(readTextFile(this.paths.reminders), trigger, text);
    writeFileAtomic(this.paths.reminders, next);
    const created = parseReminders(next).reminders.at(-1);
    if (!created) throw new MindError(`Reminder was written but could not be read back from ${this.paths.reminders}`);
    return { created };
  }

  reminders(turnText?: string): ReminderList {
    const { reminders, malformed } = parseReminders(readTextFile(this.paths.reminders));
    const { due, pending } = evaluateReminders(reminders, { now: this.now(), turnText });
    return { due, pending, malformed };
  }

  /** Mark reminder `id` done; null when no reminder has that id. */
  reminderDone(id: number): Reminder | null {
    const content = readTextFile(this.paths.reminders);
    const { reminders } = parseReminders(content);
    const reminder = reminders.find(r => r.id === id);
    if (!reminder) return null;
    if (reminder.status !== 'done') {
      writeFileAtomic(this.paths.reminders, markDone(content, reminders, [id]));
    }
    return { ...reminder, status: 'done' };
  }

  /** Close the session now: optionally record a summary, then run the boundary branch. */
  checkpoint(input: CheckpointInput = {}): RecallResult {
    const summary = input.summary ? oneLine(input.summary) : '';
    if (summary) {
      ensureMindFiles(this.paths, this.projectName);
      const content = readTextFile(this.paths.memory);
      writeFileAtomic(this.paths.memory, appendSessionSummary(content, {
        date: formatLocalDate(this.now()),
        summary,
        ...(input.mood ? { mood: oneLine(input.mood) } : {}),
        ...(input.next ? { next: oneLine(input.next) } : {}),
      }));
    }
    return this.recall({ forceRefresh: true });
  }

  status(): HealthReport {
    const state = readState(this.paths.state);
    const content = readTextFile(this.paths.memory);
    const fp = fingerprint(content);
    const parsed = this.withInline(this.loadMemory(content, fp));
    const buffer = parseBuffer(readTextFile(this.paths.session));
    return this.health(parsed, buffer, fp, state.contentFingerprint, state.lastActivity);
  }

  /** The unpromoted session buffer as stored. */
  session(): ParsedBuffer & { text: string } {
    const text = readTextFile(this.paths.session);
    return { ...parseBuffer(text), text };
  }

  scanInline(): InlineScanResult {
    return scanInline(this.paths.projectPath, this.config.mindDirName);
  }

  /** Promotion history for one entry, or all of it. */
  promotionHistory(entryId?: string): PromotionHistoryEntry[] {
    return this.access().getHistory(entryId);
  }

  private access(): AccessLog {
    if (!this.accessLog) this.accessLog = new AccessLog(this.paths.accessDb, this.now);
    return this.accessLog;
  }

  private reparse(content: string, fp: string): ParsedMemory {
    this.reparses++;
    const parsed = parseMemory(content, { file: this.paths.memory, now: this.now() });
    writeIndexCache(this.paths.indexCache, fp, parsed, this.now());
    return parsed;
  }

  /** Parsed MEMORY.md from the index cache, re-parsing when it is missing or stale. */
  private loadMemory(content: string, fp: string): ParsedMemory {
    return loadIndexCache(this.paths.indexCache, fp) ?? this.reparse(content, fp);
  }

  private withInline(parsed: ParsedMemory): ParsedMemory {
    if (!this.config.scanInline) return parsed;
    const inline = this.scanInline();
    for (const skipped of inline.skipped) {
      console.warn(`[mindfile] skipped MEMORY comment ${skipped.file}:${skipped.line}: ${skipped.reason}`);
    }
    return { ...parsed, entries: [...parsed.entries, ...inline.entries] };
  }

  private appendMemory(
    content: string,
    body: string,
    kind: MemoryKind,
    now: Date,
  ): Omit<LogResult, 'loopWarning' | 'triggeredReminders'> {
    const isKey = KEY_PREFIX.test(body);
    const prose = stripLabel(body.replace(KEY_PREFIX, ''));
    // Scored as written; wording no rule matches counts as explicitly labeled
    const confidence = classifyLine(body.replace(KEY_PREFIX, ''))?.confidence ?? scoreConfidence('labeled', prose);
    const lowConfidence = confidence < this.config.minConfidence;

    const line = `${isKey ? 'KEY: ' : ''}${labelFor(kind, prose, lowConfidence)}`;
    const appended = appendEntry(content, line, formatLocalDate(now));
    writeFileAtomic(this.paths.memory, appended.content);

    // Our own write: refresh the cache and fingerprint so it does not read as an outside edit
    const fp = fingerprint(appended.content);
    this.reparse(appended.content, fp);
    const state = readState(this.paths.state);
    writeState(this.paths.state, { ...state, contentFingerprint: fp });

    return { storedAs: 'memory', category: kind, confidence, lowConfidence, line: appended.line };
  }

  private promote(
    content: string,
    parsed: ParsedMemory,
    now: Date,
  ): { content: string; summary: PromotionSummary } | null {
    const bufferContent = readTextFile(this.paths.session);
    const { buffer } = parseBuffer(bufferContent);
    if (bufferSize(buffer) === 0) return null;

    // Inline entries live in source files; only MEMORY.md lines can be superseded
    const existing = parsed.entries.filter(e => e.sourceLocation.file === this.paths.memory);
    const plan = planPromotion(buffer, existing, { categories: this.config.promoteCategories });
    const writes = plannedWrites(plan);

    let next = content;
    if (writes.length) {
      next = applyPromotion(content, plan, formatLocalDate(now));
      try {
        writeFileAtomic(this.paths.memory, next);
      } catch (err) {
        throw new PromotionError(`Promotion failed writing ${this.paths.memory}; session buffer kept`, err);
      }
    }

    this.recordPromotion(plan);

    try {
      writeFileAtomic(this.paths.session, renderBuffer(emptyBuffer()));
    } catch (err) {
      // Promoted lines re-read as duplicates on the next boundary
      console.warn(`[mindfile] Could not clear ${this.paths.session}: ${err instanceof Error ? err.message : String(err)}`);
    }

    return {
      content: next,
      summary: {
        inserted: plan.inserted.filter(e => e.action === 'INSERT').length,
        superseded: plan.inserted.filter(e => e.action === 'SUPERSEDE').length,
        linked: plan.linked.length,
        skipped: plan.skipped.length,
      },
    };
  }

  private recordPromotion(plan: PromotionResult): void {
    const history = this.access();
    for (const entry of plannedWrites(plan)) {
      history.recordPromotion(entry.action, entry.sourceText, entry.id, entry.target?.id ?? null);
    }
    for (const skipped of plan.skipped) {
      history.recordPromotion('SKIP', skipped.text, null, skipped.matchId ?? null, skipped.reason);
    }
  }

  private health(
    parsed: ParsedMemory,
    buffer: ParsedBuffer,
    fp: string,
    lastFingerprint: string,
    lastActivity: string | null,
  ): HealthReport {
    return buildHealthReport({
      paths: this.paths,
      parsed,
      buffer,
      reminders: parseReminders(readTextFile(this.paths.reminders)),
      fingerprint: fp,
      lastFingerprint,
      lastActivity,
      warnBytes: this.config.storeWarnBytes,
    });
  }
}
