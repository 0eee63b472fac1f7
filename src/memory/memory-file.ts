/**
 * Reading and appending the permanent store (MEMORY.md).
 *
 * The file is human-edited markdown. Entries are never rewritten; the only
 * in-place edit is appending a `<!-- superseded-by: id -->` marker.
 */

import { createHash } from 'node:crypto';
import { classifyLine, isSessionSummaryLine, isSkippableLine } from './extractor.js';
import { formatLocalDate, parseHeadingDate } from '../dates.js';
import type {
  BufferCategory,
  Candidate,
  MemoryEntry,
  MemoryKind,
  ParsedMemory,
  ProjectState,
  SessionSummary,
} from './types.js';
import { isBufferCategory } from './types.js';

const SUPERSEDED_MARKER = /<!--\s*superseded-by:\s*([a-f0-9]+)\s*-->/i;
const RELATED_MARKER = /<!--\s*related:\s*([a-f0-9]+)\s*-->/i;
const HEADING = /^(#{1,6})\s+(.*)$/;
const STATE_LINE = /^[-*]\s*(goal|stack|blocked|next)\s*:\s*(.*)$/i;
const GOTCHA_ARROW = /^[-*]\s*(.+?)\s*(?:->|→)\s*(.+)$/;

/** Buffer categories land under the nearest permanent kind. */
const PROMOTED_KIND: Record<BufferCategory, MemoryKind> = {
  rejected: 'decision',
  experience: 'learning',
  blocker: 'problem',
  assumption: 'learning',
};

export function entryId(text: string): string {
  const normalized = text.trim().toLowerCase().replace(/\s+/g, ' ');
  return createHash('md5').update(normalized).digest('hex').slice(0, 12);
}

export function fingerprint(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

export interface ParseOptions {
  file: string;
  now: Date;
}

type Section = 'entries' | 'state' | 'gotchas';

export function emptyProjectState(): ProjectState {
  return { stack: [] };
}

export function parseMemory(content: string, options: ParseOptions): ParsedMemory {
  const entries: MemoryEntry[] = [];
  const projectState = emptyProjectState();
  const sessionSummaries: SessionSummary[] = [];
  const fallbackDate = formatLocalDate(options.now);

  let section: Section = 'entries';
  let currentDate: string | null = null;

  const lines = content.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const trimmed = line.trim();

    const heading = HEADING.exec(trimmed);
    if (heading) {
      const title = heading[2].trim();
      if (isSessionSummaryLine(trimmed)) {
        const summary = parseSessionSummary(title);
        if (summary) {
          sessionSummaries.push(summary);
          currentDate = summary.date;
        }
        section = 'entries';
      } else if (/^project\s+state$/i.test(title)) {
        section = 'state';
      } else if (/^gotchas?$/i.test(title)) {
        section = 'gotchas';
      } else {
        section = 'entries';
        currentDate = parseHeadingDate(title);
      }
      continue;
    }

    if (section === 'state') {
      applyStateLine(projectState, trimmed);
      continue;
    }

    const createdAt = currentDate ?? fallbackDate;
    const location = { file: options.file, line: i + 1 };
    const candidate = classifyLine(line);

    if (section === 'gotchas') {
      const entry = gotchaEntry(trimmed, candidate, createdAt, location);
      if (entry) entries.push(entry);
      continue;
    }

    if (candidate) entries.push(toEntry(candidate, line, createdAt, location));
  }

  return { entries, projectState, sessionSummaries };
}

function applyStateLine(state: ProjectState, line: string): void {
  const match = STATE_LINE.exec(line);
  if (!match) return;
  const value = match[2].trim();
  if (!value || /^\(.*\)$/.test(value)) return;
  switch (match[1].toLowerCase()) {
    case 'goal':
      state.goal = value;
      break;
    case 'stack':
      state.stack = value.split(',').map(s => s.trim()).filter(Boolean);
      break;
    case 'blocked':
      if (!/^(?:none|nothing|no|n\/a|-)$/i.test(value)) state.blockedBy = value;
      break;
    case 'next':
      state.next = value;
      break;
  }
}

/** Parse `date | summary | mood: x | next: y` (heading marker already removed). */
export function parseSessionSummary(text: string): SessionSummary | null {
  const parts = text.split('|').map(p => p.trim());
  const date = parseHeadingDate(parts[0] ?? '');
  if (!date) return null;
  const summary: SessionSummary = { date, summary: '' };
  for (const part of parts.slice(1)) {
    const field = /^(mood|next)\s*:\s*(.*)$/i.exec(part);
    if (field) {
      const value = field[2].trim();
      if (!value) continue;
      if (field[1].toLowerCase() === 'mood') summary.mood = value;
      else summary.next = value;
    } else if (!summary.summary) {
      summary.summary = part;
    }
  }
  return summary;
}

export function toEntry(
  candidate: Candidate,
  rawLine: string,
  createdAt: string,
  sourceLocation: MemoryEntry['sourceLocation'],
): MemoryEntry {
  const entry: MemoryEntry = {
    id: entryId(candidate.text),
    kind: isBufferCategory(candidate.kind) ? PROMOTED_KIND[candidate.kind] : candidate.kind,
    text: candidate.text,
    title: candidate.title,
    confidence: candidate.confidence,
    createdAt,
    sourceLocation,
    isKey: candidate.isKey,
  };
  if (isBufferCategory(candidate.kind)) entry.origin = candidate.kind;
  if (candidate.status) entry.status = candidate.status;
  if (candidate.reasoning) entry.reasoning = candidate.reasoning;
  const superseded = SUPERSEDED_MARKER.exec(rawLine);
  if (superseded) entry.supersededBy = superseded[1];
  const related = RELATED_MARKER.exec(rawLine);
  if (related) entry.relatedTo = related[1];
  return entry;
}

function gotchaEntry(
  line: string,
  candidate: Candidate | null,
  createdAt: string,
  sourceLocation: MemoryEntry['sourceLocation'],
): MemoryEntry | null {
  if (isSkippableLine(line)) return null;
  const arrow = GOTCHA_ARROW.exec(line.replace(/\s*<!--.*?-->/g, ''));
  if (arrow) {
    const text = `${arrow[1]} -> ${arrow[2]}`;
    return toEntry(
      { kind: 'gotcha', text, title: text, confidence: 0.9, rule: 'labeled', isKey: false, lowConfidence: false, line: 0 },
      line,
      createdAt,
      sourceLocation,
    );
  }
  if (candidate) return toEntry({ ...candidate, kind: 'gotcha' }, line, createdAt, sourceLocation);
  if (!/^[-*]\s/.test(line)) return null;
  const text = line.replace(/^[-*]\s*/, '').replace(/\s*<!--.*?-->/g, '').trim();
  if (!text) return null;
  return toEntry(
    { kind: 'gotcha', text, title: text, confidence: 0.7, rule: 'keyword', isKey: false, lowConfidence: false, line: 0 },
    line,
    createdAt,
    sourceLocation,
  );
}

export interface AppendResult {
  content: string;
  /** One-based line of the appended entry. */
  line: number;
}

/**
 * Append `line` as a bullet under the `## <date>` heading, creating the
 * heading at the end of the file when it does not exist yet.
 */
export function appendEntry(content: string, line: string, date: string): AppendResult {
  const bullet = line.startsWith('- ') ? line : `- ${line}`;
  const lines = content.length ? content.replace(/\n+$/, '').split('\n') : [];

  const headingIndex = lines.findIndex(l => l.trim() === `## ${date}`);
  if (headingIndex === -1) {
    if (lines.length) lines.push('');
    lines.push(`## ${date}`, bullet);
    return { content: lines.join('\n') + '\n', line: lines.length };
  }

  let insertAt = headingIndex + 1;
  for (let i = headingIndex + 1; i < lines.length; i++) {
    if (HEADING.test(lines[i].trim())) break;
    if (lines[i].trim()) insertAt = i + 1;
  }
  lines.splice(insertAt, 0, bullet);
  return { content: lines.join('\n') + '\n', line: insertAt + 1 };
}

/** Append a superseded-by marker to the one-based `line`. Idempotent. */
export function markSuperseded(content: string, line: number, newId: string): string {
  const lines = content.split('\n');
  const index = line - 1;
  if (index < 0 || index >= lines.length) return content;
  if (SUPERSEDED_MARKER.test(lines[index])) return content;
  lines[index] = `${lines[index].replace(/\s+$/, '')} <!-- superseded-by: ${newId} -->`;
  return lines.join('\n');
}

export function relatedMarker(id: string): string {
  return `<!-- related: ${id} -->`;
}

export function formatSessionSummary(summary: SessionSummary): string {
  const parts = [summary.date, summary.summary.trim()];
  if (summary.mood) parts.push(`mood: ${summary.mood.trim()}`);
  if (summary.next) parts.push(`next: ${summary.next.trim()}`);
  return `## ${parts.join(' | ')}`;
}

export function appendSessionSummary(content: string, summary: SessionSummary): string {
  const body = content.replace(/\n+$/, '');
  return `${body ? `${body}\n\n` : ''}${formatSessionSummary(summary)}\n`;
}

/** Latest declared next step: newest session summary, then Project State. */
export function declaredNextStep(parsed: ParsedMemory): string | undefined {
  for (let i = parsed.sessionSummaries.length - 1; i >= 0; i--) {
    const next = parsed.sessionSummaries[i].next;
    if (next) return next;
  }
  return parsed.projectState.next;
}
