/**
 * Warns when new text repeats an approach that was already rejected, either
 * in this session's buffer or in permanent memory.
 */

import { stripLabel } from './extractor.js';
import { TfIdfIndex, LOOP_THRESHOLD, loopSeverity, type LoopSeverity } from './similarity.js';
import { loopMessage } from '../messages.js';
import type { MemoryEntry } from './types.js';

export interface LoopWarning {
  severity: LoopSeverity;
  score: number;
  source: 'session' | 'memory';
  matchedText: string;
  header: string;
  methodology: string;
}

const REJECTED_TEXT = /^rejected\s*:/i;

/** Permanent entries that record a rejected approach. */
export function rejectedEntries(entries: readonly MemoryEntry[]): MemoryEntry[] {
  return entries.filter(e => !e.supersededBy && (e.origin === 'rejected' || REJECTED_TEXT.test(stripLabel(e.text))));
}

export function detectLoop(
  text: string,
  sessionRejected: readonly string[],
  entries: readonly MemoryEntry[],
): LoopWarning | null {
  const index = new TfIdfIndex();
  const sources = new Map<string, { source: LoopWarning['source']; text: string }>();

  sessionRejected.forEach((line, i) => {
    const id = `session:${i}`;
    index.add(id, line);
    sources.set(id, { source: 'session', text: line });
  });
  for (const entry of rejectedEntries(entries)) {
    const body = stripLabel(entry.text).replace(REJECTED_TEXT, '').trim();
    const id = `memory:${entry.id}`;
    index.add(id, body);
    sources.set(id, { source: 'memory', text: entry.text });
  }

  const match = index.bestMatch(text);
  if (!match || match.score < LOOP_THRESHOLD) return null;
  const severity = loopSeverity(match.score);
  const origin = sources.get(match.id);
  if (!severity || !origin) return null;

  const { header, methodology } = loopMessage(severity);
  return {
    severity,
    score: match.score,
    source: origin.source,
    matchedText: origin.text,
    header,
    methodology,
  };
}

export function formatLoopWarning(warning: LoopWarning): string {
  return [
    warning.header,
    `Previously rejected (${warning.source}): ${warning.matchedText}`,
    '',
    warning.methodology,
  ].join('\n');
}
