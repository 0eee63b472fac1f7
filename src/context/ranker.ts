/**
 * Relevance scoring for context assembly.
 *
 *   score = recency + frequency + stack + continuity
 *
 *   recency    = exp(-ageDays / 7), 1 for KEY entries
 *   frequency  = wFreq * ln(1 + accessCount)
 *   stack      = wStack when a stack or turn keyword appears in the text
 *   continuity = wCont when the text shares a term with the declared next step
 */

import { ageInDays, parseLocalDate } from '../dates.js';
import { tokenize } from '../memory/similarity.js';
import type { MemoryEntry } from '../memory/types.js';

export const RECENCY_DAYS = 7;

export interface RankWeights {
  frequency: number;
  stack: number;
  continuity: number;
}

export interface RankSignals {
  now: Date;
  accessCounts: ReadonlyMap<string, number>;
  /** Project stack plus keywords from the current turn. */
  keywords: readonly string[];
  nextStep?: string;
}

export interface ScoreBreakdown {
  recency: number;
  frequency: number;
  stack: number;
  continuity: number;
  total: number;
}

export interface RankedEntry {
  entry: MemoryEntry;
  score: ScoreBreakdown;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function mentionsKeyword(text: string, keywords: readonly string[]): boolean {
  return keywords.some(k => {
    const term = k.trim();
    return term.length > 0 && new RegExp(`(?:^|[^a-z0-9])${escapeRegExp(term.toLowerCase())}(?:$|[^a-z0-9])`).test(text);
  });
}

export function scoreEntry(entry: MemoryEntry, signals: RankSignals, weights: RankWeights): ScoreBreakdown {
  const created = parseLocalDate(entry.createdAt) ?? signals.now;
  const recency = entry.isKey ? 1 : Math.exp(-ageInDays(created, signals.now) / RECENCY_DAYS);
  const frequency = weights.frequency * Math.log(1 + (signals.accessCounts.get(entry.id) ?? 0));

  const lower = entry.text.toLowerCase();
  const stack = mentionsKeyword(lower, signals.keywords) ? weights.stack : 0;

  let continuity = 0;
  if (signals.nextStep) {
    const nextTerms = new Set(tokenize(signals.nextStep));
    if (tokenize(entry.text).some(t => nextTerms.has(t))) continuity = weights.continuity;
  }

  return { recency, frequency, stack, continuity, total: recency + frequency + stack + continuity };
}

/** Highest score first; ties go to the newer entry, then alphabetical text. */
export function rankItems(
  entries: readonly MemoryEntry[],
  signals: RankSignals,
  weights: RankWeights,
): RankedEntry[] {
  return entries
    .map(entry => ({ entry, score: scoreEntry(entry, signals, weights) }))
    .sort((a, b) =>
      b.score.total - a.score.total ||
      b.entry.createdAt.localeCompare(a.entry.createdAt) ||
      a.entry.text.localeCompare(b.entry.text),
    );
}
