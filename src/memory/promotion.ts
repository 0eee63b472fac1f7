/**
 * Selective promotion of session-buffer lines into permanent memory.
 *
 * `planPromotion` is pure: it reads the buffer and the parsed store and
 * returns what would be written. `applyPromotion` turns a plan into new
 * MEMORY.md content. Writing files and clearing the buffer is the caller's job.
 */

import { BUFFER_CATEGORIES, type BufferCategory, type MemoryEntry, type MemoryKind } from './types.js';
import type { SessionBuffer } from '../session/buffer.js';
import { hasReasoning, labelFor, stripLabel } from './extractor.js';
import { TfIdfIndex, classifySimilarity } from './similarity.js';
import { appendEntry, entryId, markSuperseded, relatedMarker } from './memory-file.js';
import { techTerms } from './wordlists.js';

export type PromotionAction = 'INSERT' | 'SUPERSEDE' | 'LINK';

export type SkipReason = 'no-reasoning' | 'no-technical-signal' | 'duplicate' | 'category-not-eligible' | 'empty';

export interface PlannedEntry {
  action: PromotionAction;
  category: BufferCategory;
  kind: MemoryKind;
  /** Id the entry will have once written. */
  id: string;
  /** Labeled line, without the bullet marker. */
  line: string;
  sourceText: string;
  /** Existing entry this one supersedes or links to. */
  target?: { id: string; line: number; score: number };
}

export interface SkippedItem {
  category: BufferCategory;
  text: string;
  reason: SkipReason;
  matchId?: string;
}

export interface PromotionResult {
  inserted: PlannedEntry[];
  linked: PlannedEntry[];
  skipped: SkippedItem[];
}

export interface PromotionOptions {
  categories: readonly BufferCategory[];
}

const TARGET: Record<BufferCategory, { kind: MemoryKind; label: 'rejected' | 'learning' | 'problem' | 'assumption' }> = {
  rejected: { kind: 'decision', label: 'rejected' },
  experience: { kind: 'learning', label: 'learning' },
  blocker: { kind: 'problem', label: 'problem' },
  assumption: { kind: 'learning', label: 'assumption' },
};

const EXTRA_REASONING = /\btoo\s+(?:slow|complex|heavy|expensive|brittle|fragile|big|much|risky)\b|\b(?:doesn't|does\s+not|didn't)\s+(?:scale|work|support)\b/i;

const TECHNICAL_SIGNALS: RegExp[] = [
  /`[^`]+`/, // backticked identifier
  /(?:^|[\s(])(?:\.{0,2}\/)?[\w.-]+\/[\w./-]+/, // path with a separator
  /\b[\w-]+\.(?:ts|tsx|js|jsx|mjs|cjs|json|md|ya?ml|toml|sql|sh|py|go|rs|css|html|lock|env)\b/, // file name
  /\b[a-z]+[A-Z][a-zA-Z0-9]*\b/, // camelCase
  /\b[a-z0-9]+_[a-z0-9_]+\b/, // snake_case
  /\b[A-Za-z_][\w.]*\(\)/, // call
];

export function hasRejectionReasoning(text: string): boolean {
  return hasReasoning(text) || EXTRA_REASONING.test(text);
}

export function hasTechnicalSignal(text: string): boolean {
  if (TECHNICAL_SIGNALS.some(p => p.test(text))) return true;
  const terms = techTerms();
  return (text.toLowerCase().match(/[a-z0-9]+/g) ?? []).some(t => terms.has(t));
}

function gate(category: BufferCategory, text: string, options: PromotionOptions): SkipReason | null {
  if (!text.trim()) return 'empty';
  if (!options.categories.includes(category)) return 'category-not-eligible';
  if (category === 'rejected' && !hasRejectionReasoning(text)) return 'no-reasoning';
  if (category === 'experience' && !hasTechnicalSignal(text)) return 'no-technical-signal';
  return null;
}

export function planPromotion(
  buffer: SessionBuffer,
  existing: readonly MemoryEntry[],
  options: PromotionOptions,
): PromotionResult {
  const result: PromotionResult = { inserted: [], linked: [], skipped: [] };

  const index = new TfIdfIndex();
  const lineOf = new Map<string, number>();
  for (const entry of existing) {
    if (entry.supersededBy) continue;
    index.add(entry.id, stripLabel(entry.text));
    lineOf.set(entry.id, entry.sourceLocation.line);
  }
  const superseded = new Set<string>();

  for (const category of BUFFER_CATEGORIES) {
    for (const raw of buffer[category]) {
      const text = raw.trim();
      const reason = gate(category, text, options);
      if (reason) {
        result.skipped.push({ category, text, reason });
        continue;
      }

      const target = TARGET[category];
      const line = labelFor(target.label, text);
      const id = entryId(line);
      const match = index.bestMatch(text, candidateId => !superseded.has(candidateId));
      const tier = match ? classifySimilarity(match.score) : 'novel';

      if (match && tier === 'duplicate') {
        result.skipped.push({ category, text, reason: 'duplicate', matchId: match.id });
        continue;
      }

      const planned: PlannedEntry = { action: 'INSERT', category, kind: target.kind, id, line, sourceText: text };
      if (match && tier !== 'novel') {
        // Entries added earlier in this batch have no line yet
        planned.target = { id: match.id, line: lineOf.get(match.id) ?? 0, score: match.score };
        if (tier === 'near-duplicate') {
          planned.action = 'SUPERSEDE';
          superseded.add(match.id);
        } else {
          planned.action = 'LINK';
        }
      }

      if (planned.action === 'LINK') result.linked.push(planned);
      else result.inserted.push(planned);
      index.add(id, text);
    }
  }

  return result;
}

export function plannedWrites(plan: PromotionResult): PlannedEntry[] {
  return [...plan.inserted, ...plan.linked];
}

/**
 * Render a plan into new MEMORY.md content. Supersede markers go on first
 * since they never shift line numbers; new entries follow under `date`.
 */
export function applyPromotion(content: string, plan: PromotionResult, date: string): string {
  let next = content;
  for (const entry of plannedWrites(plan)) {
    if (entry.action === 'SUPERSEDE' && entry.target && entry.target.line > 0) {
      next = markSuperseded(next, entry.target.line, entry.id);
    }
  }
  for (const entry of plannedWrites(plan)) {
    const line = entry.action === 'LINK' && entry.target
      ? `${entry.line} ${relatedMarker(entry.target.id)}`
      : entry.line;
    next = appendEntry(next, line, date).content;
  }
  return next;
}
