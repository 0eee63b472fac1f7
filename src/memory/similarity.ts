/**
 * Lexical similarity over TF-IDF vectors.
 *
 * TF is the raw term count; IDF is the smoothed `ln((1 + N) / (1 + df)) + 1`
 * over the stored corpus, recomputed on every query. Terms the corpus has
 * never seen weigh 1, so an empty corpus reduces to plain TF cosine and the
 * texts being compared never tilt their own weights.
 */

import { stopWords } from './wordlists.js';

export type SimilarityTier = 'duplicate' | 'near-duplicate' | 'similar' | 'novel';
export type LoopSeverity = 'critical' | 'high' | 'moderate';

export const DUPLICATE_THRESHOLD = 0.95;
export const NEAR_DUPLICATE_THRESHOLD = 0.9;
export const SIMILAR_THRESHOLD = 0.7;
export const LOOP_THRESHOLD = 0.6;

export interface ScoredMatch {
  id: string;
  score: number;
}

export interface RankOptions {
  limit?: number;
  minScore?: number;
  filter?: (id: string) => boolean;
}

type TermCounts = Map<string, number>;

export function tokenize(text: string): string[] {
  const stops = stopWords();
  return (text.toLowerCase().match(/[a-z0-9]+/g) ?? [])
    .filter(t => t.length >= 2 && !stops.has(t));
}

function countTerms(text: string): TermCounts {
  const counts: TermCounts = new Map();
  for (const term of tokenize(text)) {
    counts.set(term, (counts.get(term) ?? 0) + 1);
  }
  return counts;
}

export class TfIdfIndex {
  private docs = new Map<string, TermCounts>();

  add(id: string, text: string): void {
    this.docs.set(id, countTerms(text));
  }

  /** Cosine similarity of two free texts, weighted by this corpus. */
  similarity(a: string, b: string): number {
    const ca = countTerms(a);
    const cb = countTerms(b);
    if (ca.size === 0 || cb.size === 0) return 0;
    const idf = this.idfTable();
    return cosine(weigh(ca, idf), weigh(cb, idf));
  }

  /** Corpus documents ordered by similarity to `query`, best first. */
  rank(query: string, options: RankOptions = {}): ScoredMatch[] {
    const { limit = 10, minScore = 0, filter } = options;
    const cq = countTerms(query);
    if (cq.size === 0 || this.docs.size === 0) return [];

    const idf = this.idfTable();
    const qv = weigh(cq, idf);
    const matches: ScoredMatch[] = [];
    for (const [id, counts] of this.docs) {
      if (filter && !filter(id)) continue;
      const score = cosine(qv, weigh(counts, idf));
      if (score > 0 && score >= minScore) matches.push({ id, score });
    }
    matches.sort((x, y) => y.score - x.score || x.id.localeCompare(y.id));
    return matches.slice(0, limit);
  }

  bestMatch(text: string, filter?: (id: string) => boolean): ScoredMatch | null {
    return this.rank(text, { limit: 1, filter })[0] ?? null;
  }

  private idfTable(): Map<string, number> {
    const df = new Map<string, number>();
    for (const counts of this.docs.values()) {
      for (const term of counts.keys()) {
        df.set(term, (df.get(term) ?? 0) + 1);
      }
    }
    const n = this.docs.size;
    const idf = new Map<string, number>();
    for (const [term, freq] of df) {
      idf.set(term, Math.log((1 + n) / (1 + freq)) + 1);
    }
    return idf;
  }
}

interface Weighted {
  weights: Map<string, number>;
  /** Sum of squared weights. */
  normSq: number;
}

function weigh(counts: TermCounts, idf: Map<string, number>): Weighted {
  const weights = new Map<string, number>();
  let normSq = 0;
  for (const [term, count] of counts) {
    const w = count * (idf.get(term) ?? 1);
    weights.set(term, w);
    normSq += w * w;
  }
  return { weights, normSq };
}

function cosine(a: Weighted, b: Weighted): number {
  if (a.normSq === 0 || b.normSq === 0) return 0;
  const [small, large] = a.weights.size <= b.weights.size ? [a.weights, b.weights] : [b.weights, a.weights];
  let dot = 0;
  for (const [term, w] of small) {
    const other = large.get(term);
    if (other !== undefined) dot += w * other;
  }
  // One square root over the product keeps integer-weight ratios exact
  return Math.min(1, Math.max(0, dot / Math.sqrt(a.normSq * b.normSq)));
}

export function classifySimilarity(score: number): SimilarityTier {
  if (score >= DUPLICATE_THRESHOLD) return 'duplicate';
  if (score >= NEAR_DUPLICATE_THRESHOLD) return 'near-duplicate';
  if (score >= SIMILAR_THRESHOLD) return 'similar';
  return 'novel';
}

export function loopSeverity(score: number): LoopSeverity | null {
  if (score > 0.95) return 'critical';
  if (score > 0.8) return 'high';
  if (score >= LOOP_THRESHOLD) return 'moderate';
  return null;
}
