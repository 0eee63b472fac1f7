import type { BufferCategory } from '../memory/types.js';

// Checked in order; the first category with a matching pattern wins.
const CATEGORY_PATTERNS: [BufferCategory, RegExp[]][] = [
  ['rejected', [
    /\btried\b/i,
    /\b(?:didn't|doesn't|did\s+not|does\s+not|won't)\s+work\b/i,
    /\bfailed\b/i,
    /\boverkill\b/i,
    /\btoo\s+(?:complex|complicated|slow|heavy|expensive)\b/i,
  ]],
  ['blocker', [
    /\bstuck\b/i,
    /\bblocked\b/i,
    /\b(?:can't|cannot|can\s+not)\s+figure\b/i,
    /\bdon't\s+know\s+how\b/i,
    /\bno\s+idea\b/i,
    /\bstruggling\b/i,
    /\bhitting\s+a\s+wall\b/i,
    /\bdead\s+end\b/i,
  ]],
  ['assumption', [
    /\bassum(?:e|es|ed|ing)\b/i,
    /\bi\s+think\b/i,
    /\bprobably\b/i,
    /\bshould\s+be\b/i,
    /\bhypothesis\b/i,
    /\bguessing\b/i,
    /\bexpecting\b/i,
  ]],
];

/** Pick a buffer section for a note logged without an explicit kind. */
export function categorizeSessionNote(text: string): BufferCategory {
  for (const [category, patterns] of CATEGORY_PATTERNS) {
    if (patterns.some(p => p.test(text))) return category;
  }
  return 'experience';
}
