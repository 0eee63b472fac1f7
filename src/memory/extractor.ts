/**
 * Loose, table-driven extraction of typed memory candidates from prose.
 *
 * Every line is matched against an ordered rule table; the first rule that
 * yields a usable title wins. Rule tiers carry a base confidence:
 *
 *   labeled  `**Decided:** ...`               0.9
 *   keyword  "decided to ...", "turns out"    0.7
 *   hint     "thinking about ...", `**Decided?:**`  0.4
 *
 * A causal connective adds 0.1, capped at 0.99. Ambiguous lines are kept at
 * hint confidence rather than dropped so callers can filter by threshold.
 */

import type { Candidate, ExtractionRule, IssueStatus, LogKind } from './types.js';

export const BASE_CONFIDENCE: Record<ExtractionRule, number> = {
  labeled: 0.9,
  keyword: 0.7,
  hint: 0.4,
};

export const CAUSAL_BONUS = 0.1;
export const MAX_CONFIDENCE = 0.99;
export const LOW_CONFIDENCE_THRESHOLD = 0.5;

const MIN_TITLE_LENGTH = 3;

/** Marker words accepted inside `**Label:**`, mapped to the kind they declare. */
const LABELS: Record<string, LogKind> = {
  decided: 'decision',
  decision: 'decision',
  chose: 'decision',
  rejected: 'rejected',
  'ruled out': 'rejected',
  problem: 'problem',
  issue: 'issue',
  bug: 'issue',
  learned: 'learning',
  learning: 'learning',
  til: 'learning',
  insight: 'learning',
  gotcha: 'gotcha',
  warning: 'gotcha',
  'watch out': 'gotcha',
  done: 'progress',
  fixed: 'progress',
  shipped: 'progress',
  completed: 'progress',
  progress: 'progress',
  blocker: 'blocker',
  blocked: 'blocker',
  assumption: 'assumption',
  assuming: 'assumption',
  experience: 'experience',
  tried: 'experience',
};

/** Label written by `labelFor` when a kind is stored explicitly. */
export const LABEL_FOR_KIND: Record<LogKind, string> = {
  decision: 'Decided',
  issue: 'Issue',
  learning: 'Learned',
  problem: 'Problem',
  progress: 'Done',
  gotcha: 'Gotcha',
  rejected: 'Rejected',
  experience: 'Experience',
  blocker: 'Blocker',
  assumption: 'Assumption',
};

interface Rule {
  kind: LogKind;
  rule: ExtractionRule;
  pattern: RegExp;
}

const LABEL_ALTERNATION = Object.keys(LABELS)
  .sort((a, b) => b.length - a.length)
  .map(l => l.replace(/\s+/g, '\\s+'))
  .join('|');

// `**Decided:**`, `**Decided**:`, `**Decided?:**`
const LABEL_PATTERN = new RegExp(`\\*\\*(${LABEL_ALTERNATION})(\\?)?\\s*:?\\s*\\*\\*\\s*:?\\s*(.+)`, 'i');

// Phrases about deciding that are not themselves decisions.
const UNCERTAIN_DECISION: Rule[] = [
  /\b(?:haven't|have\s+not|hasn't|not\s+yet)\s+decided\b\s*(.*)/i,
  /\b(?:need\s+to|needs\s+to|should\s+we|if\s+we|might|may|could)\s+decide\b\s*(.*)/i,
].map((pattern): Rule => ({ kind: 'decision', rule: 'hint', pattern }));

const KEYWORD_RULES: Rule[] = [
  ...[
    /\bdecided\s+(?:to\s+|on\s+)?(.+)/i,
    /\bchose\s+(.+)/i,
    /\bgoing\s+with\s+(.+)/i,
    /\bwent\s+with\s+(.+)/i,
    /\bsettled\s+on\s+(.+)/i,
    /\bswitched\s+to\s+(.+)/i,
    /\bpicked\s+(.+)/i,
  ].map((pattern): Rule => ({ kind: 'decision', rule: 'keyword', pattern })),
  ...[
    /\brejected\s+(.+)/i,
    /\bruled\s+out\s+(.+)/i,
    /\babandoned\s+(.+)/i,
  ].map((pattern): Rule => ({ kind: 'rejected', rule: 'keyword', pattern })),
  ...[
    /\bproblem(?:\s+with|:)?\s+(.+)/i,
    /\bstuck\s+on\s+(.+)/i,
    /\bstruggling\s+with\s+(.+)/i,
  ].map((pattern): Rule => ({ kind: 'problem', rule: 'keyword', pattern })),
  ...[
    /\b(?:issue|bug)(?:\s+with|\s+in|:)?\s+(.+)/i,
    /(.+?)\s+(?:doesn't|does\s+not|won't|will\s+not)\s+work/i,
    /(.+?)\s+(?:is\s+|are\s+)?(?:broken|failing)\b/i,
  ].map((pattern): Rule => ({ kind: 'issue', rule: 'keyword', pattern })),
  ...[
    /\bblocked\s+(?:by|on)\s+(.+)/i,
    /\bwaiting\s+(?:for|on)\s+(.+)/i,
  ].map((pattern): Rule => ({ kind: 'blocker', rule: 'keyword', pattern })),
  ...[
    /\bgotcha:?\s+(.+)/i,
    /\bwatch\s+out\s+(?:for\s+)?(.+)/i,
    /\bbeware\s+(?:of\s+)?(.+)/i,
  ].map((pattern): Rule => ({ kind: 'gotcha', rule: 'keyword', pattern })),
  ...[
    /\blearned\s+(?:that\s+)?(.+)/i,
    /\bdiscovered\s+(?:that\s+)?(.+)/i,
    /\brealized\s+(?:that\s+)?(.+)/i,
    /\bturns\s+out\s+(?:that\s+)?(.+)/i,
    /\bfound\s+out\s+(?:that\s+)?(.+)/i,
    /\btil:?\s+(.+)/i,
  ].map((pattern): Rule => ({ kind: 'learning', rule: 'keyword', pattern })),
  ...[
    /\b(?:fixed|shipped|implemented|completed|finished|merged)\s+(.+)/i,
  ].map((pattern): Rule => ({ kind: 'progress', rule: 'keyword', pattern })),
  ...[
    /\bassuming\s+(?:that\s+)?(.+)/i,
    /\bassume\s+(?:that\s+)?(.+)/i,
  ].map((pattern): Rule => ({ kind: 'assumption', rule: 'keyword', pattern })),
];

const HINT_RULES: Rule[] = [
  ...[
    /\b(?:thinking\s+about|considering|leaning\s+towards?|weighing)\s+(.+)/i,
    /\bmaybe\s+(?:use|go\s+with|switch\s+to|try)\s+(.+)/i,
    /\bmight\s+(?:use|go\s+with|switch\s+to)\s+(.+)/i,
  ].map((pattern): Rule => ({ kind: 'decision', rule: 'hint', pattern })),
  ...[
    /(.+?)\s+(?:seems|looks)\s+(?:off|wrong|weird|flaky|slow)\b/i,
  ].map((pattern): Rule => ({ kind: 'issue', rule: 'hint', pattern })),
  ...[
    /\b(?:apparently|it\s+seems\s+(?:that\s+)?)\s*(.+)/i,
  ].map((pattern): Rule => ({ kind: 'learning', rule: 'hint', pattern })),
];

const CAUSAL_PATTERN = /\b(?:because|since|due\s+to|so\s+that)\b/i;
const REASONING_PATTERN = /\b(?:because|since|due\s+to|so\s+that|reason:)\s*(.+?)(?:\.\s|\.$|$)/i;

const RESOLVED_PATTERN = /\b(?:fixed|resolved|solved)\b|\[x\]/i;
const BLOCKED_PATTERN = /\bblocked\s+(?:by|on)\b|\bwaiting\s+(?:for|on)\b/i;

const KEY_PREFIX = /^(?:\*\*)?(?:key|important)(?::\*\*|\*\*:|:)\s*/i;
const QUICK_PREFIX = /^MEMORY:\s*/;
const LIST_MARKER = /^\s*(?:[-*+]|\d+[.)])\s+/;
const CHECKBOX = /^\[[ xX]\]\s*/;
const TRAILING_COMMENTS = /\s*<!--.*?-->/g;

// `2025-01-01 | shipped feature | mood: good`, with or without a heading marker
const SESSION_SUMMARY_PATTERN =
  /^(?:#{1,6}\s*)?(?:\d{4}-\d{2}-\d{2}|\d{1,2}\/\d{1,2}\/\d{4}|[A-Za-z]+\s+\d{1,2},?\s+\d{4})\s*\|/;

const PROJECT_STATE_LINE = /^[-*]\s*(?:goal|stack|blocked|next)\s*:/i;

/** True for lines that carry structure, not facts. */
export function isSkippableLine(line: string): boolean {
  const stripped = line.trim();
  if (!stripped) return true;
  if (stripped.startsWith('#')) return true;
  if (stripped.startsWith('<!--')) return true;
  if (stripped.startsWith('|')) return true;
  if (/^-{3,}$/.test(stripped)) return true;
  if (PROJECT_STATE_LINE.test(stripped)) return true;
  if (/^keywords:/i.test(stripped)) return true;
  if (isSessionSummaryLine(stripped)) return true;
  return false;
}

export function isSessionSummaryLine(line: string): boolean {
  return SESSION_SUMMARY_PATTERN.test(line.trim());
}

/** Remove list markers, checkboxes and marker comments; keep the prose. */
export function cleanLine(line: string): string {
  return line
    .replace(TRAILING_COMMENTS, '')
    .replace(LIST_MARKER, '')
    .replace(CHECKBOX, '')
    .trim();
}

export function scoreConfidence(rule: ExtractionRule, text: string): number {
  let confidence = BASE_CONFIDENCE[rule];
  if (CAUSAL_PATTERN.test(text)) confidence += CAUSAL_BONUS;
  return Math.round(Math.min(confidence, MAX_CONFIDENCE) * 100) / 100;
}

export function hasReasoning(text: string): boolean {
  return REASONING_PATTERN.test(text);
}

export function findReasoning(text: string): string | undefined {
  const match = REASONING_PATTERN.exec(text);
  const reason = match?.[1]?.trim();
  return reason ? reason : undefined;
}

function detectStatus(line: string): IssueStatus {
  if (RESOLVED_PATTERN.test(line)) return 'resolved';
  if (BLOCKED_PATTERN.test(line)) return 'blocked';
  return 'open';
}

function tidyTitle(raw: string): string {
  return raw.replace(/\*\*/g, '').replace(/[.;,\s]+$/, '').trim();
}

function matchLabel(text: string): { kind: LogKind; rule: ExtractionRule; title: string } | null {
  const match = LABEL_PATTERN.exec(text);
  if (!match) return null;
  const kind = LABELS[match[1].toLowerCase().replace(/\s+/g, ' ')];
  if (!kind) return null;
  return {
    kind,
    rule: match[2] ? 'hint' : 'labeled',
    title: tidyTitle(match[3]),
  };
}

function matchRules(rules: Rule[], text: string): { kind: LogKind; rule: ExtractionRule; title: string } | null {
  for (const { kind, rule, pattern } of rules) {
    const match = pattern.exec(text);
    if (!match) continue;
    const title = tidyTitle(match[1] ?? '');
    // Uncertainty hints keep the whole line as their title
    if (rule === 'hint' && title.length < MIN_TITLE_LENGTH) {
      return { kind, rule, title: tidyTitle(text) };
    }
    if (title.length < MIN_TITLE_LENGTH) continue;
    return { kind, rule, title };
  }
  return null;
}

/**
 * Classify a single line. Returns null for structural lines and for prose
 * with no recognizable signal at all.
 */
export function classifyLine(line: string): Candidate | null {
  if (isSkippableLine(line)) return null;

  let text = cleanLine(line);
  if (!text) return null;

  const isKey = KEY_PREFIX.test(text);
  if (isKey) text = text.replace(KEY_PREFIX, '');
  const body = text.replace(QUICK_PREFIX, '');

  const matched =
    matchLabel(body) ??
    matchRules(UNCERTAIN_DECISION, body) ??
    matchRules(KEYWORD_RULES, body) ??
    matchRules(HINT_RULES, body);
  if (!matched) return null;

  const confidence = scoreConfidence(matched.rule, body);
  const candidate: Candidate = {
    kind: matched.kind,
    text,
    title: matched.title,
    confidence,
    rule: matched.rule,
    isKey,
    lowConfidence: confidence < LOW_CONFIDENCE_THRESHOLD,
    line: 0,
  };

  const reasoning = findReasoning(body);
  if (reasoning) candidate.reasoning = reasoning;
  if (matched.kind === 'issue' || matched.kind === 'problem') {
    candidate.status = detectStatus(line);
  }
  return candidate;
}

export interface ExtractionContext {
  /** Line offset added to every candidate's `line`. */
  lineOffset?: number;
}

/** Extract candidates from free text, one per recognizable line. */
export function extract(text: string, context: ExtractionContext = {}): Candidate[] {
  const offset = context.lineOffset ?? 0;
  const candidates: Candidate[] = [];
  const lines = text.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const candidate = classifyLine(lines[i]);
    if (candidate) {
      candidate.line = i + offset;
      candidates.push(candidate);
    }
  }
  return candidates;
}

/** Format `text` as an explicitly labeled line for `kind`. */
export function labelFor(kind: LogKind, text: string, tentative = false): string {
  const label = LABEL_FOR_KIND[kind];
  return `**${label}${tentative ? '?' : ''}:** ${text.trim()}`;
}

const LEADING_LABEL = /^\*\*[^*]+\*\*\s*:?\s*/;

/** Drop a leading `**Label:**` so bodies compare on content alone. */
export function stripLabel(text: string): string {
  return text.replace(LEADING_LABEL, '').trim();
}
