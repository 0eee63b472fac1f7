export const MEMORY_KINDS = ['decision', 'issue', 'learning', 'problem', 'progress', 'gotcha'] as const;
export type MemoryKind = (typeof MEMORY_KINDS)[number];

export const BUFFER_CATEGORIES = ['experience', 'blocker', 'rejected', 'assumption'] as const;
export type BufferCategory = (typeof BUFFER_CATEGORIES)[number];

export const LOG_KINDS = [...MEMORY_KINDS, ...BUFFER_CATEGORIES] as const;
export type LogKind = (typeof LOG_KINDS)[number];

export type ExtractionRule = 'labeled' | 'keyword' | 'hint';

export type IssueStatus = 'open' | 'resolved' | 'blocked';

export interface SourceLocation {
  file: string;
  line: number;
}

/** A typed, confidence-scored reading of one line of prose. */
export interface Candidate {
  kind: LogKind;
  text: string;
  title: string;
  confidence: number;
  rule: ExtractionRule;
  isKey: boolean;
  lowConfidence: boolean;
  /** Zero-based line within the extracted text. */
  line: number;
  reasoning?: string;
  status?: IssueStatus;
}

export interface MemoryEntry {
  id: string;
  kind: MemoryKind;
  text: string;
  title: string;
  confidence: number;
  createdAt: string;
  sourceLocation: SourceLocation;
  isKey: boolean;
  status?: IssueStatus;
  reasoning?: string;
  supersededBy?: string;
  relatedTo?: string;
  /** Buffer category the entry was promoted from, when written with its label. */
  origin?: BufferCategory;
}

export interface ProjectState {
  goal?: string;
  stack: string[];
  blockedBy?: string;
  next?: string;
}

export interface SessionSummary {
  date: string;
  summary: string;
  mood?: string;
  next?: string;
}

export interface ParsedMemory {
  entries: MemoryEntry[];
  projectState: ProjectState;
  sessionSummaries: SessionSummary[];
}

export function isMemoryKind(kind: string): kind is MemoryKind {
  return (MEMORY_KINDS as readonly string[]).includes(kind);
}

export function isBufferCategory(kind: string): kind is BufferCategory {
  return (BUFFER_CATEGORIES as readonly string[]).includes(kind);
}
