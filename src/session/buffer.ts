/**
 * The ephemeral session buffer (SESSION.md): four bullet lists under fixed
 * headings. Filled by `log`, drained all-or-nothing by promotion.
 */

import { BUFFER_CATEGORIES, type BufferCategory } from '../memory/types.js';

export const SECTION_HEADINGS: Record<BufferCategory, string> = {
  experience: 'Experience',
  blocker: 'Blockers',
  rejected: 'Rejected',
  assumption: 'Assumptions',
};

export type SessionBuffer = Record<BufferCategory, string[]>;

export interface ParsedBuffer {
  buffer: SessionBuffer;
  missingSections: BufferCategory[];
}

const HEADING = /^#{1,6}\s+(.*)$/;

export function emptyBuffer(): SessionBuffer {
  return { experience: [], blocker: [], rejected: [], assumption: [] };
}

function sectionFor(title: string): BufferCategory | null {
  const normalized = title.trim().toLowerCase();
  for (const category of BUFFER_CATEGORIES) {
    if (SECTION_HEADINGS[category].toLowerCase() === normalized) return category;
  }
  return null;
}

export function parseBuffer(content: string): ParsedBuffer {
  const buffer = emptyBuffer();
  const seen = new Set<BufferCategory>();
  let current: BufferCategory | null = null;

  for (const raw of content.split('\n')) {
    const line = raw.trim();
    const heading = HEADING.exec(line);
    if (heading) {
      current = sectionFor(heading[1]);
      if (current) seen.add(current);
      continue;
    }
    if (!current || !line || line.startsWith('<!--')) continue;
    const text = line.replace(/^[-*]\s+/, '').trim();
    if (text) buffer[current].push(text);
  }

  return {
    buffer,
    missingSections: BUFFER_CATEGORIES.filter(c => !seen.has(c)),
  };
}

export function renderBuffer(buffer: SessionBuffer, title = 'Session'): string {
  const parts = [`# ${title}`, ''];
  for (const category of BUFFER_CATEGORIES) {
    parts.push(`## ${SECTION_HEADINGS[category]}`);
    for (const line of buffer[category]) parts.push(`- ${line}`);
    parts.push('');
  }
  return parts.join('\n');
}

export function bufferSize(buffer: SessionBuffer): number {
  return BUFFER_CATEGORIES.reduce((sum, c) => sum + buffer[c].length, 0);
}

export interface BufferAppend {
  content: string;
  /** One-based line of the appended bullet. */
  line: number;
}

/** Append a bullet at the end of `category`'s section, adding the section if missing. */
export function appendToBuffer(content: string, category: BufferCategory, text: string): BufferAppend {
  const bullet = `- ${text.trim()}`;
  const lines = content.length ? content.replace(/\n+$/, '').split('\n') : [];

  const headingIndex = lines.findIndex(l => {
    const heading = HEADING.exec(l.trim());
    return heading !== null && sectionFor(heading[1]) === category;
  });

  if (headingIndex === -1) {
    if (lines.length) lines.push('');
    lines.push(`## ${SECTION_HEADINGS[category]}`, bullet);
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

/** Add any missing section headings, keeping existing content. */
export function repairSections(content: string): string {
  const { missingSections } = parseBuffer(content);
  if (missingSections.length === 0) return content;
  let next = content.replace(/\n+$/, '');
  for (const category of missingSections) {
    next += `${next ? '\n\n' : ''}## ${SECTION_HEADINGS[category]}`;
  }
  return next + '\n';
}
