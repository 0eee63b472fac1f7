/**
 * Health of the .mind directory: creating missing stores from templates,
 * restoring buffer sections, and the status report.
 */

import fs from 'node:fs';
import { StorageError } from './errors.js';
import { MACHINE_LOCAL_FILES, type MindPaths } from './paths.js';
import { renderTemplate } from './messages.js';
import { fileSize, readTextFile, writeFileAtomic } from './storage/fs-utils.js';
import { emptyBuffer, parseBuffer, renderBuffer, repairSections, type ParsedBuffer } from './session/buffer.js';
import type { ParsedReminders } from './reminders/store.js';
import type { BufferCategory, MemoryKind, ParsedMemory } from './memory/types.js';

export interface RepairReport {
  /** Files created from templates. */
  created: string[];
  /** Buffer sections that were missing and have been added back. */
  repairedSections: BufferCategory[];
}

function ensureDir(dir: string): void {
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (err) {
    throw new StorageError(`Cannot create ${dir}: ${String(err)}`, err);
  }
}

function createIfMissing(file: string, content: () => string, report: RepairReport): boolean {
  if (fs.existsSync(file)) return false;
  writeFileAtomic(file, content());
  report.created.push(file);
  return true;
}

export function gitignoreContent(): string {
  return ['# Machine-local files', ...MACHINE_LOCAL_FILES, ''].join('\n');
}

/**
 * Make sure every store exists and the buffer has all four sections.
 * Existing content is never dropped; an unreadable store is a StorageError.
 */
export function ensureMindFiles(paths: MindPaths, projectName: string): RepairReport {
  const report: RepairReport = { created: [], repairedSections: [] };
  ensureDir(paths.mindDir);

  createIfMissing(paths.memory, () => renderTemplate('memory', { project: projectName }), report);
  createIfMissing(paths.reminders, () => renderTemplate('reminders'), report);

  if (!createIfMissing(paths.session, () => renderBuffer(emptyBuffer()), report)) {
    const content = readTextFile(paths.session);
    const { missingSections } = parseBuffer(content);
    if (missingSections.length) {
      writeFileAtomic(paths.session, repairSections(content));
      report.repairedSections = missingSections;
    }
  }

  if (!createIfMissing(paths.gitignore, gitignoreContent, report)) {
    const content = readTextFile(paths.gitignore);
    const listed = new Set(content.split('\n').map(l => l.trim()));
    const missing = MACHINE_LOCAL_FILES.filter(f => !listed.has(f));
    if (missing.length) {
      writeFileAtomic(paths.gitignore, `${content.replace(/\n+$/, '')}\n${missing.join('\n')}\n`);
    }
  }

  return report;
}

export interface FileStatus {
  path: string;
  exists: boolean;
  bytes: number;
}

export interface HealthReport {
  files: { memory: FileStatus; session: FileStatus; reminders: FileStatus };
  entryCounts: Record<MemoryKind, number>;
  supersededCount: number;
  bufferCounts: Record<BufferCategory, number>;
  reminderCounts: { open: number; done: number; malformed: number };
  /** MEMORY.md changed since the last recall. */
  stale: boolean;
  missingSections: BufferCategory[];
  lastActivity: string | null;
  warnings: string[];
}

export interface HealthInputs {
  paths: MindPaths;
  parsed: ParsedMemory;
  buffer: ParsedBuffer;
  reminders: ParsedReminders;
  fingerprint: string;
  lastFingerprint: string;
  lastActivity: string | null;
  warnBytes: number;
}

function fileStatus(file: string): FileStatus {
  return { path: file, exists: fs.existsSync(file), bytes: fileSize(file) };
}

export function buildHealthReport(inputs: HealthInputs): HealthReport {
  const entryCounts: Record<MemoryKind, number> = {
    decision: 0, issue: 0, learning: 0, problem: 0, progress: 0, gotcha: 0,
  };
  let supersededCount = 0;
  for (const entry of inputs.parsed.entries) {
    if (entry.supersededBy) supersededCount++;
    else entryCounts[entry.kind]++;
  }

  const { buffer } = inputs.buffer;
  const bufferCounts: Record<BufferCategory, number> = {
    experience: buffer.experience.length,
    blocker: buffer.blocker.length,
    rejected: buffer.rejected.length,
    assumption: buffer.assumption.length,
  };

  const open = inputs.reminders.reminders.filter(r => r.status !== 'done').length;
  const reminderCounts = {
    open,
    done: inputs.reminders.reminders.length - open,
    malformed: inputs.reminders.malformed.length,
  };

  const files = {
    memory: fileStatus(inputs.paths.memory),
    session: fileStatus(inputs.paths.session),
    reminders: fileStatus(inputs.paths.reminders),
  };

  const stale = inputs.lastFingerprint !== '' && inputs.lastFingerprint !== inputs.fingerprint;
  const warnings: string[] = [];
  if (files.memory.bytes > inputs.warnBytes) {
    warnings.push(`MEMORY.md is ${files.memory.bytes} bytes (warning threshold ${inputs.warnBytes}); consider archiving old entries`);
  }
  if (stale) warnings.push('MEMORY.md changed since the last recall; the next recall re-indexes it');
  if (inputs.buffer.missingSections.length) {
    warnings.push(`SESSION.md is missing sections: ${inputs.buffer.missingSections.join(', ')}`);
  }
  if (reminderCounts.malformed) {
    warnings.push(`REMINDERS.md has ${reminderCounts.malformed} unreadable line(s)`);
  }

  return {
    files,
    entryCounts,
    supersededCount,
    bufferCounts,
    reminderCounts,
    stale,
    missingSections: inputs.buffer.missingSections,
    lastActivity: inputs.lastActivity,
    warnings,
  };
}
