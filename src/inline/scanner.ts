import fs from 'node:fs';
import path from 'node:path';
import { globSync } from 'glob';
import { classifyLine } from '../memory/extractor.js';
import { toEntry } from '../memory/memory-file.js';
import { formatLocalDate } from '../dates.js';
import type { MemoryEntry } from '../memory/types.js';

/** Comment syntax per extension; group 1 is the memory text. */
const COMMENT_PATTERNS: Record<string, RegExp> = {
  '.ts': /\/\/\s*MEMORY:\s*(.+)/,
  '.tsx': /\/\/\s*MEMORY:\s*(.+)/,
  '.js': /\/\/\s*MEMORY:\s*(.+)/,
  '.jsx': /\/\/\s*MEMORY:\s*(.+)/,
  '.mjs': /\/\/\s*MEMORY:\s*(.+)/,
  '.cjs': /\/\/\s*MEMORY:\s*(.+)/,
  '.go': /\/\/\s*MEMORY:\s*(.+)/,
  '.rs': /\/\/\s*MEMORY:\s*(.+)/,
  '.py': /#\s*MEMORY:\s*(.+)/,
  '.sh': /#\s*MEMORY:\s*(.+)/,
  '.svelte': /<!--\s*MEMORY:\s*(.+?)\s*-->/,
  '.vue': /<!--\s*MEMORY:\s*(.+?)\s*-->/,
  '.html': /<!--\s*MEMORY:\s*(.+?)\s*-->/,
  '.css': /\/\*\s*MEMORY:\s*(.+?)\s*\*\//,
};

const DEFAULT_IGNORE = [
  '**/node_modules/**',
  '**/.git/**',
  '**/dist/**',
  '**/build/**',
  '**/coverage/**',
  '**/.venv/**',
  '**/venv/**',
  '**/__pycache__/**',
];

export interface SkippedComment {
  file: string;
  line: number;
  text: string;
  reason: string;
}

export interface InlineScanResult {
  entries: MemoryEntry[];
  skipped: SkippedComment[];
  filesScanned: number;
}

export function scanInlineFile(root: string, relPath: string, result: InlineScanResult): void {
  const pattern = COMMENT_PATTERNS[path.extname(relPath)];
  if (!pattern) return;
  const file = relPath.replace(/\\/g, '/');

  let content: string;
  let createdAt: string;
  try {
    const full = path.join(root, relPath);
    content = fs.readFileSync(full, 'utf-8');
    createdAt = formatLocalDate(fs.statSync(full).mtime);
  } catch (err) {
    result.skipped.push({ file, line: 0, text: '', reason: `unreadable: ${err instanceof Error ? err.message : String(err)}` });
    return;
  }
  result.filesScanned++;

  content.split('\n').forEach((line, index) => {
    const match = pattern.exec(line);
    if (!match) return;
    const text = match[1].trim();
    const candidate = classifyLine(text);
    if (!candidate) {
      result.skipped.push({ file, line: index + 1, text, reason: 'no recognizable decision, issue or learning' });
      return;
    }
    result.entries.push(toEntry(candidate, text, createdAt, { file, line: index + 1 }));
  });
}

/**
 * Collect `MEMORY:` comments from source files under `root`. The mind
 * directory is skipped along with build output and dependencies.
 */
export function scanInline(root: string, mindDirName: string): InlineScanResult {
  const files = globSync(`**/*{${Object.keys(COMMENT_PATTERNS).join(',')}}`, {
    cwd: root,
    nodir: true,
    dot: false,
    ignore: [...DEFAULT_IGNORE, `${mindDirName}/**`],
    absolute: false,
  }).sort();

  const result: InlineScanResult = { entries: [], skipped: [], filesScanned: 0 };
  for (const relPath of files) scanInlineFile(root, relPath, result);
  return result;
}
