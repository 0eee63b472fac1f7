/**
 * Derived cache of the parsed permanent store (.index.json). Trusted only
 * while its fingerprint matches the store; anything else is a miss.
 */

import fs from 'node:fs';
import { z } from 'zod';
import { writeFileAtomic } from '../storage/fs-utils.js';
import { BUFFER_CATEGORIES, MEMORY_KINDS, type ParsedMemory } from './types.js';

const entrySchema = z.object({
  id: z.string(),
  kind: z.enum(MEMORY_KINDS),
  text: z.string(),
  title: z.string(),
  confidence: z.number().min(0).max(1),
  createdAt: z.string(),
  sourceLocation: z.object({ file: z.string(), line: z.number().int() }),
  isKey: z.boolean(),
  status: z.enum(['open', 'resolved', 'blocked']).optional(),
  reasoning: z.string().optional(),
  supersededBy: z.string().optional(),
  relatedTo: z.string().optional(),
  origin: z.enum(BUFFER_CATEGORIES).optional(),
});

const cacheSchema = z.object({
  fingerprint: z.string(),
  builtAt: z.string(),
  entries: z.array(entrySchema),
  projectState: z.object({
    goal: z.string().optional(),
    stack: z.array(z.string()),
    blockedBy: z.string().optional(),
    next: z.string().optional(),
  }),
  sessionSummaries: z.array(z.object({
    date: z.string(),
    summary: z.string(),
    mood: z.string().optional(),
    next: z.string().optional(),
  })),
});

export type IndexCache = z.infer<typeof cacheSchema>;

/** Load the cache when it exists, validates and matches `fingerprint`. */
export function loadIndexCache(filePath: string, fingerprint: string): ParsedMemory | null {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch {
    return null;
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    console.warn(`[mindfile] Ignoring unreadable index cache ${filePath}`);
    return null;
  }
  const result = cacheSchema.safeParse(json);
  if (!result.success || result.data.fingerprint !== fingerprint) return null;
  const { entries, projectState, sessionSummaries } = result.data;
  return { entries, projectState, sessionSummaries };
}

export function writeIndexCache(filePath: string, fingerprint: string, parsed: ParsedMemory, builtAt: Date): void {
  const cache: IndexCache = { fingerprint, builtAt: builtAt.toISOString(), ...parsed };
  writeFileAtomic(filePath, JSON.stringify(cache) + '\n');
}
