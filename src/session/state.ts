import fs from 'node:fs';
import { z } from 'zod';
import { StateCorruptionError } from '../errors.js';
import { writeFileAtomic } from '../storage/fs-utils.js';

const stateSchema = z.object({
  lastActivity: z.string().datetime({ offset: true }).nullable(),
  contentFingerprint: z.string(),
  schemaVersion: z.literal(1),
});

export type StateRecord = z.infer<typeof stateSchema>;

export function emptyState(): StateRecord {
  return { lastActivity: null, contentFingerprint: '', schemaVersion: 1 };
}

export function parseState(raw: string): StateRecord {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new StateCorruptionError('State record is not valid JSON', err);
  }
  const result = stateSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new StateCorruptionError(`State record failed validation: ${issues}`);
  }
  return result.data;
}

/**
 * Read the state record. A missing file is a first run; a corrupt one is
 * reported on stderr and also treated as a first run.
 */
export function readState(filePath: string): StateRecord {
  if (!fs.existsSync(filePath)) return emptyState();
  try {
    return parseState(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    if (err instanceof StateCorruptionError) {
      console.warn(`[mindfile] ${err.message}; treating as first run`);
      return emptyState();
    }
    throw err;
  }
}

export function writeState(filePath: string, state: StateRecord): void {
  writeFileAtomic(filePath, JSON.stringify(state, null, 2) + '\n');
}
