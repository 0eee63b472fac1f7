import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { defaultConfig, type Config } from '../config.js';

/**
 * Create a temp directory populated with the given files.
 * Keys are relative paths, values are file contents.
 */
export function createTempProject(files: Record<string, string> = {}): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mindfile-test-'));
  for (const [relPath, content] of Object.entries(files)) {
    const fullPath = path.join(dir, relPath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, content, 'utf-8');
  }
  return dir;
}

export function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function testConfig(overrides: Partial<Config> = {}): Config {
  return defaultConfig(overrides);
}

/** A settable clock for code that takes `now: () => Date`. */
export class FakeClock {
  private current: Date;

  constructor(start: Date) {
    this.current = new Date(start.getTime());
  }

  now = (): Date => new Date(this.current.getTime());

  advanceMinutes(minutes: number): void {
    this.current = new Date(this.current.getTime() + minutes * 60_000);
  }

  set(date: Date): void {
    this.current = new Date(date.getTime());
  }
}

export const SAMPLE_MEMORY = `# Project Memory

## Project State
- Goal: ship the sync service
- Stack: TypeScript, SQLite
- Blocked: none

## Gotchas
- Windows paths -> normalize to forward slashes

## 2025-03-01
- **Decided:** use SQLite for the access log because it needs no server
- **Issue:** flaky login test on CI
- **Learned:** vitest forks pool isolates native modules

## 2025-03-02 | wired the extractor | mood: good | next: promotion engine
`;
