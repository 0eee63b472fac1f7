import path from 'node:path';
import os from 'node:os';
import { getConfig } from './config.js';

/**
 * Normalize a path to forward slashes, resolve to absolute, remove trailing slash.
 * Called at every boundary that takes a path from outside.
 */
export function normalizePath(inputPath: string): string {
  let resolved = inputPath;
  if (resolved.startsWith('~')) {
    resolved = path.join(os.homedir(), resolved.slice(1));
  }
  resolved = path.resolve(resolved);
  resolved = resolved.replace(/\\/g, '/');
  if (resolved.length > 1 && resolved.endsWith('/')) {
    resolved = resolved.slice(0, -1);
  }
  return resolved;
}

export interface MindPaths {
  projectPath: string;
  mindDir: string;
  memory: string;
  session: string;
  reminders: string;
  state: string;
  indexCache: string;
  accessDb: string;
  gitignore: string;
}

export function getMindPaths(projectPath: string, mindDirName = getConfig().mindDirName): MindPaths {
  const root = normalizePath(projectPath);
  const mindDir = `${root}/${mindDirName}`;
  return {
    projectPath: root,
    mindDir,
    memory: `${mindDir}/MEMORY.md`,
    session: `${mindDir}/SESSION.md`,
    reminders: `${mindDir}/REMINDERS.md`,
    state: `${mindDir}/state.json`,
    indexCache: `${mindDir}/.index.json`,
    accessDb: `${mindDir}/.mind.db`,
    gitignore: `${mindDir}/.gitignore`,
  };
}

/** Files under the mind directory that are machine-local and never committed. */
export const MACHINE_LOCAL_FILES = ['state.json', '.index.json', '.mind.db', '.mind.db-wal', '.mind.db-shm'];
