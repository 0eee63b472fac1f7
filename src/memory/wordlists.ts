import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
// Same depth from src/memory and dist/memory
const dataDir = join(__dirname, '..', '..', 'data');

const _cache = new Map<string, Set<string>>();

/** Load a one-word-per-line list from data/, ignoring blanks and `#` comments. */
export function loadWordList(name: string): Set<string> {
  const cached = _cache.get(name);
  if (cached) return cached;
  const words = new Set(
    readFileSync(join(dataDir, name), 'utf-8')
      .split('\n')
      .map(line => line.trim().toLowerCase())
      .filter(line => line && !line.startsWith('#')),
  );
  _cache.set(name, words);
  return words;
}

export function stopWords(): Set<string> {
  return loadWordList('stopwords.txt');
}

export function techTerms(): Set<string> {
  return loadWordList('tech-terms.txt');
}
