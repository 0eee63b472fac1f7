import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { LoopSeverity } from './memory/similarity.js';

const loopBlock = z.object({ header: z.string(), methodology: z.string() });

const messagesSchema = z.object({
  templates: z.object({
    memory: z.string(),
    reminders: z.string(),
  }),
  loop: z.object({
    critical: loopBlock,
    high: loopBlock,
    moderate: loopBlock,
  }),
  guidance: z.object({
    empty_memory: z.string(),
    reminders_header: z.string(),
    session_header: z.string(),
  }),
});

export type Messages = z.infer<typeof messagesSchema>;
export type TemplateName = keyof Messages['templates'];

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const yamlPath = join(__dirname, '..', 'messages.yaml');

let _cached: Messages | null = null;
export function loadMessages(): Messages {
  if (_cached) return _cached;
  const result = messagesSchema.safeParse(parseYaml(readFileSync(yamlPath, 'utf-8')));
  if (!result.success) {
    throw new ConfigError(`messages.yaml is invalid: ${result.error.issues.map(i => i.path.join('.')).join(', ')}`);
  }
  _cached = result.data;
  return _cached;
}

export function renderTemplate(name: TemplateName, vars: Record<string, string> = {}): string {
  return loadMessages().templates[name].replace(/\{(\w+)\}/g, (whole, key: string) => vars[key] ?? whole);
}

export function loopMessage(severity: LoopSeverity): { header: string; methodology: string } {
  const block = loadMessages().loop[severity];
  return { header: block.header, methodology: block.methodology.trim() };
}
