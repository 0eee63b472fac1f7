/**
 * Hook bodies, kept apart from the stdin/stdout entry points so they can be
 * driven directly.
 */

import { z } from 'zod';
import { describeReminder } from '../context/assembler.js';
import { MindEngine, type EngineOptions } from '../engine.js';

export const SessionStartInputSchema = z.object({
  cwd: z.string().min(1),
  session_id: z.string().optional(),
  hook_event_name: z.literal('SessionStart').optional(),
  source: z.string().optional(),
});

export const PromptSubmitInputSchema = z.object({
  cwd: z.string().min(1),
  prompt: z.string(),
  session_id: z.string().optional(),
  hook_event_name: z.literal('UserPromptSubmit').optional(),
});

export type SessionStartInput = z.infer<typeof SessionStartInputSchema>;
export type PromptSubmitInput = z.infer<typeof PromptSubmitInputSchema>;

/** Context to inject at session start. A boundary here promotes the previous session's buffer. */
export function sessionStartContext(input: SessionStartInput, options: EngineOptions = {}): string {
  const engine = new MindEngine(input.cwd, options);
  try {
    const result = engine.recall();
    for (const warning of result.health.warnings) {
      process.stderr.write(`[mindfile] ${warning}\n`);
    }
    const promotion = result.sessionInfo.promotion;
    if (promotion) {
      process.stderr.write(
        `[mindfile] promoted ${promotion.inserted + promotion.superseded + promotion.linked} note(s), skipped ${promotion.skipped}\n`,
      );
    }
    return result.contextText;
  } finally {
    engine.close();
  }
}

/** Context reminders matched by the prompt, as a short block; empty when none match. */
export function promptReminders(input: PromptSubmitInput, options: EngineOptions = {}): string {
  if (!input.prompt.trim()) return '';
  const engine = new MindEngine(input.cwd, options);
  try {
    const { due } = engine.reminders(input.prompt);
    const matched = due.filter(r => r.trigger.kind === 'context');
    if (matched.length === 0) return '';
    return ['## Reminders', ...matched.map(r => `- ${describeReminder(r)}`), ''].join('\n');
  } finally {
    engine.close();
  }
}
