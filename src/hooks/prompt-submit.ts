#!/usr/bin/env node
/**
 * UserPromptSubmit hook: prints context reminders whose keywords the prompt mentions.
 */

import { promptReminders, PromptSubmitInputSchema } from './handlers.js';
import { outputError, parseJson, readStdin } from './stdio.js';

async function main(): Promise<void> {
  try {
    const parseResult = PromptSubmitInputSchema.safeParse(parseJson(await readStdin()));
    if (!parseResult.success) {
      outputError('prompt-submit', `Invalid hook input: ${parseResult.error.message}`);
      return;
    }
    const text = promptReminders(parseResult.data);
    if (text) process.stdout.write(text);
  } catch (err) {
    outputError('prompt-submit', err instanceof Error ? err.message : String(err));
  }
}

main().catch((err) => {
  outputError('prompt-submit', err instanceof Error ? err.message : String(err));
});
