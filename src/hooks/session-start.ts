#!/usr/bin/env node
/**
 * SessionStart hook: loads project memory for the hook's cwd and prints it
 * to stdout, where the assistant picks it up as context.
 */

import { sessionStartContext, SessionStartInputSchema } from './handlers.js';
import { outputError, parseJson, readStdin } from './stdio.js';

async function main(): Promise<void> {
  try {
    const parseResult = SessionStartInputSchema.safeParse(parseJson(await readStdin()));
    if (!parseResult.success) {
      outputError('session-start', `Invalid hook input: ${parseResult.error.message}`);
      return;
    }
    process.stdout.write(sessionStartContext(parseResult.data));
  } catch (err) {
    outputError('session-start', err instanceof Error ? err.message : String(err));
  }
}

main().catch((err) => {
  outputError('session-start', err instanceof Error ? err.message : String(err));
});
