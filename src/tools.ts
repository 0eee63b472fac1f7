import type { z } from 'zod';
import { MindEngine } from './engine.js';
import { normalizePath } from './paths.js';
import { TOOL_ARGS } from './tool-schemas.js';
import {
  textResult,
  formatBlocker,
  formatLogResult,
  formatRecall,
  formatReminderCreated,
  formatReminderList,
  formatSearchResults,
  formatSession,
  formatStatus,
} from './format.js';

export type ToolResult = ReturnType<typeof textResult>;
export type EngineFactory = (projectPath: string) => MindEngine;

const locks = new Map<string, Promise<void>>();

async function withMutex<T>(key: string, fn: () => Promise<T>): Promise<T> {
  const prev = locks.get(key) ?? Promise.resolve();

  let resolve!: () => void;
  const current = new Promise<void>(r => { resolve = r; });
  locks.set(key, current);

  await prev;

  try {
    return await fn();
  } finally {
    resolve();
    if (locks.get(key) === current) {
      locks.delete(key);
    }
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(i => (i.path.length ? `"${i.path.join('.')}" ${i.message}` : i.message))
    .join('; ');
}

export class ToolHandlers {
  private engines = new Map<string, MindEngine>();

  constructor(
    private defaultPath: string,
    private createEngine: EngineFactory = (projectPath) => new MindEngine(projectPath),
  ) {}

  close(): void {
    for (const engine of this.engines.values()) engine.close();
    this.engines.clear();
  }

  async handleRecall(args: unknown): Promise<ToolResult> {
    return this.call(TOOL_ARGS.mind_recall, args, 'loading memory', (engine, input) =>
      formatRecall(engine.recall({ forceRefresh: input.forceRefresh, turnText: input.turnText })),
    );
  }

  async handleLog(args: unknown): Promise<ToolResult> {
    return this.call(TOOL_ARGS.mind_log, args, 'logging', (engine, input) =>
      formatLogResult(engine.log(input.message, input.kind)),
    );
  }

  async handleSearch(args: unknown): Promise<ToolResult> {
    return this.call(TOOL_ARGS.mind_search, args, 'searching memory', (engine, input) =>
      formatSearchResults(
        engine.search(input.query, { limit: input.limit, includeUnpromoted: input.includeUnpromoted }),
        input.query,
      ),
    );
  }

  async handleBlocker(args: unknown): Promise<ToolResult> {
    return this.call(TOOL_ARGS.mind_blocker, args, 'logging blocker', (engine, input) =>
      formatBlocker(engine.blocker(input.description)),
    );
  }

  async handleRemind(args: unknown): Promise<ToolResult> {
    return this.call(TOOL_ARGS.mind_remind, args, 'setting reminder', (engine, input) =>
      formatReminderCreated(engine.remind(input.message, input.when).created),
    );
  }

  async handleReminders(args: unknown): Promise<ToolResult> {
    return this.call(TOOL_ARGS.mind_reminders, args, 'listing reminders', (engine, input) =>
      formatReminderList(engine.reminders(input.turnText)),
    );
  }

  async handleReminderDone(args: unknown): Promise<ToolResult> {
    return this.call(TOOL_ARGS.mind_reminder_done, args, 'completing reminder', (engine, input) => {
      const reminder = engine.reminderDone(input.id);
      return reminder
        ? `Marked reminder #${reminder.id} done: ${reminder.message}`
        : `No reminder #${input.id}. Use mind_reminders to see the numbers.`;
    });
  }

  async handleCheckpoint(args: unknown): Promise<ToolResult> {
    return this.call(TOOL_ARGS.mind_checkpoint, args, 'checkpointing', (engine, input) =>
      formatRecall(engine.checkpoint({ summary: input.summary, mood: input.mood, next: input.next })),
    );
  }

  async handleStatus(args: unknown): Promise<ToolResult> {
    return this.call(TOOL_ARGS.mind_status, args, 'reading status', (engine) =>
      formatStatus(engine.status()),
    );
  }

  async handleSession(args: unknown): Promise<ToolResult> {
    return this.call(TOOL_ARGS.mind_session, args, 'reading session', (engine) =>
      formatSession(engine.session()),
    );
  }

  private engine(projectPath: string): MindEngine {
    let engine = this.engines.get(projectPath);
    if (!engine) {
      engine = this.createEngine(projectPath);
      this.engines.set(projectPath, engine);
    }
    return engine;
  }

  /** Validate, then run `fn` holding the project's lock. Failures come back as text. */
  private async call<T extends { path?: string }>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    args: unknown,
    action: string,
    fn: (engine: MindEngine, input: T) => string,
  ): Promise<ToolResult> {
    const parsed = schema.safeParse(args ?? {});
    if (!parsed.success) return textResult(`Error: ${formatIssues(parsed.error)}`);
    const input = parsed.data;
    const projectPath = normalizePath(input.path ?? this.defaultPath);

    try {
      return await withMutex(projectPath, async () => textResult(fn(this.engine(projectPath), input)));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return textResult(`Error ${action}: ${message}`);
    }
  }
}
