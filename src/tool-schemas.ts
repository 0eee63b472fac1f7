import { z } from 'zod';
import { LOG_KINDS } from './memory/types.js';

const PATH_PROPERTY = {
  type: 'string',
  description: 'Absolute path to the project. Defaults to the directory the server was started in.',
} as const;

const RECALL_DESCRIPTION = `\
Load project memory at the start of a session, or whenever you need to re-orient.

Returns due reminders, the project state, recent decisions, open issues, gotchas and the session buffer. \
Call this first in every session. When more than the configured gap (30 minutes by default) has passed, \
or MEMORY.md was edited by hand, it also promotes worthwhile session notes into permanent memory.

Pass \`turnText\` (the user's latest message) so reminders tied to keywords can fire.`;

const LOG_DESCRIPTION = `\
Record something worth remembering. Never drops input.

Permanent kinds (written to MEMORY.md under today's date):
- decision: a choice and, ideally, why ("use SQLite because it needs no server")
- issue / problem: something broken or in the way
- learning / gotcha: something non-obvious you found out
- progress: something finished

Session kinds (written to SESSION.md, promoted later if they qualify):
- experience: what happened while working
- blocker: what you are stuck on
- rejected: an approach you tried and dropped, with the reason
- assumption: something you are taking on faith

Without \`kind\`, the note goes to the session buffer in the section its wording suggests. \
A rejected note that repeats an earlier rejection comes back with a loop warning.`;

const SEARCH_DESCRIPTION = `\
Search permanent memory and, unless \`includeUnpromoted=false\`, the unpromoted session notes.

Ranks by TF-IDF similarity. Use before re-investigating something that may already be known.`;

const BLOCKER_DESCRIPTION = `\
Log that you are stuck, then look up related memories by the blocker's keywords.

Use instead of mind_log when you are blocked: it often surfaces an earlier decision or gotcha that explains the problem.`;

const REMIND_DESCRIPTION = `\
Set a reminder.

\`when\` accepts: "next session", "today", "tomorrow", a weekday ("friday", "next monday"), \
"in 3 days", "in 2 hours", an ISO date or date-time, a verbal date ("Dec 25", "25 December 2027"), \
or a context trigger ("when I mention auth, login", "when we work on billing", "when deploys come up").`;

export const TOOL_DEFINITIONS = [
  {
    name: 'mind_recall',
    description: RECALL_DESCRIPTION,
    inputSchema: {
      type: 'object' as const,
      properties: {
        path: PATH_PROPERTY,
        forceRefresh: {
          type: 'boolean',
          description: 'Treat this call as a new session: promote and re-index now.',
          default: false,
        },
        turnText: {
          type: 'string',
          description: 'The latest user message, matched against context reminders and used for ranking.',
        },
      },
      required: [],
    },
  },
  {
    name: 'mind_log',
    description: LOG_DESCRIPTION,
    inputSchema: {
      type: 'object' as const,
      properties: {
        path: PATH_PROPERTY,
        message: {
          type: 'string',
          description: 'What to remember, in plain prose.',
        },
        kind: {
          type: 'string',
          enum: [...LOG_KINDS],
          description: 'Where the note belongs. Omit to file it in the session buffer by its wording.',
        },
      },
      required: ['message'],
    },
  },
  {
    name: 'mind_search',
    description: SEARCH_DESCRIPTION,
    inputSchema: {
      type: 'object' as const,
      properties: {
        path: PATH_PROPERTY,
        query: {
          type: 'string',
          description: 'Natural language query.',
        },
        limit: {
          type: 'number',
          description: 'Maximum results (default: 10, max: 50).',
          default: 10,
          maximum: 50,
        },
        includeUnpromoted: {
          type: 'boolean',
          description: 'Also search the session buffer (default: true).',
          default: true,
        },
      },
      required: ['query'],
    },
  },
  {
    name: 'mind_blocker',
    description: BLOCKER_DESCRIPTION,
    inputSchema: {
      type: 'object' as const,
      properties: {
        path: PATH_PROPERTY,
        description: {
          type: 'string',
          description: 'What you are stuck on.',
        },
      },
      required: ['description'],
    },
  },
  {
    name: 'mind_remind',
    description: REMIND_DESCRIPTION,
    inputSchema: {
      type: 'object' as const,
      properties: {
        path: PATH_PROPERTY,
        message: {
          type: 'string',
          description: 'What to be reminded of.',
        },
        when: {
          type: 'string',
          description: 'When the reminder should fire (see the tool description for accepted forms).',
        },
      },
      required: ['message', 'when'],
    },
  },
  {
    name: 'mind_reminders',
    description: 'List reminders: which are due now and which are still pending. Pass turnText to evaluate context reminders against it.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        path: PATH_PROPERTY,
        turnText: {
          type: 'string',
          description: 'Text to match context reminders against.',
        },
      },
      required: [],
    },
  },
  {
    name: 'mind_reminder_done',
    description: 'Mark a reminder done by the number shown as [#N] in mind_reminders or mind_recall.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        path: PATH_PROPERTY,
        id: {
          type: 'number',
          description: 'Reminder number.',
        },
      },
      required: ['id'],
    },
  },
  {
    name: 'mind_checkpoint',
    description: 'End the current session now: optionally record a one-line summary, then promote the session buffer and reload memory.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        path: PATH_PROPERTY,
        summary: {
          type: 'string',
          description: 'One line on what this session achieved.',
        },
        mood: {
          type: 'string',
          description: 'Optional one-word mood for the session.',
        },
        next: {
          type: 'string',
          description: 'The next step; shown at the top of the next session.',
        },
      },
      required: [],
    },
  },
  {
    name: 'mind_status',
    description: 'Show the health of the .mind directory: file sizes, entry and note counts, reminders, and warnings.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        path: PATH_PROPERTY,
      },
      required: [],
    },
  },
  {
    name: 'mind_session',
    description: 'Show the unpromoted notes in the current session buffer.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        path: PATH_PROPERTY,
      },
      required: [],
    },
  },
] as const;

export type ToolName = (typeof TOOL_DEFINITIONS)[number]['name'];

const pathArg = z.string().min(1).optional();

export const TOOL_ARGS = {
  mind_recall: z.object({
    path: pathArg,
    forceRefresh: z.boolean().optional(),
    turnText: z.string().optional(),
  }),
  mind_log: z.object({
    path: pathArg,
    message: z.string().trim().min(1, 'message is empty'),
    kind: z.enum(LOG_KINDS).optional(),
  }),
  mind_search: z.object({
    path: pathArg,
    query: z.string().trim().min(1, 'query is empty'),
    limit: z.number().int().min(1).max(50).optional(),
    includeUnpromoted: z.boolean().optional(),
  }),
  mind_blocker: z.object({
    path: pathArg,
    description: z.string().trim().min(1, 'description is empty'),
  }),
  mind_remind: z.object({
    path: pathArg,
    message: z.string().trim().min(1, 'message is empty'),
    when: z.string().trim().min(1, 'when is empty'),
  }),
  mind_reminders: z.object({
    path: pathArg,
    turnText: z.string().optional(),
  }),
  mind_reminder_done: z.object({
    path: pathArg,
    id: z.number().int().min(1),
  }),
  mind_checkpoint: z.object({
    path: pathArg,
    summary: z.string().optional(),
    mood: z.string().optional(),
    next: z.string().optional(),
  }),
  mind_status: z.object({ path: pathArg }),
  mind_session: z.object({ path: pathArg }),
} satisfies Record<ToolName, z.ZodTypeAny>;
