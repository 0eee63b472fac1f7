#!/usr/bin/env node

// CRITICAL: Redirect console outputs to stderr BEFORE any imports
// Only MCP protocol messages should go to stdout
console.log = (...args: unknown[]) => {
  process.stderr.write('[LOG] ' + args.join(' ') + '\n');
};
console.warn = (...args: unknown[]) => {
  process.stderr.write('[WARN] ' + args.join(' ') + '\n');
};

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  ListToolsRequestSchema,
  CallToolRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { loadConfig } from './config.js';
import { MindEngine } from './engine.js';
import { ToolHandlers } from './tools.js';
import { TOOL_DEFINITIONS } from './tool-schemas.js';

async function main() {
  const config = loadConfig();
  console.log(`Config loaded. Session gap: ${config.sessionGapMinutes}m, directory: ${config.mindDirName}`);

  const handlers = new ToolHandlers(process.cwd(), (projectPath) => new MindEngine(projectPath, { config }));

  const server = new Server(
    { name: 'mindfile', version: '0.1.0' },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [...TOOL_DEFINITIONS],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    switch (name) {
      case 'mind_recall':
        return handlers.handleRecall(args);
      case 'mind_log':
        return handlers.handleLog(args);
      case 'mind_search':
        return handlers.handleSearch(args);
      case 'mind_blocker':
        return handlers.handleBlocker(args);
      case 'mind_remind':
        return handlers.handleRemind(args);
      case 'mind_reminders':
        return handlers.handleReminders(args);
      case 'mind_reminder_done':
        return handlers.handleReminderDone(args);
      case 'mind_checkpoint':
        return handlers.handleCheckpoint(args);
      case 'mind_status':
        return handlers.handleStatus(args);
      case 'mind_session':
        return handlers.handleSession(args);
      default:
        return {
          content: [{ type: 'text' as const, text: `Unknown tool: ${name}` }],
          isError: true,
        };
    }
  });

  const shutdown = (signal: string) => {
    console.error(`Received ${signal}, shutting down...`);
    handlers.close();
    process.exit(0);
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.log(`mindfile MCP server started on stdio for ${process.cwd()}.`);
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
