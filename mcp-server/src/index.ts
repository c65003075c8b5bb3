#!/usr/bin/env node
import 'dotenv/config';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { createAppContext } from './context.js';
import { startHttpServer } from './http/server.js';
import { createTools, handleToolCall } from './tools/index.js';
import { createLogger } from './utils/logger.js';

const httpOnlyMode = process.argv.includes('--http-only');
const stdioOnlyMode = process.argv.includes('--stdio-only');

const context = createAppContext();
const log = createLogger('server');

const server = new Server(
  {
    name: 'colmatch-mcp',
    version: '1.0.0',
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools: createTools() };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  return handleToolCall(context, request.params.name, request.params.arguments ?? {});
});

async function main() {
  const httpServer = stdioOnlyMode ? undefined : await startHttpServer(context);

  const shutdown = async () => {
    await httpServer?.close();
    await server.close();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((error) => {
      log.error('Shutdown failed:', error);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  if (!httpOnlyMode) {
    const transport = new StdioServerTransport();
    await server.connect(transport);
    log.info('Column matching MCP server running on stdio');
  } else {
    log.info('Running in HTTP-only mode (no stdio MCP)');
  }
}

main().catch((error) => {
  log.error('Failed to start server:', error);
  process.exit(1);
});
