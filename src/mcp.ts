#!/usr/bin/env node
import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { ToolDispatcher } from './dispatcher.js';
import { logger } from './logger.js';
import { createServer } from './server.js';
import { MarkdownMemoryStore } from './store.markdown.js';

const config = loadConfig();
const store = new MarkdownMemoryStore({ filePath: config.storage.filePath });
const dispatcher = new ToolDispatcher(store, {
  serverInfo: { name: config.server.name, version: config.server.version },
  instructions: config.server.instructions,
});
const server = createServer(dispatcher);

logger.info({ file: store.location }, 'Starting MCP memory notes server on stdio');
try {
  await server.connect(new StdioServerTransport());
} catch (e) {
  logger.fatal({ err: e }, 'Failed to start MCP server');
  process.exit(1);
}
