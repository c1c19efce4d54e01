import fs from 'fs';
import os from 'os';
import path from 'path';
import { ToolDispatcher } from './dispatcher.js';
import { logger } from './logger.js';
import { MarkdownMemoryStore } from './store.markdown.js';
import { ADD_MEMORY, GET_MEMORIES } from './tools.js';

function main() {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'memory-notes-smoke-'));
  const store = new MarkdownMemoryStore({ filePath: path.join(dir, 'memories.md') });
  const dispatcher = new ToolDispatcher(store, { serverInfo: { name: 'memory-notes-smoke', version: '0.0.0' } });

  const hello = dispatcher.handshake({ name: 'smoke', version: '0.0.0' });
  logger.info({ hello }, 'Handshake');

  const names = dispatcher.listTools().map((t) => t.name);
  logger.info({ names }, 'List tools');

  const empty = dispatcher.callTool(GET_MEMORIES);
  logger.info({ empty }, 'Read before first append');

  for (const content of ['Prefers tea over coffee', 'Works on a markdown editor']) {
    const saved = dispatcher.callTool(ADD_MEMORY, { content });
    logger.info({ saved }, 'Append');
  }

  const invalid = dispatcher.callTool(ADD_MEMORY, {});
  logger.info({ kind: invalid.success ? null : invalid.error.kind }, 'Append without content');

  const all = dispatcher.callTool(GET_MEMORIES);
  logger.info({ all }, 'Read all');

  fs.rmSync(dir, { recursive: true, force: true });
  logger.info('Smoke test done');
}

try {
  main();
} catch (e) {
  logger.error(e, 'Smoke test failed');
  process.exit(1);
}
