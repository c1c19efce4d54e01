/**
 * End-to-end tests: an SDK client talks to the server over a linked in-memory
 * transport, exercising initialize, tools/list and tools/call.
 */
import { describe, it, expect, afterEach } from 'vitest';
import path from 'path';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { ToolDispatcher } from '../src/dispatcher.js';
import { InternalFailureError, InvalidArgumentsError, UnknownToolError, StoreError } from '../src/errors.js';
import { createServer, toMcpError } from '../src/server.js';
import { MarkdownMemoryStore } from '../src/store.markdown.js';
import { FIXED_NOW, cleanupScratchDirs, scratchDir } from './helpers.js';

const closers: Array<() => Promise<void>> = [];

async function connect(filePath = path.join(scratchDir(), 'memories.md')) {
  const store = new MarkdownMemoryStore({ filePath, now: () => FIXED_NOW });
  const dispatcher = new ToolDispatcher(store, {
    serverInfo: { name: 'memory-notes-mcp', version: '0.1.0' },
    instructions: 'remember things',
  });
  const server = createServer(dispatcher);
  const client = new Client({ name: 'test-client', version: '1.0.0' });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  await client.connect(clientTransport);
  closers.push(async () => {
    await client.close();
    await server.close();
  });
  return { client, dispatcher, store };
}

async function callError(promise: Promise<unknown>): Promise<McpError> {
  try {
    await promise;
  } catch (e) {
    if (e instanceof McpError) return e;
    throw e;
  }
  throw new Error('expected the call to fail');
}

afterEach(async () => {
  for (const close of closers.splice(0)) await close();
  cleanupScratchDirs();
});

describe('toMcpError', () => {
  it('maps each failure kind to a JSON-RPC error code', () => {
    expect(toMcpError(new UnknownToolError('x')).code).toBe(ErrorCode.MethodNotFound);
    expect(toMcpError(new InvalidArgumentsError('add_memory', ['content: expected a string'])).code).toBe(
      ErrorCode.InvalidParams
    );
    const internal = toMcpError(new InternalFailureError('Failed to save memory', new StoreError('disk full', 'm.md')));
    expect(internal.code).toBe(ErrorCode.InternalError);
    expect(internal.data).toEqual({ kind: 'InternalFailure' });
  });
});

describe('MCP server', () => {
  it('runs the handshake, list, add and get flow', async () => {
    const { client, dispatcher } = await connect();

    expect(client.getServerVersion()).toMatchObject({ name: 'memory-notes-mcp', version: '0.1.0' });
    expect(client.getServerCapabilities()).toMatchObject({ tools: {} });
    expect(client.getInstructions()).toBe('remember things');

    const { tools } = await client.listTools();
    expect(tools).toHaveLength(2);
    expect(tools.map((t) => t.name)).toEqual(['add_memory', 'get_memories']);
    expect(tools[0].inputSchema).toMatchObject({ type: 'object', required: ['content'] });
    expect(dispatcher.state).toBe('ready');
    expect(dispatcher.peer).toMatchObject({ name: 'test-client', version: '1.0.0' });

    const saved = await client.callTool({ name: 'add_memory', arguments: { content: 'User likes coffee' } });
    expect(saved.content).toEqual([{ type: 'text', text: 'Memory saved successfully.' }]);
    expect(saved.isError).toBeFalsy();

    const all = await client.callTool({ name: 'get_memories', arguments: {} });
    expect(all.content).toEqual([{ type: 'text', text: '## 2024-02-29 12:34 UTC\nUser likes coffee\n\n' }]);
  });

  it('answers get_memories without arguments', async () => {
    const { client } = await connect();
    const result = await client.callTool({ name: 'get_memories' });
    expect(result.content).toEqual([{ type: 'text', text: 'No memories found yet.' }]);
  });

  it('reports an unknown tool as MethodNotFound', async () => {
    const { client, store } = await connect();
    const error = await callError(client.callTool({ name: 'nonexistent_tool', arguments: {} }));
    expect(error.code).toBe(ErrorCode.MethodNotFound);
    expect(error.message).toContain('Unknown tool: nonexistent_tool');
    expect(store.readAll()).toBe('No memories found yet.');
  });

  it('reports missing content as InvalidParams', async () => {
    const { client, store } = await connect();
    const error = await callError(client.callTool({ name: 'add_memory', arguments: {} }));
    expect(error.code).toBe(ErrorCode.InvalidParams);
    expect(error.message).toContain('content: required field is missing');
    expect(store.readAll()).toBe('No memories found yet.');
  });

  it('reports a storage failure as InternalError and keeps serving', async () => {
    const { client } = await connect(scratchDir());
    const error = await callError(client.callTool({ name: 'add_memory', arguments: { content: 'lost' } }));
    expect(error.code).toBe(ErrorCode.InternalError);
    expect(error.message).toContain('Failed to save memory');

    const { tools } = await client.listTools();
    expect(tools).toHaveLength(2);
  });
});
