import type { ToolDescriptor } from './types.js';

export const ADD_MEMORY = 'add_memory';
export const GET_MEMORIES = 'get_memories';

const catalog: ToolDescriptor[] = [
  {
    name: ADD_MEMORY,
    description:
      'Add a new memory about the user. Call this whenever the user shares preferences, facts about themselves, or explicitly asks you to remember something.',
    inputSchema: {
      type: 'object',
      properties: {
        content: { type: 'string', description: 'The content to store in memory' },
      },
      required: ['content'],
    },
  },
  {
    name: GET_MEMORIES,
    description: 'Retrieve all stored memories about the user.',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
];

// Advertised in this order on every tools/list.
export const tools: readonly ToolDescriptor[] = Object.freeze(catalog);
