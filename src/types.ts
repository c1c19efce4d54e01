import { z } from 'zod';

export const AddMemorySchema = z.object({
  content: z.string({
    required_error: 'required field is missing',
    invalid_type_error: 'expected a string',
  }),
});

export interface MemoryEntry {
  readonly timestamp: Date;
  readonly text: string;
}

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, { type: string; description?: string }>;
    required?: string[];
  };
}

export type ToolErrorKind = 'UnknownTool' | 'InvalidArguments' | 'InternalFailure';

export interface PeerInfo {
  name: string;
  version: string;
}

export interface HandshakeResult {
  serverInfo: PeerInfo;
  capabilities: { tools: { listChanged?: boolean } };
  instructions?: string;
}
