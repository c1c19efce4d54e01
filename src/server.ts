import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  CallToolResult,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from '@modelcontextprotocol/sdk/types.js';
import type { ToolDispatcher } from './dispatcher.js';
import type { ToolError } from './errors.js';
import type { ToolErrorKind } from './types.js';

const ERROR_CODES: Record<ToolErrorKind, ErrorCode> = {
  UnknownTool: ErrorCode.MethodNotFound,
  InvalidArguments: ErrorCode.InvalidParams,
  InternalFailure: ErrorCode.InternalError,
};

export function toMcpError(error: ToolError): McpError {
  return new McpError(ERROR_CODES[error.kind], error.message, { kind: error.kind });
}

/**
 * Bind a dispatcher to an MCP server. The SDK answers `initialize` itself;
 * the dispatcher learns about the peer once the client confirms with
 * `notifications/initialized`.
 */
export function createServer(dispatcher: ToolDispatcher): Server {
  const server = new Server(dispatcher.serverInfo, {
    capabilities: dispatcher.capabilities,
    instructions: dispatcher.instructions,
  });

  server.oninitialized = () => {
    dispatcher.handshake(server.getClientVersion());
  };

  // List available tools
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: [...dispatcher.listTools()] };
  });

  // Handle tool calls
  server.setRequestHandler(CallToolRequestSchema, async (req): Promise<CallToolResult> => {
    const { name, arguments: args } = req.params;
    const outcome = dispatcher.callTool(name, args ?? {});
    if (!outcome.success) throw toMcpError(outcome.error);
    return { content: [{ type: 'text', text: outcome.content }] };
  });

  return server;
}
