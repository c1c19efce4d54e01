import type { IMemoryStore } from './store.js';
import type { HandshakeResult, PeerInfo, ToolDescriptor } from './types.js';
import { AddMemorySchema } from './types.js';
import { ADD_MEMORY, GET_MEMORIES, tools } from './tools.js';
import {
  InternalFailureError,
  InvalidArgumentsError,
  ToolError,
  UnknownToolError,
} from './errors.js';
import { logger } from './logger.js';

export const MEMORY_SAVED = 'Memory saved successfully.';

export type DispatcherState = 'uninitialized' | 'ready';

export type CallOutcome =
  | { success: true; content: string }
  | { success: false; error: ToolError };

export interface DispatcherOptions {
  serverInfo: PeerInfo;
  instructions?: string;
}

/**
 * Routes protocol requests to the memory store. A call never throws: every
 * failure comes back as an outcome the protocol layer can encode.
 */
export class ToolDispatcher {
  private _state: DispatcherState = 'uninitialized';
  private _peer: PeerInfo | undefined;

  constructor(private readonly store: IMemoryStore, private readonly opts: DispatcherOptions) {}

  get state(): DispatcherState {
    return this._state;
  }

  get peer(): PeerInfo | undefined {
    return this._peer;
  }

  get serverInfo(): PeerInfo {
    return { ...this.opts.serverInfo };
  }

  get capabilities(): HandshakeResult['capabilities'] {
    return { tools: {} };
  }

  get instructions(): string | undefined {
    return this.opts.instructions;
  }

  handshake(peer?: PeerInfo): HandshakeResult {
    this._peer = peer;
    if (this._state === 'uninitialized') {
      this._state = 'ready';
      logger.info({ peer }, 'Handshake accepted');
    } else {
      logger.warn({ peer }, 'Repeated handshake');
    }
    const result: HandshakeResult = { serverInfo: this.serverInfo, capabilities: this.capabilities };
    if (this.opts.instructions) result.instructions = this.opts.instructions;
    return result;
  }

  listTools(): readonly ToolDescriptor[] {
    return tools;
  }

  callTool(name: string, args: Record<string, unknown> = {}): CallOutcome {
    logger.debug({ tool: name, state: this._state }, 'Tool call');
    switch (name) {
      case ADD_MEMORY: {
        const parsed = AddMemorySchema.safeParse(args);
        if (!parsed.success) {
          const issues = parsed.error.errors.map((err) => (err.path.length ? `${err.path.join('.')}: ${err.message}` : err.message));
          return this.fail(new InvalidArgumentsError(name, issues));
        }
        try {
          this.store.append(parsed.data.content);
        } catch (e) {
          return this.fail(new InternalFailureError('Failed to save memory', e));
        }
        return { success: true, content: MEMORY_SAVED };
      }
      case GET_MEMORIES: {
        // arguments are ignored
        try {
          return { success: true, content: this.store.readAll() };
        } catch (e) {
          return this.fail(new InternalFailureError('Failed to retrieve memories', e));
        }
      }
      default:
        return this.fail(new UnknownToolError(name));
    }
  }

  private fail(error: ToolError): CallOutcome {
    if (error instanceof InternalFailureError) {
      logger.error({ err: error, file: this.store.location }, error.message);
    } else {
      logger.warn({ kind: error.kind }, error.message);
    }
    return { success: false, error };
  }
}
