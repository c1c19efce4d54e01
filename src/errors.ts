import type { ToolErrorKind } from './types.js';

/**
 * Raised by a memory store when its backing file cannot be opened, read or written.
 */
export class StoreError extends Error {
  readonly kind = 'IoFailure' as const;

  constructor(message: string, readonly file: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreError';
  }
}

export abstract class ToolError extends Error {
  abstract readonly kind: ToolErrorKind;
}

export class UnknownToolError extends ToolError {
  readonly kind = 'UnknownTool' as const;

  constructor(readonly toolName: string) {
    super(`Unknown tool: ${toolName}`);
    this.name = 'UnknownToolError';
  }
}

export class InvalidArgumentsError extends ToolError {
  readonly kind = 'InvalidArguments' as const;

  constructor(readonly toolName: string, readonly issues: string[]) {
    super(`Invalid arguments for ${toolName}: ${issues.join('; ')}`);
    this.name = 'InvalidArgumentsError';
  }
}

export class InternalFailureError extends ToolError {
  readonly kind = 'InternalFailure' as const;

  constructor(message: string, cause: unknown) {
    super(`${message}: ${describeError(cause)}`, { cause });
    this.name = 'InternalFailureError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
