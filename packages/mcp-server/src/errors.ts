/**
 * Tool error taxonomy.
 *
 * Every failure that reaches the transport is one of these, so the agent
 * always receives `{ error: { kind, message } }` it can reason about.
 */

import { DSSApiError, DSSNetworkError } from '@dss-mcp/dss-client';
import type { ZodIssue } from 'zod';

export type ToolErrorKind =
  | 'invalid_argument'
  | 'authentication'
  | 'unknown_tool'
  | 'duplicate_tool'
  | 'platform_operation';

export type PlatformErrorCategory = 'not_found' | 'permission_denied' | 'network' | 'platform';

export abstract class ToolError extends Error {
  abstract readonly kind: ToolErrorKind;
}

export class InvalidArgumentError extends ToolError {
  readonly kind = 'invalid_argument';
  override readonly name = 'InvalidArgumentError';

  constructor(
    message: string,
    readonly issues: ZodIssue[] = [],
  ) {
    super(message);
  }

  static fromIssues(toolName: string, issues: ZodIssue[]): InvalidArgumentError {
    const detail = issues
      .map((issue) => `${issue.path.join('.') || '(arguments)'}: ${issue.message}`)
      .join('; ');
    return new InvalidArgumentError(`Invalid arguments for ${toolName}: ${detail}`, issues);
  }
}

export class AuthenticationError extends ToolError {
  readonly kind = 'authentication';
  override readonly name = 'AuthenticationError';
}

export class UnknownToolError extends ToolError {
  readonly kind = 'unknown_tool';
  override readonly name = 'UnknownToolError';

  constructor(readonly toolName: string) {
    super(`Unknown tool "${toolName}"`);
  }
}

export class DuplicateToolError extends ToolError {
  readonly kind = 'duplicate_tool';
  override readonly name = 'DuplicateToolError';

  constructor(readonly toolName: string) {
    super(`Tool "${toolName}" is already registered`);
  }
}

/** A failure surfaced by the platform; `message` is the platform's, verbatim. */
export class PlatformOperationError extends ToolError {
  readonly kind = 'platform_operation';
  override readonly name = 'PlatformOperationError';

  constructor(
    message: string,
    readonly category: PlatformErrorCategory,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }

  static from(err: unknown): PlatformOperationError {
    if (err instanceof PlatformOperationError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new PlatformOperationError(message, categorize(err), { cause: err });
  }
}

function categorize(err: unknown): PlatformErrorCategory {
  if (err instanceof DSSApiError) {
    if (err.isNotFound) return 'not_found';
    if (err.isForbidden) return 'permission_denied';
    return 'platform';
  }
  if (err instanceof DSSNetworkError) return 'network';
  return 'platform';
}

export interface ErrorPayload {
  error: {
    kind: ToolErrorKind;
    message: string;
    category?: PlatformErrorCategory;
  };
}

export function toErrorPayload(err: ToolError): ErrorPayload {
  const payload: ErrorPayload = { error: { kind: err.kind, message: err.message } };
  if (err instanceof PlatformOperationError) payload.error.category = err.category;
  return payload;
}
