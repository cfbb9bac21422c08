import { describe, it, expect } from 'vitest';
import { DSSApiError, DSSNetworkError, DSSResponseError } from '@dss-mcp/dss-client';
import {
  AuthenticationError,
  InvalidArgumentError,
  PlatformOperationError,
  UnknownToolError,
  toErrorPayload,
} from '../src/errors.js';

describe('PlatformOperationError.from', () => {
  it('keeps the platform message verbatim', () => {
    const cause = new DSSApiError('com.dataiku.dip.exceptions.UnauthorizedException: Action forbidden', 403, 'com.dataiku.dip.exceptions.UnauthorizedException');
    const error = PlatformOperationError.from(cause);

    expect(error.message).toBe('com.dataiku.dip.exceptions.UnauthorizedException: Action forbidden');
    expect(error.cause).toBe(cause);
  });

  it.each([
    [new DSSApiError('x', 404, 'Unknown error'), 'not_found'],
    [new DSSApiError('x', 500, 'com.dataiku.dip.exceptions.NotFoundException'), 'not_found'],
    [new DSSApiError('x', 401, 'Unknown error'), 'permission_denied'],
    [new DSSApiError('x', 403, 'Unknown error'), 'permission_denied'],
    [new DSSApiError('x', 500, 'java.lang.IllegalStateException'), 'platform'],
    [new DSSNetworkError('GET /projects/ failed: connect ECONNREFUSED'), 'network'],
    [new DSSResponseError('Unexpected job status'), 'platform'],
    [new Error('anything else'), 'platform'],
  ])('categorizes %s as %s', (cause, category) => {
    expect(PlatformOperationError.from(cause).category).toBe(category);
  });

  it('stringifies non-error values', () => {
    expect(PlatformOperationError.from('plain text').message).toBe('plain text');
  });

  it('returns an existing platform error unchanged', () => {
    const error = new PlatformOperationError('gone', 'not_found');

    expect(PlatformOperationError.from(error)).toBe(error);
  });
});

describe('toErrorPayload', () => {
  it('carries the kind and message', () => {
    expect(toErrorPayload(new UnknownToolError('nope'))).toEqual({
      error: { kind: 'unknown_tool', message: 'Unknown tool "nope"' },
    });
    expect(toErrorPayload(new AuthenticationError('Missing Authorization header'))).toEqual({
      error: { kind: 'authentication', message: 'Missing Authorization header' },
    });
  });

  it('adds the category of platform errors', () => {
    expect(toErrorPayload(new PlatformOperationError('Dataset X not found', 'not_found'))).toEqual({
      error: { kind: 'platform_operation', message: 'Dataset X not found', category: 'not_found' },
    });
  });

  it('summarizes validation issues in the message', () => {
    const error = InvalidArgumentError.fromIssues('get_project_summary', [
      { code: 'invalid_type', expected: 'string', received: 'undefined', path: ['project_key'], message: 'Required' },
    ]);

    expect(toErrorPayload(error)).toEqual({
      error: { kind: 'invalid_argument', message: 'Invalid arguments for get_project_summary: project_key: Required' },
    });
  });
});
