/**
 * Invocation context: who is calling, and the platform client scoped to them.
 *
 * Identity is resolved at the transport boundary (the HTTP Authorization
 * header, or the configured key over stdio). Handlers never see it; they
 * receive a client that already carries it.
 */

import { DSSClient } from '@dss-mcp/dss-client';
import { AuthenticationError } from './errors.js';

export interface CallerIdentity {
  apiKey: string;
}

export type IdentitySource = () => CallerIdentity;

export type ClientFactory = (identity: CallerIdentity) => DSSClient;

const BEARER = /^Bearer\s+(\S+)\s*$/i;

/** Identity from an HTTP `Authorization: Bearer <key>` header. */
export function bearerIdentity(header: string | null | undefined): IdentitySource {
  return () => {
    if (header === null || header === undefined || header.trim() === '') {
      throw new AuthenticationError('Missing Authorization header');
    }
    const match = BEARER.exec(header.trim());
    if (!match?.[1]) {
      throw new AuthenticationError('Authorization header must be "Bearer <API key>"');
    }
    return { apiKey: match[1] };
  };
}

/** Identity from a configured key (stdio mode). */
export function staticIdentity(apiKey: string | undefined): IdentitySource {
  return () => {
    if (apiKey === undefined || apiKey.trim() === '') {
      throw new AuthenticationError('No DSS API key configured; set DSS_API_KEY');
    }
    return { apiKey: apiKey.trim() };
  };
}

export interface ClientFactoryOptions {
  dssUrl: string;
  pollIntervalMs?: number;
  fetch?: typeof fetch;
}

export function createClientFactory(options: ClientFactoryOptions): ClientFactory {
  return (identity) =>
    new DSSClient({
      host: options.dssUrl,
      apiKey: identity.apiKey,
      pollIntervalMs: options.pollIntervalMs,
      fetch: options.fetch,
    });
}

/**
 * Run `fn` with a client for the caller. The client is closed on every
 * exit path; identity failures happen before any platform call.
 */
export async function withScopedClient<T>(
  identity: IdentitySource,
  factory: ClientFactory,
  fn: (client: DSSClient) => Promise<T>,
): Promise<T> {
  const client = factory(identity());
  try {
    return await fn(client);
  } finally {
    client.close();
  }
}
