/**
 * Authenticated transport for the DSS public API.
 *
 * Every request goes to `<host>/public/api<path>` with HTTP Basic auth
 * (API key as user name, empty password). One AbortController per
 * transport: close() cancels whatever is still in flight.
 */

import { DSSApiError, DSSClientClosedError, DSSNetworkError, DSSResponseError } from './errors.js';
import { isJsonObject, type JsonValue, type QueryParams } from './types.js';

export interface DSSHttpOptions {
  host: string;
  apiKey: string;
  fetchImpl?: typeof fetch;
}

export interface RequestOptions {
  params?: QueryParams;
  body?: JsonValue;
}

export class DSSHttp {
  private readonly baseUrl: string;
  private readonly authorization: string;
  private readonly fetchImpl: typeof fetch;
  private readonly controller = new AbortController();

  constructor(options: DSSHttpOptions) {
    this.baseUrl = `${options.host.replace(/\/+$/, '')}/public/api`;
    this.authorization = `Basic ${Buffer.from(`${options.apiKey}:`).toString('base64')}`;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  get closed(): boolean {
    return this.controller.signal.aborted;
  }

  close(): void {
    if (!this.closed) this.controller.abort();
  }

  /** Perform a request and decode the JSON body (null for an empty body). */
  async json(method: string, path: string, options: RequestOptions = {}): Promise<JsonValue> {
    const response = await this.raw(method, path, options);
    const text = await response.text();
    if (text.length === 0) return null;
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new DSSResponseError(
        `Invalid JSON in response to ${method} ${path}: ${text.slice(0, 200)}`,
        { cause: err },
      );
    }
  }

  /** Perform a request and return the successful Response for streaming. */
  async raw(method: string, path: string, options: RequestOptions = {}): Promise<Response> {
    if (this.closed) throw new DSSClientClosedError();

    const headers: Record<string, string> = {
      Authorization: this.authorization,
      Accept: 'application/json',
    };
    let body: string | undefined;
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.body);
    }

    let response: Response;
    try {
      response = await this.fetchImpl(this.url(path, options.params), {
        method,
        headers,
        body,
        signal: this.controller.signal,
      });
    } catch (err) {
      if (this.closed) throw new DSSClientClosedError();
      const reason = err instanceof Error ? err.message : String(err);
      throw new DSSNetworkError(`${method} ${path} failed: ${reason}`, { cause: err });
    }

    if (!response.ok) throw await toApiError(response);
    return response;
  }

  private url(path: string, params?: QueryParams): string {
    const url = new URL(this.baseUrl + path);
    for (const [key, value] of Object.entries(params ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url.toString();
  }
}

async function toApiError(response: Response): Promise<DSSApiError> {
  const text = await response.text().catch(() => '');
  const parsed = parseJson(text);
  let errorType = 'Unknown error';
  let message = text.slice(0, 500) || `HTTP ${response.status}`;
  if (isJsonObject(parsed)) {
    if (typeof parsed.errorType === 'string') errorType = parsed.errorType;
    if (typeof parsed.detailedMessage === 'string') message = parsed.detailedMessage;
    else if (typeof parsed.message === 'string') message = parsed.message;
  }
  return new DSSApiError(`${errorType}: ${message}`, response.status, errorType);
}

function parseJson(text: string): JsonValue | undefined {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
