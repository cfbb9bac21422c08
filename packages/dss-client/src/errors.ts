/**
 * Errors raised by the DSS client.
 *
 * DSSApiError mirrors the platform's own error envelope
 * ({ errorType, message, detailedMessage }) so callers can tell
 * "not found" from "forbidden" without parsing text.
 */

export class DSSApiError extends Error {
  override readonly name = 'DSSApiError';

  constructor(
    message: string,
    readonly status: number,
    readonly errorType: string,
  ) {
    super(message);
  }

  get isNotFound(): boolean {
    return this.status === 404 || /NotFound/.test(this.errorType);
  }

  get isForbidden(): boolean {
    return this.status === 401 || this.status === 403;
  }
}

/** The request never produced an HTTP response. */
export class DSSNetworkError extends Error {
  override readonly name = 'DSSNetworkError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** The platform answered with something the client cannot interpret. */
export class DSSResponseError extends Error {
  override readonly name = 'DSSResponseError';
}

/** A call was made on a client after close(). */
export class DSSClientClosedError extends Error {
  override readonly name = 'DSSClientClosedError';

  constructor() {
    super('DSS client has been closed');
  }
}
