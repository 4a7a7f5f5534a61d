/**
 * Errors raised by task service adapters.
 * Only `TaskApiTransportError` is eligible for retry.
 */

export class TaskApiTransportError extends Error {
  readonly statusCode?: number;

  constructor(message: string, options: { statusCode?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TaskApiTransportError';
    this.statusCode = options.statusCode;
  }
}

export class TaskApiRejectionError extends Error {
  constructor(
    readonly code: string,
    readonly description: string,
  ) {
    super(`Task service rejected the request: ${code}${description ? ` (${description})` : ''}`);
    this.name = 'TaskApiRejectionError';
  }
}

export class TaskApiMalformedResponseError extends Error {
  constructor(readonly detail: string) {
    super(`Malformed task service response: ${detail}`);
    this.name = 'TaskApiMalformedResponseError';
  }
}
