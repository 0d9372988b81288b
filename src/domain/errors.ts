/**
 * Failure taxonomy for a single dispatch.
 *
 * Every call either resolves (the service answered 202) or rejects with
 * exactly one of these. Nothing is retried or suppressed internally.
 */

export type EventsErrorKind =
  | 'invalid_event'
  | 'serialization'
  | 'transport'
  | 'http'
  | 'not_accepted';

export abstract class EventsApiError extends Error {
  abstract readonly kind: EventsErrorKind;
}

/** The event broke a documented limit of the service. Nothing was sent. */
export class InvalidEventError extends EventsApiError {
  readonly kind = 'invalid_event';

  constructor(readonly issues: readonly string[]) {
    super(`Invalid event: ${issues.join('; ')}`);
    this.name = 'InvalidEventError';
  }
}

/** The envelope could not be JSON-encoded. Nothing was sent. */
export class SerializationError extends EventsApiError {
  readonly kind = 'serialization';

  constructor(cause: unknown) {
    super(`Failed to encode event: ${describe(cause)}`, { cause });
    this.name = 'SerializationError';
  }
}

/** No HTTP response was obtained (DNS, refused connection, TLS, abort, timeout). */
export class TransportError extends EventsApiError {
  readonly kind = 'transport';

  constructor(cause: unknown) {
    super(`Request to events API failed: ${describe(cause)}`, { cause });
    this.name = 'TransportError';
  }
}

/** The service answered with a 4xx or 5xx status. */
export class HttpError extends EventsApiError {
  readonly kind = 'http';

  constructor(
    readonly status: number,
    readonly responseBody = '',
  ) {
    super(`Events API returned HTTP ${status}`);
    this.name = 'HttpError';
  }
}

/**
 * The service answered with a status that is neither 202 nor an error.
 * Usually a protocol mismatch rather than a bad request.
 */
export class NotAcceptedError extends EventsApiError {
  readonly kind = 'not_accepted';

  constructor(readonly status: number) {
    super(`Events API did not accept the event (HTTP ${status})`);
    this.name = 'NotAcceptedError';
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
