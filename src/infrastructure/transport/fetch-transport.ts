import { ACCEPTED_STATUS } from './transport.js';
import type { Transport, TransportMode, TransportRequest, TransportResponse } from './transport.js';

/** Upper bound on a single request in bounded mode. */
export const BOUNDED_TIMEOUT_MS = 300_000;

export interface FetchInit {
  method: 'POST';
  headers: Record<string, string>;
  body: string;
  signal?: AbortSignal;
}

export interface FetchResponseLike {
  readonly status: number;
  text(): Promise<string>;
}

/** The subset of the global `fetch` the transport relies on. */
export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponseLike>;

export interface FetchTransportOptions {
  /** Abort the request after this many ms. Omit for no internal timeout. */
  timeoutMs?: number;
  fetch?: FetchLike;
}

/**
 * Transport over the global `fetch`.
 *
 * Sends exactly one POST per call. The wire bytes do not depend on the
 * timeout; only how long the caller may be held does.
 *
 * Once a status has arrived the request counts as answered: the body is
 * read only for non-202 statuses, and a failed read yields an empty body.
 */
export class FetchTransport implements Transport {
  readonly mode: TransportMode;
  private readonly timeoutMs: number | undefined;
  private readonly fetchImpl: FetchLike;

  constructor(options: FetchTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs;
    this.mode = options.timeoutMs === undefined ? 'suspending' : 'bounded';
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    const signal = this.signalFor(request.signal);
    const response = await this.fetchImpl(request.url, {
      method: 'POST',
      headers: { ...request.headers },
      body: request.body,
      ...(signal ? { signal } : {}),
    });
    const { status } = response;
    const body = status === ACCEPTED_STATUS ? '' : await response.text().catch(() => '');
    return { status, body };
  }

  private signalFor(callerSignal: AbortSignal | undefined): AbortSignal | undefined {
    if (this.timeoutMs === undefined) {
      return callerSignal;
    }
    const timeout = AbortSignal.timeout(this.timeoutMs);
    return callerSignal ? AbortSignal.any([callerSignal, timeout]) : timeout;
  }
}

/**
 * Builds the transport for a mode.
 *
 * - `bounded`: every request is cut off after BOUNDED_TIMEOUT_MS.
 * - `suspending`: no internal timeout; cancel through the caller's signal.
 */
export function createTransport(mode: TransportMode, fetchImpl?: FetchLike): Transport {
  return new FetchTransport({
    ...(mode === 'bounded' ? { timeoutMs: BOUNDED_TIMEOUT_MS } : {}),
    ...(fetchImpl ? { fetch: fetchImpl } : {}),
  });
}
