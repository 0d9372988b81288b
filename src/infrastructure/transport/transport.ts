/**
 * HTTP transport seam between the client and the network.
 *
 * The client is written once against this interface; the two modes only
 * differ in how long a request may hold the caller.
 */

/** The only status the Events v2 API documents as success. */
export const ACCEPTED_STATUS = 202;

export type TransportMode = 'bounded' | 'suspending';

export const TRANSPORT_MODES: readonly TransportMode[] = ['bounded', 'suspending'];

export interface TransportRequest {
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: string;
  readonly signal?: AbortSignal;
}

export interface TransportResponse {
  readonly status: number;
  /** Empty for 202, and when the body could not be read. */
  readonly body: string;
}

export interface Transport {
  readonly mode: TransportMode;
  /** Rejects only when no response status could be obtained. */
  send(request: TransportRequest): Promise<TransportResponse>;
}
