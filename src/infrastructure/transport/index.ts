export { FetchTransport, createTransport, BOUNDED_TIMEOUT_MS } from './fetch-transport.js';
export type { FetchLike, FetchInit, FetchResponseLike, FetchTransportOptions } from './fetch-transport.js';
export { ACCEPTED_STATUS, TRANSPORT_MODES } from './transport.js';
export type { Transport, TransportMode, TransportRequest, TransportResponse } from './transport.js';
