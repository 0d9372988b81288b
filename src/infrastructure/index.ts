export { loadClientConfig, ConfigError } from './config.js';
export type { ClientConfig } from './config.js';
export { createLogger, silentLogger, stderrDestination, LOG_LEVELS } from './logger.js';
export type { LogLevel, LoggerOptions } from './logger.js';
export { FetchTransport, createTransport, BOUNDED_TIMEOUT_MS, TRANSPORT_MODES } from './transport/index.js';
export type {
  FetchLike,
  FetchInit,
  FetchResponseLike,
  FetchTransportOptions,
  Transport,
  TransportMode,
  TransportRequest,
  TransportResponse,
} from './transport/index.js';
