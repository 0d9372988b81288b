/**
 * PagerDuty Events v2 client.
 *
 * Build an `Event` with the helpers below and hand it to
 * `EventsClient.event()`.
 */
export {
  SEVERITIES,
  changeEvent,
  alertTrigger,
  alertAcknowledge,
  alertResolve,
  EventsApiError,
  InvalidEventError,
  SerializationError,
  TransportError,
  HttpError,
  NotAcceptedError,
} from './domain/index.js';
export type {
  Severity,
  Action,
  Link,
  Image,
  ChangePayload,
  Change,
  AlertTriggerPayload,
  AlertTrigger,
  AlertAcknowledge,
  AlertResolve,
  Event,
  EventType,
  EventsErrorKind,
} from './domain/index.js';

export {
  EventsClient,
  createEventsClient,
  eventSchema,
  findEventIssues,
  endpointFor,
  formatTimestamp,
  ALERT_EVENTS_URL,
  CHANGE_EVENTS_URL,
  MAX_SUMMARY_LENGTH,
  MAX_DEDUP_KEY_LENGTH,
} from './application/index.js';
export type { EventsClientOptions, SendOptions, ClientDependencies } from './application/index.js';

export {
  loadClientConfig,
  ConfigError,
  createLogger,
  FetchTransport,
  createTransport,
  BOUNDED_TIMEOUT_MS,
} from './infrastructure/index.js';
export type {
  ClientConfig,
  LogLevel,
  LoggerOptions,
  FetchLike,
  FetchTransportOptions,
  Transport,
  TransportMode,
  TransportRequest,
  TransportResponse,
} from './infrastructure/index.js';
