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
} from './event.js';
export { SEVERITIES, changeEvent, alertTrigger, alertAcknowledge, alertResolve } from './event.js';
export type { SendableChange, SendableAlertTrigger, SendableAlertFollowup, Envelope } from './envelope.js';
export {
  EventsApiError,
  InvalidEventError,
  SerializationError,
  TransportError,
  HttpError,
  NotAcceptedError,
} from './errors.js';
export type { EventsErrorKind } from './errors.js';
