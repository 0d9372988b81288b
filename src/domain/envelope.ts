import type {
  Action,
  AlertTriggerPayload,
  ChangePayload,
  Image,
  Link,
} from './event.js';

/**
 * Wire-only mirrors of the caller-facing events.
 *
 * Built, encoded and discarded within a single dispatch. Property
 * declaration order is the JSON key order.
 */

export interface SendableChange<T = unknown> {
  readonly routing_key: string;
  readonly payload: ChangePayload<T>;
  readonly links?: readonly Link[];
}

export interface SendableAlertTrigger<T = unknown> {
  readonly routing_key: string;
  readonly payload: AlertTriggerPayload<T>;
  readonly dedup_key?: string;
  readonly images?: readonly Image[];
  readonly links?: readonly Link[];
  readonly event_action: 'trigger';
  readonly client?: string;
  readonly client_url?: string;
}

export interface SendableAlertFollowup {
  readonly routing_key: string;
  readonly dedup_key: string;
  readonly event_action: Exclude<Action, 'trigger'>;
}

export type Envelope<T = unknown> =
  | SendableChange<T>
  | SendableAlertTrigger<T>
  | SendableAlertFollowup;
