/**
 * Core domain types for the PagerDuty Events v2 model.
 *
 * Field names follow the wire format (snake_case) so the mapping onto
 * envelopes stays a plain copy. They carry no framework dependencies.
 */

export const SEVERITIES = ['info', 'warning', 'error', 'critical'] as const;

/** Perceived impact of the reported condition on the affected system. */
export type Severity = (typeof SEVERITIES)[number];

/**
 * Alert lifecycle verb.
 *
 * - `trigger` opens an alert, or adds a trigger log entry to the open alert
 *   with the same dedup key.
 * - `acknowledge` stops further notifications while someone works on it.
 * - `resolve` closes it; a later trigger with the same key opens a new one.
 */
export type Action = 'trigger' | 'acknowledge' | 'resolve';

export interface Link {
  readonly href: string;
  /** Plain text used as the link's label. */
  readonly text?: string;
}

export interface Image {
  /** Image URL. Must be served over HTTPS. */
  readonly src: string;
  /** Makes the image a clickable link. */
  readonly href?: string;
  readonly alt?: string;
}

export interface ChangePayload<T = unknown> {
  /** Up to 1024 characters. */
  readonly summary: string;
  readonly timestamp: Date;
  /** Unique name of the location where the change happened. */
  readonly source?: string;
  readonly custom_details?: T;
}

/** One-shot change-tracking event. No lifecycle beyond being sent once. */
export interface Change<T = unknown> {
  readonly payload: ChangePayload<T>;
  readonly links?: readonly Link[];
}

export interface AlertTriggerPayload<T = unknown> {
  readonly severity: Severity;
  /** Up to 1024 characters. Used as the alert title. */
  readonly summary: string;
  /** Affected system, preferably a hostname or FQDN. */
  readonly source: string;
  readonly timestamp?: Date;
  /** e.g. `mysql`, `eth0` */
  readonly component?: string;
  /** e.g. `app-stack` */
  readonly group?: string;
  /** e.g. `ping failure`, `cpu load` */
  readonly class?: string;
  readonly custom_details?: T;
}

/** Opens or re-triggers an incident keyed by `dedup_key`. */
export interface AlertTrigger<T = unknown> {
  readonly payload: AlertTriggerPayload<T>;
  /** Up to 255 characters. Assigned by the service when absent. */
  readonly dedup_key?: string;
  readonly images?: readonly Image[];
  readonly links?: readonly Link[];
  /** Name of the monitoring client raising the alert. */
  readonly client?: string;
  readonly client_url?: string;
}

export interface AlertAcknowledge {
  readonly dedup_key: string;
}

export interface AlertResolve {
  readonly dedup_key: string;
}

/**
 * The single entry point callers construct.
 *
 * `custom_details: T` is caller-owned; the only requirement is that it
 * survives JSON encoding.
 */
export type Event<T = unknown> =
  | ({ readonly type: 'change' } & Change<T>)
  | ({ readonly type: 'alert_trigger' } & AlertTrigger<T>)
  | ({ readonly type: 'alert_acknowledge' } & AlertAcknowledge)
  | ({ readonly type: 'alert_resolve' } & AlertResolve);

export type EventType = Event['type'];

export function changeEvent<T>(change: Change<T>): Event<T> {
  return { type: 'change', ...change };
}

export function alertTrigger<T>(trigger: AlertTrigger<T>): Event<T> {
  return { type: 'alert_trigger', ...trigger };
}

export function alertAcknowledge(dedupKey: string): Event<never> {
  return { type: 'alert_acknowledge', dedup_key: dedupKey };
}

export function alertResolve(dedupKey: string): Event<never> {
  return { type: 'alert_resolve', dedup_key: dedupKey };
}
