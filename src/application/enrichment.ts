import type {
  AlertTrigger,
  AlertTriggerPayload,
  Change,
  ChangePayload,
  Envelope,
  Event,
  EventType,
  SendableAlertFollowup,
  SendableAlertTrigger,
  SendableChange,
} from '../domain/index.js';

export const ALERT_EVENTS_URL = 'https://events.pagerduty.com/v2/enqueue';
export const CHANGE_EVENTS_URL = 'https://events.pagerduty.com/v2/change/enqueue';

/** Fixed routing table. Not caller-configurable. */
const ENDPOINTS = {
  change: CHANGE_EVENTS_URL,
  alert_trigger: ALERT_EVENTS_URL,
  alert_acknowledge: ALERT_EVENTS_URL,
  alert_resolve: ALERT_EVENTS_URL,
} as const satisfies Record<EventType, string>;

export function endpointFor(type: EventType): string {
  return ENDPOINTS[type];
}

/**
 * Builds the wire envelope for an event.
 *
 * Pure: no I/O, no mutation of the input. Only the fields the wire format
 * knows are copied, so nothing on the caller's object (a stray
 * `routing_key` included) can displace the configured integration key.
 */
export function toSendable<T>(event: Event<T>, integrationKey: string): Envelope<T> {
  switch (event.type) {
    case 'change':
      return sendableChange(event, integrationKey);
    case 'alert_trigger':
      return sendableAlertTrigger(event, integrationKey);
    case 'alert_acknowledge':
      return sendableFollowup(event.dedup_key, 'acknowledge', integrationKey);
    case 'alert_resolve':
      return sendableFollowup(event.dedup_key, 'resolve', integrationKey);
  }
}

function sendableChange<T>(change: Change<T>, routingKey: string): SendableChange<T> {
  const { payload, links } = change;
  return {
    routing_key: routingKey,
    payload: changePayload(payload),
    ...(links !== undefined ? { links } : {}),
  };
}

function changePayload<T>(p: ChangePayload<T>): ChangePayload<T> {
  return {
    summary: p.summary,
    timestamp: p.timestamp,
    ...(p.source !== undefined ? { source: p.source } : {}),
    ...(p.custom_details !== undefined ? { custom_details: p.custom_details } : {}),
  };
}

function sendableAlertTrigger<T>(trigger: AlertTrigger<T>, routingKey: string): SendableAlertTrigger<T> {
  return {
    routing_key: routingKey,
    payload: alertTriggerPayload(trigger.payload),
    ...(trigger.dedup_key !== undefined ? { dedup_key: trigger.dedup_key } : {}),
    ...(trigger.images !== undefined ? { images: trigger.images } : {}),
    ...(trigger.links !== undefined ? { links: trigger.links } : {}),
    event_action: 'trigger',
    ...(trigger.client !== undefined ? { client: trigger.client } : {}),
    ...(trigger.client_url !== undefined ? { client_url: trigger.client_url } : {}),
  };
}

function alertTriggerPayload<T>(p: AlertTriggerPayload<T>): AlertTriggerPayload<T> {
  return {
    severity: p.severity,
    summary: p.summary,
    source: p.source,
    ...(p.timestamp !== undefined ? { timestamp: p.timestamp } : {}),
    ...(p.component !== undefined ? { component: p.component } : {}),
    ...(p.group !== undefined ? { group: p.group } : {}),
    ...(p.class !== undefined ? { class: p.class } : {}),
    ...(p.custom_details !== undefined ? { custom_details: p.custom_details } : {}),
  };
}

function sendableFollowup(
  dedupKey: string,
  action: SendableAlertFollowup['event_action'],
  routingKey: string,
): SendableAlertFollowup {
  return {
    routing_key: routingKey,
    dedup_key: dedupKey,
    event_action: action,
  };
}
