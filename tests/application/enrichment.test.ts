import { describe, it, expect } from 'vitest';
import {
  ALERT_EVENTS_URL,
  CHANGE_EVENTS_URL,
  endpointFor,
  toSendable,
} from '../../src/application/enrichment.js';
import { alertAcknowledge, alertResolve, alertTrigger, changeEvent } from '../../src/domain/index.js';
import type { Event } from '../../src/domain/index.js';
import { FIXED_TIMESTAMP, fullAlertTrigger, fullChange } from '../helpers/fixtures.js';

describe('endpointFor', () => {
  it('routes change events to the change endpoint', () => {
    expect(endpointFor('change')).toBe('https://events.pagerduty.com/v2/change/enqueue');
    expect(CHANGE_EVENTS_URL).toBe('https://events.pagerduty.com/v2/change/enqueue');
  });

  it('routes every alert event to the alert endpoint', () => {
    expect(ALERT_EVENTS_URL).toBe('https://events.pagerduty.com/v2/enqueue');
    expect(endpointFor('alert_trigger')).toBe(ALERT_EVENTS_URL);
    expect(endpointFor('alert_acknowledge')).toBe(ALERT_EVENTS_URL);
    expect(endpointFor('alert_resolve')).toBe(ALERT_EVENTS_URL);
  });
});

describe('toSendable', () => {
  it('prepends the integration key to a change', () => {
    const change = fullChange();
    const envelope = toSendable(changeEvent(change), 'routingkey');

    expect(envelope).toEqual({
      routing_key: 'routingkey',
      payload: change.payload,
      links: change.links,
    });
    expect(Object.keys(envelope)).toEqual(['routing_key', 'payload', 'links']);
  });

  it('copies trigger fields and tags the action', () => {
    const trigger = fullAlertTrigger();
    const envelope = toSendable(alertTrigger(trigger), 'routingkey');

    expect(Object.keys(envelope)).toEqual([
      'routing_key',
      'payload',
      'dedup_key',
      'images',
      'links',
      'event_action',
      'client',
      'client_url',
    ]);
    expect(envelope).toMatchObject({ event_action: 'trigger', dedup_key: 'dedupkey1', client: 'Sentinel' });
  });

  it('keeps only the dedup key for follow-ups', () => {
    expect(toSendable(alertAcknowledge('k1'), 'routingkey')).toEqual({
      routing_key: 'routingkey',
      dedup_key: 'k1',
      event_action: 'acknowledge',
    });
    expect(toSendable(alertResolve('k1'), 'routingkey')).toEqual({
      routing_key: 'routingkey',
      dedup_key: 'k1',
      event_action: 'resolve',
    });
  });

  it('never lets a caller-supplied routing key through', () => {
    const sneaky = {
      type: 'alert_trigger',
      routing_key: 'attacker-key',
      integration_key: 'attacker-key',
      payload: { severity: 'critical', summary: 's', source: 'h', routing_key: 'attacker-key' },
    } as const;
    const sneakyResolve = { type: 'alert_resolve', dedup_key: 'k', routing_key: 'attacker-key' } as const;
    const events: Event[] = [sneaky, sneakyResolve];

    for (const event of events) {
      const envelope = toSendable(event, 'configured-key');
      expect(envelope.routing_key).toBe('configured-key');
      expect(JSON.stringify(envelope)).not.toContain('attacker-key');
    }
  });

  it('does not touch the caller object', () => {
    const event = changeEvent({ payload: { summary: 'x', timestamp: FIXED_TIMESTAMP } });
    const before = JSON.stringify(event);
    toSendable(event, 'routingkey');
    expect(JSON.stringify(event)).toBe(before);
    expect(event).not.toHaveProperty('routing_key');
  });
});
