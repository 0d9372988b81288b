import { describe, it, expect } from 'vitest';
import { findEventIssues, MAX_DEDUP_KEY_LENGTH, MAX_SUMMARY_LENGTH } from '../../src/application/event-schema.js';
import { alertAcknowledge, alertTrigger, changeEvent } from '../../src/domain/index.js';
import { FIXED_TIMESTAMP, fullAlertTrigger, fullChange } from '../helpers/fixtures.js';

describe('findEventIssues', () => {
  it('accepts fully populated events', () => {
    expect(findEventIssues(changeEvent(fullChange()))).toEqual([]);
    expect(findEventIssues(alertTrigger(fullAlertTrigger()))).toEqual([]);
    expect(findEventIssues(alertAcknowledge('dedupkey1'))).toEqual([]);
  });

  it('accepts a summary at the documented limit', () => {
    const event = changeEvent({ payload: { summary: 'a'.repeat(MAX_SUMMARY_LENGTH), timestamp: FIXED_TIMESTAMP } });
    expect(findEventIssues(event)).toEqual([]);
  });

  it('rejects a summary over 1024 characters', () => {
    const event = changeEvent({ payload: { summary: 'a'.repeat(1025), timestamp: FIXED_TIMESTAMP } });
    expect(findEventIssues(event)).toEqual([
      'payload.summary: String must contain at most 1024 character(s)',
    ]);
  });

  it('counts summary length in characters, not UTF-16 units', () => {
    const flame = '\u{1F525}';
    const atLimit = changeEvent({ payload: { summary: flame.repeat(MAX_SUMMARY_LENGTH), timestamp: FIXED_TIMESTAMP } });
    const overLimit = changeEvent({ payload: { summary: flame.repeat(MAX_SUMMARY_LENGTH + 1), timestamp: FIXED_TIMESTAMP } });

    expect(findEventIssues(atLimit)).toEqual([]);
    expect(findEventIssues(overLimit)).toEqual([
      'payload.summary: String must contain at most 1024 character(s)',
    ]);
  });

  it('counts dedup key length in characters', () => {
    expect(findEventIssues(alertAcknowledge('\u{1F525}'.repeat(MAX_DEDUP_KEY_LENGTH)))).toEqual([]);
    expect(findEventIssues(alertAcknowledge('\u{1F525}'.repeat(MAX_DEDUP_KEY_LENGTH + 1)))).toEqual([
      'dedup_key: String must contain at most 255 character(s)',
    ]);
  });

  it('rejects a dedup key over 255 characters', () => {
    const issues = findEventIssues(alertAcknowledge('k'.repeat(MAX_DEDUP_KEY_LENGTH + 1)));
    expect(issues).toEqual(['dedup_key: String must contain at most 255 character(s)']);
  });

  it('rejects an empty follow-up dedup key', () => {
    expect(findEventIssues(alertAcknowledge(''))).toEqual([
      'dedup_key: String must contain at least 1 character(s)',
    ]);
  });

  it('rejects images not served over HTTPS', () => {
    const event = alertTrigger({
      payload: { severity: 'warning', summary: 's', source: 'h' },
      images: [{ src: 'http://example.com/logo.png' }],
    });
    expect(findEventIssues(event)).toEqual(['images.0.src: Image src must be served over HTTPS']);
  });

  it('rejects unknown severities and invalid dates from untyped callers', () => {
    const issues = findEventIssues({
      type: 'alert_trigger',
      payload: { severity: 'fatal', summary: 's', source: 'h', timestamp: new Date('nope') },
    });
    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatch(/^payload\.severity: /);
    expect(issues[1]).toBe('payload.timestamp: Invalid date');
  });

  it('rejects unknown event types', () => {
    expect(findEventIssues({ type: 'alert_escalate', dedup_key: 'k' })).toHaveLength(1);
  });
});
