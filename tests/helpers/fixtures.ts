import { vi } from 'vitest';
import type { Mock } from 'vitest';
import type { Logger } from 'pino';
import type { AlertTrigger, Change } from '../../src/domain/index.js';
import type { FetchLike } from '../../src/infrastructure/index.js';

/** Unix time 2000071804.323 s. */
export const FIXED_TIMESTAMP = new Date(2000071804323);
export const FIXED_TIMESTAMP_WIRE = '2033-05-18T23:30:04.323000000Z';

export interface SampleDetails {
  some_field: string;
  another_field: number;
}

export const sampleDetails: SampleDetails = {
  some_field: 'Serialize this!',
  another_field: 34,
};

export const sampleLink = { href: 'https://example.com', text: 'Example homepage' };

export const sampleImage = {
  src: 'https://example.com/static/logo.png',
  href: 'https://example.com',
  alt: 'Example logo',
};

/** Change with every optional field set. */
export function fullChange(): Change<SampleDetails> {
  return {
    payload: {
      summary: 'Hello',
      timestamp: FIXED_TIMESTAMP,
      source: 'hostname',
      custom_details: sampleDetails,
    },
    links: [sampleLink],
  };
}

/** Alert trigger with every optional field set. */
export function fullAlertTrigger(): AlertTrigger<SampleDetails> {
  return {
    payload: {
      severity: 'info',
      summary: 'Hello',
      source: 'hostname',
      timestamp: FIXED_TIMESTAMP,
      component: 'postgres',
      group: 'prod-datapipe',
      class: 'deploy',
      custom_details: sampleDetails,
    },
    dedup_key: 'dedupkey1',
    images: [sampleImage],
    links: [sampleLink],
    client: 'Sentinel',
    client_url: 'https://example.com/sentinel',
  };
}

export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

/** fetch double answering every request with the given status and body. */
export function respondWith(status: number, body = '') {
  return vi.fn<FetchLike>().mockResolvedValue({
    status,
    text: () => Promise.resolve(body),
  });
}

/** The nth request a fetch double received, with the body decoded. */
export function requestAt(fetchMock: Mock<FetchLike>, index = 0) {
  const call = fetchMock.mock.calls[index];
  if (!call) {
    throw new Error(`fetch was not called ${index + 1} time(s)`);
  }
  const [url, init] = call;
  const json: unknown = JSON.parse(init.body);
  return { url, init, json };
}
