export { eventSchema, findEventIssues, MAX_SUMMARY_LENGTH, MAX_DEDUP_KEY_LENGTH } from './event-schema.js';
export { toSendable, endpointFor, ALERT_EVENTS_URL, CHANGE_EVENTS_URL } from './enrichment.js';
export { encodeEnvelope, formatTimestamp } from './envelope-codec.js';
export { classifyResponse, ACCEPTED_STATUS } from './classify-response.js';
export { EventsClient } from './events-client.js';
export type { EventsClientOptions, SendOptions } from './events-client.js';
export { createEventsClient } from './client-factory.js';
export type { ClientDependencies } from './client-factory.js';
