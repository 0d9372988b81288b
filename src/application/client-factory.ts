import type { Logger } from 'pino';
import type { ClientConfig } from '../infrastructure/config.js';
import { createTransport } from '../infrastructure/transport/index.js';
import type { FetchLike } from '../infrastructure/transport/index.js';
import { EventsClient } from './events-client.js';

export interface ClientDependencies {
  logger?: Logger;
  fetch?: FetchLike;
}

/** Wires an EventsClient from loaded configuration. */
export function createEventsClient(config: ClientConfig, deps: ClientDependencies = {}): EventsClient {
  return new EventsClient({
    integrationKey: config.integrationKey,
    transport: createTransport(config.transportMode, deps.fetch),
    validate: config.validate,
    ...(config.userAgent ? { userAgent: config.userAgent } : {}),
    ...(deps.logger ? { logger: deps.logger } : {}),
  });
}
