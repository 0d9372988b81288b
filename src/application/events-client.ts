import type { Logger } from 'pino';
import { EventsApiError, InvalidEventError, TransportError } from '../domain/index.js';
import type { Event } from '../domain/index.js';
import { createTransport } from '../infrastructure/transport/index.js';
import type { Transport, TransportResponse } from '../infrastructure/transport/index.js';
import { silentLogger } from '../infrastructure/logger.js';
import { classifyResponse } from './classify-response.js';
import { encodeEnvelope } from './envelope-codec.js';
import { endpointFor, toSendable } from './enrichment.js';
import { findEventIssues } from './event-schema.js';

const CONTENT_TYPE = 'content-type';
const CONTENT_ENCODING = 'content-encoding';
const USER_AGENT = 'user-agent';

const CONTENT_TYPE_JSON = 'application/json';
const CONTENT_ENCODING_IDENTITY = 'identity';

export interface EventsClientOptions {
  /** Integration (routing) key of the target service or ruleset. */
  integrationKey: string;
  userAgent?: string;
  /** Defaults to the bounded fetch transport. */
  transport?: Transport;
  logger?: Logger;
  /** Check documented field limits before sending. Defaults to true. */
  validate?: boolean;
}

export interface SendOptions {
  signal?: AbortSignal;
}

/**
 * Client for the PagerDuty Events v2 API.
 *
 * Holds only immutable configuration, so one instance can serve any
 * number of concurrent calls. Each call is a single best-effort attempt.
 */
export class EventsClient {
  private readonly integrationKey: string;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly transport: Transport;
  private readonly log: Logger;
  private readonly validate: boolean;

  constructor(options: EventsClientOptions) {
    if (options.integrationKey.trim() === '') {
      throw new TypeError('integrationKey must not be empty');
    }
    this.integrationKey = options.integrationKey;
    this.headers = Object.freeze({
      [CONTENT_TYPE]: CONTENT_TYPE_JSON,
      [CONTENT_ENCODING]: CONTENT_ENCODING_IDENTITY,
      ...(options.userAgent ? { [USER_AGENT]: options.userAgent } : {}),
    });
    this.transport = options.transport ?? createTransport('bounded');
    this.log = options.logger ?? silentLogger();
    this.validate = options.validate ?? true;
  }

  /**
   * Sends one event.
   *
   * Resolves when the service answers 202. Otherwise rejects with exactly
   * one EventsApiError: InvalidEventError or SerializationError before
   * anything is sent, TransportError when no response arrived,
   * HttpError for 4xx/5xx, NotAcceptedError for any other status.
   */
  async event<T>(event: Event<T>, options: SendOptions = {}): Promise<void> {
    const url = endpointFor(event.type);
    const context = { event_type: event.type, url };

    try {
      if (this.validate) {
        const issues = findEventIssues(event);
        if (issues.length > 0) {
          throw new InvalidEventError(issues);
        }
      }

      const body = encodeEnvelope(toSendable(event, this.integrationKey));

      this.log.debug(context, 'Sending event');
      const response = await this.post(url, body, options.signal);

      const failure = classifyResponse(response.status, response.body);
      if (failure) {
        throw failure;
      }
      this.log.debug({ ...context, status: response.status }, 'Event accepted');
    } catch (err: unknown) {
      if (err instanceof EventsApiError) {
        this.log.warn({ ...context, err, kind: err.kind }, 'Event dispatch failed');
      }
      throw err;
    }
  }

  private async post(url: string, body: string, signal: AbortSignal | undefined): Promise<TransportResponse> {
    try {
      return await this.transport.send({
        url,
        headers: this.headers,
        body,
        ...(signal ? { signal } : {}),
      });
    } catch (err: unknown) {
      throw new TransportError(err);
    }
  }
}
