import { HttpError, NotAcceptedError } from '../domain/index.js';
import type { EventsApiError } from '../domain/index.js';
import { ACCEPTED_STATUS } from '../infrastructure/transport/index.js';

export { ACCEPTED_STATUS };

/**
 * Maps an HTTP status to the dispatch outcome.
 *
 * `null` means accepted. 4xx/5xx are real errors; every other status
 * (1xx, other 2xx, 3xx, >= 600) is reported as not accepted.
 */
export function classifyResponse(status: number, body = ''): EventsApiError | null {
  if (status === ACCEPTED_STATUS) {
    return null;
  }
  if (status >= 400 && status < 600) {
    return new HttpError(status, body);
  }
  return new NotAcceptedError(status);
}
