import { SerializationError } from '../domain/index.js';
import type { Envelope } from '../domain/index.js';

/**
 * Formats an instant as RFC3339 in UTC.
 *
 * Whole seconds render without a fraction (`2021-05-30T00:00:00Z`);
 * anything else gets a nine-digit fraction (`2033-05-18T23:30:04.323000000Z`).
 * Throws RangeError for invalid dates and years RFC3339 cannot express.
 */
export function formatTimestamp(date: Date): string {
  const time = date.getTime();
  if (Number.isNaN(time)) {
    throw new RangeError('Invalid timestamp');
  }
  const year = date.getUTCFullYear();
  if (year < 0 || year > 9999) {
    throw new RangeError(`Timestamp year ${year} is outside the RFC3339 range`);
  }

  // toISOString() is fixed-width for years 0000-9999: YYYY-MM-DDTHH:mm:ss.sssZ
  const seconds = date.toISOString().slice(0, 19);
  const millis = date.getUTCMilliseconds();
  if (millis === 0) {
    return `${seconds}Z`;
  }
  return `${seconds}.${String(millis).padStart(3, '0')}000000Z`;
}

/**
 * JSON.stringify replacer. `value` has already been through Date#toJSON,
 * so the original is read back from the holder.
 */
function timestampReplacer(this: unknown, key: string, value: unknown): unknown {
  const holder = this;
  if (typeof holder === 'object' && holder !== null) {
    const original: unknown = Reflect.get(holder, key);
    if (original instanceof Date) {
      return formatTimestamp(original);
    }
  }
  return value;
}

/**
 * Encodes an envelope to its JSON body.
 *
 * Absent optional fields are already missing from the envelope, so no
 * key is ever written as null. Fails with SerializationError when the
 * caller's custom details cannot be encoded (BigInt, cycles, bad dates).
 */
export function encodeEnvelope<T>(envelope: Envelope<T>): string {
  try {
    return JSON.stringify(envelope, timestampReplacer);
  } catch (err: unknown) {
    throw new SerializationError(err);
  }
}
