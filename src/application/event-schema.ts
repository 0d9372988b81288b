import { z } from 'zod';
import { SEVERITIES } from '../domain/index.js';

/** Documented limits of the Events v2 API. */
export const MAX_SUMMARY_LENGTH = 1024;
export const MAX_DEDUP_KEY_LENGTH = 255;

/** Limit in characters (code points), so astral symbols count once. */
function maxCharacters(max: number) {
  return z.string().refine((value) => [...value].length <= max, {
    message: `String must contain at most ${max} character(s)`,
  });
}

const summarySchema = maxCharacters(MAX_SUMMARY_LENGTH);
const dedupKeySchema = maxCharacters(MAX_DEDUP_KEY_LENGTH).refine((value) => value.length > 0, {
  message: 'String must contain at least 1 character(s)',
});

const linkSchema = z.object({
  href: z.string().min(1),
  text: z.string().optional(),
});

const imageSchema = z.object({
  src: z.string().url().startsWith('https://', { message: 'Image src must be served over HTTPS' }),
  href: z.string().optional(),
  alt: z.string().optional(),
});

const changeSchema = z.object({
  type: z.literal('change'),
  payload: z.object({
    summary: summarySchema,
    timestamp: z.date(),
    source: z.string().optional(),
    custom_details: z.unknown().optional(),
  }),
  links: z.array(linkSchema).optional(),
});

const alertTriggerSchema = z.object({
  type: z.literal('alert_trigger'),
  payload: z.object({
    severity: z.enum(SEVERITIES),
    summary: summarySchema,
    source: z.string(),
    timestamp: z.date().optional(),
    component: z.string().optional(),
    group: z.string().optional(),
    class: z.string().optional(),
    custom_details: z.unknown().optional(),
  }),
  dedup_key: dedupKeySchema.optional(),
  images: z.array(imageSchema).optional(),
  links: z.array(linkSchema).optional(),
  client: z.string().optional(),
  client_url: z.string().optional(),
});

const alertFollowupSchema = z.object({
  type: z.enum(['alert_acknowledge', 'alert_resolve']),
  dedup_key: dedupKeySchema,
});

/**
 * Zod schema for a caller-supplied event.
 *
 * Used only to check the event against the service's documented limits.
 * The parsed output is discarded; enrichment always reads the caller's
 * original object.
 */
export const eventSchema = z.discriminatedUnion('type', [
  changeSchema,
  alertTriggerSchema,
  alertFollowupSchema,
]);

/**
 * Returns the list of `path: message` issues for an event, empty when valid.
 */
export function findEventIssues(event: unknown): string[] {
  const parsed = eventSchema.safeParse(event);
  if (parsed.success) {
    return [];
  }
  return parsed.error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
