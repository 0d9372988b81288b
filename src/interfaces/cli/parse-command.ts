import { parseArgs } from 'node:util';
import { z } from 'zod';
import {
  SEVERITIES,
  alertAcknowledge,
  alertResolve,
  alertTrigger,
  changeEvent,
} from '../../domain/index.js';
import type { Event, Image, Link, Severity } from '../../domain/index.js';

export type CustomDetails = Record<string, unknown>;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = [
  'Usage: pd-events <command> [options]',
  '',
  'Commands:',
  '  trigger       --summary S --source S --severity info|warning|error|critical',
  '                [--dedup-key K] [--timestamp ISO] [--component C] [--group G] [--class C]',
  '                [--client NAME] [--client-url URL] [--image src[|href[|alt]]]...',
  '  acknowledge   --dedup-key K',
  '  resolve       --dedup-key K',
  '  change        --summary S [--source S] [--timestamp ISO]',
  '',
  'Common options:',
  '  --link href[|text]   repeatable',
  '  --details JSON       custom details (JSON object)',
  '  -h, --help',
  '',
  'Environment: PAGERDUTY_INTEGRATION_KEY (required), PAGERDUTY_USER_AGENT,',
  '             PAGERDUTY_TRANSPORT (bounded|suspending), PAGERDUTY_VALIDATE, LOG_LEVEL',
].join('\n');

const OPTIONS = {
  summary: { type: 'string' },
  source: { type: 'string' },
  severity: { type: 'string' },
  'dedup-key': { type: 'string' },
  timestamp: { type: 'string' },
  component: { type: 'string' },
  group: { type: 'string' },
  class: { type: 'string' },
  client: { type: 'string' },
  'client-url': { type: 'string' },
  link: { type: 'string', multiple: true },
  image: { type: 'string', multiple: true },
  details: { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const;

export type ParsedCommand =
  | { readonly kind: 'help' }
  | { readonly kind: 'send'; readonly event: Event<CustomDetails> };

/**
 * Turns CLI arguments into an event.
 *
 * Throws UsageError for unknown commands or options, missing required
 * options and malformed values.
 */
export function parseCommand(argv: readonly string[], now: () => Date = () => new Date()): ParsedCommand {
  const { values, positionals } = parseArgv(argv);
  if (values.help) {
    return { kind: 'help' };
  }
  if (positionals.length !== 1) {
    throw new UsageError('Expected exactly one command');
  }

  const command = positionals[0];
  const links = values.link?.map(parseLink);
  const customDetails = values.details !== undefined ? parseDetails(values.details) : undefined;

  switch (command) {
    case 'trigger': {
      const timestamp = values.timestamp !== undefined ? parseTimestamp(values.timestamp) : undefined;
      const images = values.image?.map(parseImage);
      return {
        kind: 'send',
        event: alertTrigger<CustomDetails>({
          payload: {
            severity: parseSeverity(required(values.severity, 'severity')),
            summary: required(values.summary, 'summary'),
            source: required(values.source, 'source'),
            ...(timestamp ? { timestamp } : {}),
            ...(values.component !== undefined ? { component: values.component } : {}),
            ...(values.group !== undefined ? { group: values.group } : {}),
            ...(values.class !== undefined ? { class: values.class } : {}),
            ...(customDetails ? { custom_details: customDetails } : {}),
          },
          ...(values['dedup-key'] !== undefined ? { dedup_key: values['dedup-key'] } : {}),
          ...(images ? { images } : {}),
          ...(links ? { links } : {}),
          ...(values.client !== undefined ? { client: values.client } : {}),
          ...(values['client-url'] !== undefined ? { client_url: values['client-url'] } : {}),
        }),
      };
    }
    case 'acknowledge':
      return { kind: 'send', event: alertAcknowledge(required(values['dedup-key'], 'dedup-key')) };
    case 'resolve':
      return { kind: 'send', event: alertResolve(required(values['dedup-key'], 'dedup-key')) };
    case 'change':
      return {
        kind: 'send',
        event: changeEvent<CustomDetails>({
          payload: {
            summary: required(values.summary, 'summary'),
            timestamp: values.timestamp !== undefined ? parseTimestamp(values.timestamp) : now(),
            ...(values.source !== undefined ? { source: values.source } : {}),
            ...(customDetails ? { custom_details: customDetails } : {}),
          },
          ...(links ? { links } : {}),
        }),
      };
    default:
      throw new UsageError(`Unknown command '${command ?? ''}'`);
  }
}

function parseArgv(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true, strict: true });
  } catch (err: unknown) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

function required(value: string | undefined, name: string): string {
  if (value === undefined || value.trim() === '') {
    throw new UsageError(`Option --${name} is required`);
  }
  return value;
}

function parseSeverity(value: string): Severity {
  const severity = SEVERITIES.find((s) => s === value.trim().toLowerCase());
  if (!severity) {
    throw new UsageError(`--severity must be one of: ${SEVERITIES.join(', ')}`);
  }
  return severity;
}

// Full date and time, with Z or a numeric offset.
const isoTimestamp = z.string().datetime({ offset: true });

function parseTimestamp(value: string): Date {
  if (!isoTimestamp.safeParse(value).success) {
    throw new UsageError(`--timestamp '${value}' is not a valid ISO-8601 date`);
  }
  return new Date(value);
}

// href|text
function parseLink(value: string): Link {
  const [href = '', ...rest] = value.split('|');
  const text = rest.join('|');
  return text ? { href, text } : { href };
}

// src|href|alt
function parseImage(value: string): Image {
  const [src = '', href, alt] = value.split('|');
  return {
    src,
    ...(href ? { href } : {}),
    ...(alt ? { alt } : {}),
  };
}

function parseDetails(value: string): CustomDetails {
  let details: unknown;
  try {
    details = JSON.parse(value);
  } catch {
    throw new UsageError('--details must be valid JSON');
  }
  if (!isRecord(details)) {
    throw new UsageError('--details must be a JSON object');
  }
  return details;
}

function isRecord(value: unknown): value is CustomDetails {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
