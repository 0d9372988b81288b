import { z } from 'zod';
import { LOG_LEVELS } from './logger.js';
import type { LogLevel } from './logger.js';
import { TRANSPORT_MODES } from './transport/index.js';
import type { TransportMode } from './transport/index.js';

/**
 * Client configuration resolved from the environment.
 */
export interface ClientConfig {
  integrationKey: string;
  userAgent?: string;
  transportMode: TransportMode;
  validate: boolean;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

function oneOf<TValue extends string>(allowed: readonly TValue[]) {
  return z.string().trim().refine(
    (value): value is TValue => allowed.some((a) => a === value),
    { message: `must be one of: ${allowed.join(', ')}` },
  );
}

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .refine((v) => ['true', 'false', '1', '0'].includes(v), {
    message: 'must be a boolean (true/false/1/0)',
  })
  .transform((v) => v === 'true' || v === '1');

/**
 * Zod schema for the environment variables the client reads.
 *
 * - `PAGERDUTY_INTEGRATION_KEY` is required.
 * - Unset optional variables fall back to their defaults.
 */
const envSchema = z.object({
  PAGERDUTY_INTEGRATION_KEY: z.string().trim().min(1, 'is required'),
  PAGERDUTY_USER_AGENT: z.string().trim().min(1, 'must not be empty').optional(),
  PAGERDUTY_TRANSPORT: oneOf(TRANSPORT_MODES).default('bounded'),
  PAGERDUTY_VALIDATE: booleanFlag.default('true'),
  LOG_LEVEL: oneOf(LOG_LEVELS).default('info'),
});

/**
 * Loads client configuration from environment variables.
 *
 * Throws ConfigError naming every offending variable at once.
 */
export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const parsed = envSchema.safeParse({
    PAGERDUTY_INTEGRATION_KEY: env['PAGERDUTY_INTEGRATION_KEY'] ?? '',
    PAGERDUTY_USER_AGENT: env['PAGERDUTY_USER_AGENT'],
    PAGERDUTY_TRANSPORT: env['PAGERDUTY_TRANSPORT'],
    PAGERDUTY_VALIDATE: env['PAGERDUTY_VALIDATE'],
    LOG_LEVEL: env['LOG_LEVEL'],
  });

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`),
    );
  }

  const data = parsed.data;
  return {
    integrationKey: data.PAGERDUTY_INTEGRATION_KEY,
    transportMode: data.PAGERDUTY_TRANSPORT,
    validate: data.PAGERDUTY_VALIDATE,
    logLevel: data.LOG_LEVEL,
    ...(data.PAGERDUTY_USER_AGENT ? { userAgent: data.PAGERDUTY_USER_AGENT } : {}),
  };
}
