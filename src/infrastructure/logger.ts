import pino from 'pino';
import type { DestinationStream, Level, Logger } from 'pino';

export type LogLevel = Level | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export interface LoggerOptions {
  level?: LogLevel;
  destination?: DestinationStream;
}

/**
 * Creates the structured logger used by the client and the CLI.
 *
 * Integration keys are redacted wherever they appear in a log object.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const pinoOptions = {
    name: 'pagerduty-events',
    level: options.level ?? 'info',
    redact: {
      paths: ['routing_key', 'integrationKey', '*.routing_key', '*.integrationKey'],
      censor: '[redacted]',
    },
  };
  return options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}

/** Default for library use: callers opt in to logs by passing their own logger. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/** Synchronous stderr stream, so CLI output is flushed before exit. */
export function stderrDestination(): DestinationStream {
  return pino.destination({ dest: 2, sync: true });
}
