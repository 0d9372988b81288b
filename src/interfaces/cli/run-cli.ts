import type { Logger } from 'pino';
import { createEventsClient } from '../../application/index.js';
import { EventsApiError } from '../../domain/index.js';
import { ConfigError, createLogger, loadClientConfig, stderrDestination } from '../../infrastructure/index.js';
import type { ClientConfig, FetchLike } from '../../infrastructure/index.js';
import { USAGE, UsageError, parseCommand } from './parse-command.js';
import type { ParsedCommand } from './parse-command.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  /** Replaces the stderr logger built from LOG_LEVEL. */
  logger?: Logger;
  fetch?: FetchLike;
  now?: () => Date;
  /** Sink for usage text and configuration errors. */
  write?: (text: string) => void;
}

/**
 * Runs one CLI invocation and returns its exit code.
 *
 * 0 when the service accepted the event, 1 on configuration or delivery
 * failure, 2 on bad arguments.
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const write = deps.write ?? ((text: string) => process.stderr.write(`${text}\n`));

  let command: ParsedCommand;
  try {
    command = parseCommand(argv, deps.now);
  } catch (err: unknown) {
    if (err instanceof UsageError) {
      write(`${err.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    throw err;
  }

  if (command.kind === 'help') {
    write(USAGE);
    return EXIT_OK;
  }

  let config: ClientConfig;
  try {
    config = loadClientConfig(deps.env);
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      write(err.message);
      return EXIT_FAILURE;
    }
    throw err;
  }

  const log = deps.logger ?? createLogger({ level: config.logLevel, destination: stderrDestination() });
  const client = createEventsClient(config, {
    logger: log,
    ...(deps.fetch ? { fetch: deps.fetch } : {}),
  });

  const { event } = command;
  try {
    await client.event(event);
  } catch (err: unknown) {
    if (err instanceof EventsApiError) {
      log.error({ err, kind: err.kind, event_type: event.type }, 'Event was not delivered');
      return EXIT_FAILURE;
    }
    throw err;
  }

  log.info({ event_type: event.type }, 'Event accepted');
  return EXIT_OK;
}
