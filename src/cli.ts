#!/usr/bin/env node
import { runCli } from './interfaces/cli/index.js';

/**
 * pd-events: send a single event to the PagerDuty Events v2 API.
 *
 * Configuration comes from the environment (see --help).
 */
runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error('Fatal: pd-events crashed', err);
    process.exit(1);
  });
