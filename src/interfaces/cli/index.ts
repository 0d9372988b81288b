export { runCli, EXIT_OK, EXIT_FAILURE, EXIT_USAGE } from './run-cli.js';
export type { CliDependencies } from './run-cli.js';
export { parseCommand, UsageError, USAGE } from './parse-command.js';
export type { ParsedCommand, CustomDetails } from './parse-command.js';
