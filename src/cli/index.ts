/**
 * CLI Module
 *
 * Exports for the CLI argument parsing module
 */

export { parseArgs, parseVariable } from './arg-parser';
export { getUsageText, printUsage, getVersion } from './help';
export type { ParsedArgs, ParseResult, CommandName } from './types';
export { DEFAULT_ARGS, COMMAND_NAMES } from './types';
