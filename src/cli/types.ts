/**
 * CLI Types
 *
 * Type definitions for CLI argument parsing
 */

import { JsonValue } from '../types/json';

export const COMMAND_NAMES = ['run', 'resume', 'validate'] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

/** Parsed CLI arguments */
export interface ParsedArgs {
  /** Subcommand; null only with --help or --version */
  command: CommandName | null;

  /** Path of the *.prompt.md file */
  workflowFile: string;

  /** --var key=value pairs; values are JSON-parsed when they can be */
  variables: Record<string, JsonValue>;

  /** Maximum model turns per run */
  maxIterations: number | null;

  /** Overall timeout in milliseconds (0 = none) */
  timeoutMs: number | null;

  /** Model name override */
  model: string | null;

  /** Scripted conversation file; selects the mock model */
  mockScriptPath: string | null;

  /** Directory holding resume snapshots */
  storageDirectory: string | null;

  /** Snapshot to resume */
  workflowId: string | null;

  /** Resume incompatible or completed snapshots anyway */
  force: boolean;

  /** Print stored snapshots instead of resuming */
  list: boolean;

  /** Delete snapshots older than the retention window */
  clean: boolean;

  /** Retention window used by --clean */
  retentionDays: number | null;

  /** Show help and exit */
  help: boolean;

  /** Show version and exit */
  version: boolean;

  /** Disable interactive prompts; use defaults or fail */
  noInteractive: boolean;

  /** Enable verbose output with more progress details */
  verbose: boolean;

  /** Enable debug mode with full diagnostics */
  debug: boolean;

  /** Output machine-readable JSON summary */
  jsonOutput: boolean;
}

/** Default values for parsed arguments */
export const DEFAULT_ARGS: ParsedArgs = {
  command: null,
  workflowFile: '',
  variables: {},
  maxIterations: null,
  timeoutMs: null,
  model: null,
  mockScriptPath: null,
  storageDirectory: null,
  workflowId: null,
  force: false,
  list: false,
  clean: false,
  retentionDays: null,
  help: false,
  version: false,
  noInteractive: false,
  verbose: false,
  debug: false,
  jsonOutput: false,
};

/** Result of parsing arguments */
export interface ParseResult {
  success: boolean;
  args?: ParsedArgs;
  error?: string;
}
