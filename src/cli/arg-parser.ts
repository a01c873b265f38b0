/**
 * CLI Argument Parser
 *
 * Parses command line arguments into structured ParsedArgs
 */

import { ParsedArgs, ParseResult, DEFAULT_ARGS, COMMAND_NAMES, CommandName } from './types';
import { JsonValue } from '../types/json';
import { Result, ok, err } from '../types/result';
import { jsonValueSchema } from '../schemas/json-value.schema';

interface ArgValue {
  value: string;
  /** How many following argv entries were consumed */
  skip: number;
}

function isCommandName(value: string): value is CommandName {
  return COMMAND_NAMES.some((name) => name === value);
}

/**
 * Parse a positive integer from a string
 */
function parsePositiveInt(value: string, name: string): Result<number, string> {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    return err(`${name} must be a positive integer`);
  }
  return ok(parsed);
}

/**
 * Parse a non-negative integer from a string
 */
function parseNonNegativeInt(value: string, name: string): Result<number, string> {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    return err(`${name} must be a non-negative integer`);
  }
  return ok(parsed);
}

/**
 * Parse `key=value`; the value is read as JSON when it is valid JSON,
 * otherwise kept as a string
 */
export function parseVariable(raw: string): Result<[string, JsonValue], string> {
  const separator = raw.indexOf('=');
  if (separator < 1) {
    return err(`--var expects key=value, got "${raw}"`);
  }
  const key = raw.slice(0, separator).trim();
  const text = raw.slice(separator + 1);
  if (!key) {
    return err(`--var expects key=value, got "${raw}"`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return ok([key, text]);
  }
  const json = jsonValueSchema.safeParse(parsed);
  return ok([key, json.success ? json.data : text]);
}

/**
 * Get the value for an argument, handling both --arg value and --arg=value formats
 */
function getArgValue(args: string[], index: number, argName: string): Result<ArgValue, string> {
  const arg = args[index];

  // Check for --arg=value format
  const separator = arg.indexOf('=');
  if (separator !== -1) {
    const value = arg.slice(separator + 1);
    if (!value) {
      return err(`${argName}= requires a value`);
    }
    return ok({ value, skip: 0 });
  }

  // Check for --arg value format
  const nextArg = args[index + 1];
  if (nextArg === undefined || nextArg.startsWith('--')) {
    return err(`${argName} requires a value`);
  }
  return ok({ value: nextArg, skip: 1 });
}

/**
 * Parse command line arguments
 */
export function parseArgs(argv: string[]): ParseResult {
  const args = argv.slice(2); // Remove node and script path
  const result: ParsedArgs = { ...DEFAULT_ARGS, variables: {} };
  const positionals: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const argBase = arg.startsWith('--') ? arg.split('=')[0] : arg;

    // Flags that take a value share the same lookup and failure shape
    const takeValue = (): Result<string, string> => {
      const found = getArgValue(args, i, argBase);
      if (!found.ok) {
        return found;
      }
      i += found.value.skip;
      return ok(found.value.value);
    };

    switch (argBase) {
      case '--help':
      case '-h': {
        result.help = true;
        break;
      }

      case '--version':
      case '-v': {
        result.version = true;
        break;
      }

      case '--var': {
        const value = takeValue();
        if (!value.ok) return { success: false, error: `Error: ${value.error}` };
        const variable = parseVariable(value.value);
        if (!variable.ok) return { success: false, error: `Error: ${variable.error}` };
        const [key, parsed] = variable.value;
        result.variables[key] = parsed;
        break;
      }

      case '--max-iterations': {
        const value = takeValue();
        if (!value.ok) return { success: false, error: `Error: ${value.error}` };
        const parsed = parsePositiveInt(value.value, '--max-iterations');
        if (!parsed.ok) return { success: false, error: `Error: ${parsed.error}` };
        result.maxIterations = parsed.value;
        break;
      }

      case '--timeout': {
        const value = takeValue();
        if (!value.ok) return { success: false, error: `Error: ${value.error}` };
        const parsed = parseNonNegativeInt(value.value, '--timeout');
        if (!parsed.ok) return { success: false, error: `Error: ${parsed.error}` };
        result.timeoutMs = parsed.value;
        break;
      }

      case '--retention-days': {
        const value = takeValue();
        if (!value.ok) return { success: false, error: `Error: ${value.error}` };
        const parsed = parseNonNegativeInt(value.value, '--retention-days');
        if (!parsed.ok) return { success: false, error: `Error: ${parsed.error}` };
        result.retentionDays = parsed.value;
        break;
      }

      case '--model': {
        const value = takeValue();
        if (!value.ok) return { success: false, error: `Error: ${value.error}` };
        result.model = value.value;
        break;
      }

      case '--mock': {
        const value = takeValue();
        if (!value.ok) return { success: false, error: `Error: ${value.error}` };
        result.mockScriptPath = value.value;
        break;
      }

      case '--storage-dir': {
        const value = takeValue();
        if (!value.ok) return { success: false, error: `Error: ${value.error}` };
        result.storageDirectory = value.value;
        break;
      }

      case '--workflow-id': {
        const value = takeValue();
        if (!value.ok) return { success: false, error: `Error: ${value.error}` };
        result.workflowId = value.value;
        break;
      }

      case '--force': {
        result.force = true;
        break;
      }

      case '--list': {
        result.list = true;
        break;
      }

      case '--clean': {
        result.clean = true;
        break;
      }

      case '--no-interactive': {
        result.noInteractive = true;
        break;
      }

      case '--verbose': {
        result.verbose = true;
        break;
      }

      case '--debug': {
        result.debug = true;
        break;
      }

      case '--json': {
        result.jsonOutput = true;
        break;
      }

      default: {
        if (arg.startsWith('-')) {
          return { success: false, error: `Error: Unknown option: ${argBase}` };
        }
        positionals.push(arg);
      }
    }
  }

  if (result.help || result.version) {
    return { success: true, args: result };
  }

  const [command, workflowFile, ...extra] = positionals;
  if (command === undefined) {
    return { success: false, error: `Error: No command given (expected one of: ${COMMAND_NAMES.join(', ')})` };
  }
  if (!isCommandName(command)) {
    return { success: false, error: `Error: Unknown command: ${command}` };
  }
  if (extra.length > 0) {
    return { success: false, error: `Error: Unexpected argument: ${extra[0]}` };
  }
  result.command = command;
  result.workflowFile = workflowFile ?? '';

  // --list and --clean work across every workflow
  const needsWorkflow = command !== 'resume' || (!result.list && !result.clean);
  if (needsWorkflow && !result.workflowFile) {
    return { success: false, error: `Error: ${command} requires a workflow file` };
  }

  return { success: true, args: result };
}
