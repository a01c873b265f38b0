/**
 * Standardized process exit codes
 */

import { WorkflowError } from './workflow-error';

export const ExitCode = {
  /** Workflow completed or command succeeded */
  SUCCESS: 0,
  /** Unexpected/unhandled error */
  UNEXPECTED_ERROR: 1,
  /** Invalid CLI usage or missing arguments */
  USAGE_ERROR: 2,
  /** Workflow file or template failed validation */
  VALIDATION_ERROR: 3,
  /** Iteration limit exceeded before a final answer */
  LIMIT_EXCEEDED: 4,
  /** Model request failed */
  MODEL_ERROR: 5,
  /** Stored snapshot is not compatible with the current workflow */
  RESUME_INCOMPATIBLE: 6,
  /** Snapshot missing or unreadable */
  SNAPSHOT_ERROR: 7,
  /** Overall timeout elapsed */
  TIMEOUT: 8,
  /** Interrupted by the user */
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Get a human-readable description of an exit code
 */
export function getExitCodeDescription(code: ExitCode): string {
  switch (code) {
    case ExitCode.SUCCESS:
      return 'Successful execution';
    case ExitCode.UNEXPECTED_ERROR:
      return 'Unexpected or unhandled error';
    case ExitCode.USAGE_ERROR:
      return 'Invalid CLI usage or missing arguments';
    case ExitCode.VALIDATION_ERROR:
      return 'Workflow validation failed';
    case ExitCode.LIMIT_EXCEEDED:
      return 'Iteration limit exceeded before a final answer';
    case ExitCode.MODEL_ERROR:
      return 'Model request failed';
    case ExitCode.RESUME_INCOMPATIBLE:
      return 'Snapshot is not compatible with the current workflow';
    case ExitCode.SNAPSHOT_ERROR:
      return 'Snapshot missing or unreadable';
    case ExitCode.TIMEOUT:
      return 'Execution timed out';
    case ExitCode.CANCELLED:
      return 'Execution cancelled';
    default:
      return 'Unknown exit code';
  }
}

export function isSuccessExitCode(code: number): boolean {
  return code === ExitCode.SUCCESS;
}

/**
 * Exit codes after which `promptloop resume` can pick the run up again
 */
export function isResumableExitCode(code: number): boolean {
  return (
    code === ExitCode.LIMIT_EXCEEDED ||
    code === ExitCode.MODEL_ERROR ||
    code === ExitCode.TIMEOUT ||
    code === ExitCode.CANCELLED
  );
}

/**
 * Exit code a command ends with after a workflow error
 */
export function exitCodeForError(error: WorkflowError): ExitCode {
  switch (error.code) {
    case 'TEMPLATE_ERROR':
      return ExitCode.VALIDATION_ERROR;
    case 'MODEL_INTERFACE_ERROR':
      return ExitCode.MODEL_ERROR;
    case 'MAX_ITERATIONS_EXCEEDED':
      return ExitCode.LIMIT_EXCEEDED;
    case 'TIMEOUT':
      return ExitCode.TIMEOUT;
    case 'RESUME_INCOMPATIBLE':
      return ExitCode.RESUME_INCOMPATIBLE;
    case 'SNAPSHOT_CORRUPT':
    case 'NO_RESUME_STATE':
      return ExitCode.SNAPSHOT_ERROR;
    case 'CANCELLED':
      return ExitCode.CANCELLED;
    case 'TOOL_INVOCATION_ERROR':
    case 'STORAGE_ERROR':
      return ExitCode.UNEXPECTED_ERROR;
  }
}
