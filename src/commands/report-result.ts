/**
 * Execution summaries for the terminal and for --json
 */

import { ExecutionResult } from '../core/orchestrator';
import { ExitCode, exitCodeForError } from '../types/exit-codes';
import { WorkflowSource } from '../types/workflow';
import { formatWorkflowError } from '../types/workflow-error';
import { Spinner } from '../ui/spinner-service';
import { CommandContext } from './command-context';

export function exitCodeForResult(result: ExecutionResult): ExitCode {
  if (result.success) {
    return ExitCode.SUCCESS;
  }
  return result.error ? exitCodeForError(result.error) : ExitCode.UNEXPECTED_ERROR;
}

/**
 * Machine-readable summary printed under --json
 */
export function toJsonSummary(result: ExecutionResult, workflow: WorkflowSource): Record<string, unknown> {
  return {
    success: result.success,
    workflow: workflow.name,
    workflowFile: workflow.filePath,
    workflowId: result.workflowId,
    status: result.status,
    iterations: result.iterations,
    durationMs: result.duration,
    finalOutput: result.finalOutput,
    error: result.error
      ? {
          code: result.error.code,
          message: result.error.message,
          resumable: result.error.resumable,
          lastCheckpointAt: result.error.lastCheckpointAt ?? null,
        }
      : null,
    compatibility: result.compatibility
      ? { score: result.compatibility.score, warnings: result.compatibility.warnings }
      : null,
    exitCode: exitCodeForResult(result),
  };
}

/**
 * Close the spinner, print the final answer or the error with its resume
 * hint, and return the exit code
 */
export function reportExecution(
  ctx: CommandContext,
  spinner: Spinner,
  workflow: WorkflowSource,
  result: ExecutionResult
): ExitCode {
  const exitCode = exitCodeForResult(result);

  if (ctx.args.jsonOutput) {
    spinner.stop();
    ctx.output.out(JSON.stringify(toJsonSummary(result, workflow)));
    return exitCode;
  }

  if (result.success) {
    spinner.succeed(`${workflow.name} completed in ${result.iterations} turn(s) (${result.workflowId})`);
    ctx.output.out(result.finalOutput);
    return exitCode;
  }

  if (result.status === 'CANCELLED') {
    spinner.warn(`${workflow.name} cancelled (${result.workflowId})`);
  } else {
    spinner.fail(`${workflow.name} failed (${result.workflowId})`);
  }
  ctx.output.err(result.error ? formatWorkflowError(result.error, ctx.args.workflowFile) : result.errorMessage ?? '');
  return exitCode;
}
