/**
 * `promptloop run <workflow-file>`
 * Start a fresh execution of a workflow
 */

import { isValidWorkflowId } from '../resume/workflow-id';
import { ExitCode } from '../types/exit-codes';
import { createSpinnerObserver } from '../ui/progress-observer';
import {
  CommandContext,
  createCommandRuntime,
  loadCommandWorkflow,
  prepareCommand,
  reportFailure,
} from './command-context';
import { reportExecution } from './report-result';

export async function runWorkflowCommand(ctx: CommandContext): Promise<ExitCode> {
  const { workflowId } = ctx.args;
  if (workflowId !== null && !isValidWorkflowId(workflowId)) {
    return reportFailure(ctx, { exitCode: ExitCode.USAGE_ERROR, message: `Invalid workflow id: ${workflowId}` });
  }

  const workflow = await loadCommandWorkflow(ctx);
  if (!workflow.ok) {
    return reportFailure(ctx, workflow.error);
  }

  const prepared = prepareCommand(ctx, workflow.value);
  const runtime = await createCommandRuntime(ctx, prepared);
  if (!runtime.ok) {
    return reportFailure(ctx, runtime.error);
  }

  const { orchestrator, logger } = runtime.value;
  const spinner = prepared.spinner.start(`${workflow.value.name}: starting`);
  logger.debug(`Running ${workflow.value.filePath}`, {
    variables: Object.keys(ctx.args.variables),
    tools: workflow.value.declaredTools,
  });

  const result = await orchestrator.execute(workflow.value, ctx.args.variables, {
    signal: ctx.signal,
    ...(workflowId !== null ? { workflowId } : {}),
    observer: createSpinnerObserver(spinner, workflow.value.name),
  });

  return reportExecution(ctx, spinner, workflow.value, result);
}
