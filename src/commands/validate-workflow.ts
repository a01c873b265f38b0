/**
 * `promptloop validate <workflow-file>`
 * Static checks only; the model is never called
 */

import { validateWorkflow } from '../core/workflow-validation';
import { createRealFileSystem } from '../io/real-file-system';
import { createBuiltinTools } from '../orchestration/orchestrator-factory';
import { ExitCode } from '../types/exit-codes';
import { CommandContext, loadCommandWorkflow, prepareCommand, reportFailure } from './command-context';

export async function validateWorkflowCommand(ctx: CommandContext): Promise<ExitCode> {
  const workflow = await loadCommandWorkflow(ctx);
  if (!workflow.ok) {
    return reportFailure(ctx, workflow.error);
  }

  const prepared = prepareCommand(ctx, workflow.value);
  const tools = createBuiltinTools(
    ctx.toolFileSystem ?? createRealFileSystem(prepared.config.paths.workingDirectory)
  );
  const result = validateWorkflow(workflow.value, tools);
  const exitCode = result.valid ? ExitCode.SUCCESS : ExitCode.VALIDATION_ERROR;
  prepared.logger.info(`Validated ${workflow.value.filePath}`, {
    errors: result.errors.length,
    warnings: result.warnings.length,
  });

  if (ctx.args.jsonOutput) {
    ctx.output.out(
      JSON.stringify({
        success: result.valid,
        workflow: workflow.value.name,
        workflowFile: workflow.value.filePath,
        errors: result.errors,
        warnings: result.warnings,
        exitCode,
      })
    );
    return exitCode;
  }

  for (const error of result.errors) {
    ctx.output.err(`❌ ${error}`);
  }
  for (const warning of result.warnings) {
    ctx.output.err(`⚠️  ${warning}`);
  }
  if (result.valid) {
    ctx.output.out(`✅ ${workflow.value.filePath} is valid (${result.warnings.length} warning(s))`);
  } else {
    ctx.output.err(`${workflow.value.filePath} has ${result.errors.length} error(s)`);
  }
  return exitCode;
}
