#!/usr/bin/env node

import { parseArgs, getUsageText, getVersion, printUsage } from './cli';
import { CommandContext, createConsoleOutput } from './commands/command-context';
import { runWorkflowCommand } from './commands/run-workflow';
import { resumeWorkflowCommand } from './commands/resume-workflow';
import { validateWorkflowCommand } from './commands/validate-workflow';
import { ExitCode } from './types/exit-codes';

// Library surface
export { Orchestrator, createOrchestrator, validateWorkflow } from './core';
export type {
  OrchestratorDependencies,
  ExecutionObserver,
  ExecuteOptions,
  ResumeOptions,
  ExecutionResult,
  WorkflowValidationResult,
} from './core';
export { ConversationStore, createConversationStore } from './conversation';
export {
  toSnapshot,
  fromSnapshot,
  ResumeStateStore,
  createResumeStateStore,
  validateCompatibility,
  generateWorkflowId,
} from './resume';
export { loadWorkflow, parseWorkflowSource, RealFileSystem, MemoryFileSystem } from './io';
export { resolveConfig } from './config';
export { ToolRegistry, createToolRegistry, createFileTools } from './tools';
export { OpenAIChatClient, ScriptedChatClient } from './llm';
export { createRuntime } from './orchestration';
export { ConsoleLogger, BufferLogger } from './logging';
export { renderTemplate, getTemplateVariables } from './templates';
export {
  resumeFileSchema,
  workflowFrontmatterSchema,
  mockScriptSchema,
  parseResumeFile,
  parseMockScript,
} from './schemas';
export type { ResumeFile, WorkflowFrontmatter, MockScript } from './schemas';
export { createSpinnerService, createSpinnerObserver, createInquirerPrompter } from './ui';
export * from './types';

/**
 * Parse argv, dispatch to the command and resolve to the exit code
 */
export async function main(argv: string[] = process.argv): Promise<ExitCode> {
  const parsed = parseArgs(argv);
  if (!parsed.success || !parsed.args) {
    console.error(parsed.error ?? 'Error: Invalid arguments');
    console.error('');
    printUsage();
    return ExitCode.USAGE_ERROR;
  }

  const args = parsed.args;
  if (args.help) {
    console.log(getUsageText());
    return ExitCode.SUCCESS;
  }
  if (args.version) {
    console.log(getVersion());
    return ExitCode.SUCCESS;
  }

  // First Ctrl+C stops after a checkpoint; a second one exits at once
  const controller = new AbortController();
  const onSigint = (): void => {
    if (controller.signal.aborted) {
      process.exit(ExitCode.CANCELLED);
    }
    console.error('\nCancelling after the current step... press Ctrl+C again to exit immediately');
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  const ctx: CommandContext = {
    args,
    output: createConsoleOutput(),
    workingDirectory: process.cwd(),
    env: process.env,
    signal: controller.signal,
  };

  try {
    switch (args.command) {
      case 'run':
        return await runWorkflowCommand(ctx);
      case 'resume':
        return await resumeWorkflowCommand(ctx);
      case 'validate':
        return await validateWorkflowCommand(ctx);
      default:
        printUsage();
        return ExitCode.USAGE_ERROR;
    }
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : String(error));
    if (args.debug && error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    return ExitCode.UNEXPECTED_ERROR;
  } finally {
    process.off('SIGINT', onSigint);
  }
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('Error:', error instanceof Error ? error.message : String(error));
      process.exitCode = ExitCode.UNEXPECTED_ERROR;
    });
}
