/**
 * Shared command plumbing
 * What every command receives, and the steps run/resume/validate share
 */

import { resolve } from 'path';
import { ParsedArgs } from '../cli/types';
import { CliFlags, resolveConfig } from '../config/resolve-config';
import { formatEffectiveConfigForDisplay } from '../config/format-effective-config';
import { loadWorkflow } from '../io/load-workflow';
import { createRealFileSystem } from '../io/real-file-system';
import { Runtime, createCliLogger, createRuntime } from '../orchestration/orchestrator-factory';
import { ChatCompletionClient } from '../types/chat-client';
import { Clock, SystemClock } from '../types/clock';
import { EffectiveConfig } from '../types/effective-config';
import { ExitCode } from '../types/exit-codes';
import { FileSystem } from '../types/file-system';
import { Logger } from '../types/logger';
import { Prompter } from '../types/prompter';
import { Result, ok, err } from '../types/result';
import { WorkflowSource } from '../types/workflow';
import { SpinnerService, createSpinnerService } from '../ui/spinner-service';
import { createInquirerPrompter } from '../ui/inquirer-prompter';

/**
 * Where command results go; stdout and stderr in production
 */
export interface CommandOutput {
  out(text: string): void;
  err(text: string): void;
}

export interface CommandContext {
  args: ParsedArgs;
  output: CommandOutput;
  workingDirectory: string;
  /** Home directory for the user config file */
  homeDirectory?: string;
  env: Record<string, string | undefined>;
  /** Aborted on SIGINT */
  signal?: AbortSignal;
  clock?: Clock;
  // Test overrides
  logger?: Logger;
  prompter?: Prompter;
  spinner?: SpinnerService;
  chatClient?: ChatCompletionClient;
  /** Filesystem for the model's file tools */
  toolFileSystem?: FileSystem;
}

/**
 * A command that could not get going, with the exit code to report
 */
export interface CommandFailure {
  exitCode: ExitCode;
  message: string;
}

export interface PreparedCommand {
  config: EffectiveConfig;
  logger: Logger;
  prompter: Prompter;
  spinner: SpinnerService;
  fileSystem: FileSystem;
}

export function createConsoleOutput(): CommandOutput {
  return {
    out: (text) => console.log(text),
    err: (text) => console.error(text),
  };
}

export function cliFlagsFromArgs(args: ParsedArgs): CliFlags {
  return {
    maxIterations: args.maxIterations ?? undefined,
    timeoutMs: args.timeoutMs ?? undefined,
    model: args.model ?? undefined,
    mockScriptPath: args.mockScriptPath ?? undefined,
    storageDirectory: args.storageDirectory ?? undefined,
    retentionDays: args.retentionDays ?? undefined,
    verbose: args.verbose || undefined,
    debug: args.debug || undefined,
    jsonOutput: args.jsonOutput || undefined,
    noInteractive: args.noInteractive || undefined,
  };
}

/**
 * Load the workflow named on the command line
 */
export async function loadCommandWorkflow(ctx: CommandContext): Promise<Result<WorkflowSource, CommandFailure>> {
  const loaded = await loadWorkflow(createRealFileSystem(), resolve(ctx.workingDirectory, ctx.args.workflowFile));
  if (!loaded.ok) {
    return err({
      exitCode: loaded.error.code === 'NOT_FOUND' ? ExitCode.USAGE_ERROR : ExitCode.VALIDATION_ERROR,
      message: [loaded.error.message, ...loaded.error.details.slice(1).map((detail) => `  - ${detail}`)].join(
        '\n'
      ),
    });
  }
  return ok(loaded.value);
}

/**
 * Resolve config (folding in the workflow's frontmatter when there is one)
 * and build the logger, prompter and spinner it calls for
 */
export function prepareCommand(ctx: CommandContext, workflow?: WorkflowSource): PreparedCommand {
  const { config, warnings } = resolveConfig({
    cliFlags: cliFlagsFromArgs(ctx.args),
    workflow: workflow ? { ...workflow.settings, model: workflow.model } : undefined,
    workingDirectory: ctx.workingDirectory,
    homeDirectory: ctx.homeDirectory,
    clock: ctx.clock,
  });

  const logger = ctx.logger ?? createCliLogger(config.verbosity);
  for (const warning of warnings) {
    logger.warn(warning);
  }
  logger.debug('Resolved configuration', { runId: config.runId, sources: config.sources });
  if (config.verbosity.verbose && !config.verbosity.jsonOutput) {
    ctx.output.err(formatEffectiveConfigForDisplay(config));
  }

  return {
    config,
    logger,
    prompter:
      ctx.prompter ?? createInquirerPrompter({ interactive: config.interactivity.interactive, logger }),
    spinner: ctx.spinner ?? createSpinnerService({ quiet: config.verbosity.jsonOutput }),
    fileSystem: createRealFileSystem(),
  };
}

/**
 * Runtime for a command that talks to the model
 */
export async function createCommandRuntime(
  ctx: CommandContext,
  prepared: PreparedCommand
): Promise<Result<Runtime, CommandFailure>> {
  const runtime = await createRuntime({
    config: prepared.config,
    clock: ctx.clock ?? new SystemClock(),
    logger: prepared.logger,
    fileSystem: prepared.fileSystem,
    toolFileSystem: ctx.toolFileSystem,
    chatClient: ctx.chatClient,
    env: ctx.env,
  });
  if (!runtime.ok) {
    return err({ exitCode: ExitCode.USAGE_ERROR, message: runtime.error });
  }
  return ok(runtime.value);
}

/**
 * Print a failure and hand back its exit code
 */
export function reportFailure(ctx: CommandContext, failure: CommandFailure): ExitCode {
  if (ctx.args.jsonOutput) {
    ctx.output.out(JSON.stringify({ success: false, error: { message: failure.message }, exitCode: failure.exitCode }));
  } else {
    ctx.output.err(`Error: ${failure.message}`);
  }
  return failure.exitCode;
}
