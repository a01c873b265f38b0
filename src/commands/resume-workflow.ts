/**
 * `promptloop resume <workflow-file>`
 * Continue an interrupted run, or list and clean stored snapshots
 */

import { Runtime, createSnapshotStore } from '../orchestration/orchestrator-factory';
import { validateCompatibility } from '../resume/compatibility-validator';
import { ResumeStateStore } from '../resume/resume-state-store';
import { SystemClock } from '../types/clock';
import { ExitCode, exitCodeForError } from '../types/exit-codes';
import { Result, ok, err } from '../types/result';
import { SnapshotSummary } from '../types/resume-snapshot';
import { WorkflowSource } from '../types/workflow';
import { createSpinnerObserver } from '../ui/progress-observer';
import {
  CommandContext,
  CommandFailure,
  PreparedCommand,
  createCommandRuntime,
  loadCommandWorkflow,
  prepareCommand,
  reportFailure,
} from './command-context';
import { reportExecution } from './report-result';

export function formatSnapshotSummary(summary: SnapshotSummary): string {
  const size = summary.compressed ? `${summary.sizeBytes}B gz` : `${summary.sizeBytes}B`;
  return [
    `${summary.workflowId}  ${summary.status.padEnd(11)}  ${summary.currentPhase}`,
    `    ${summary.workflowFilePath}`,
    `    last activity ${summary.lastActivity}, ${summary.completedToolCount} tool call(s), ${summary.messageCount} message(s), ${size}`,
  ].join('\n');
}

/**
 * --clean and --list; neither resumes anything
 */
async function manageSnapshots(
  ctx: CommandContext,
  store: ResumeStateStore,
  retentionDays: number,
  workflow?: WorkflowSource
): Promise<ExitCode> {
  const summary: Record<string, unknown> = { success: true, directory: store.getDirectory() };

  if (ctx.args.clean) {
    const removed = await store.cleanup({ retentionDays });
    if (!removed.ok) {
      return reportFailure(ctx, { exitCode: exitCodeForError(removed.error), message: removed.error.message });
    }
    summary.removed = removed.value;
    if (!ctx.args.jsonOutput) {
      ctx.output.out(
        `Removed ${removed.value} snapshot(s) older than ${retentionDays} day(s) from ${store.getDirectory()}`
      );
    }
  }

  if (ctx.args.list) {
    const listed = await store.list();
    if (!listed.ok) {
      return reportFailure(ctx, { exitCode: exitCodeForError(listed.error), message: listed.error.message });
    }
    const snapshots = workflow
      ? listed.value.filter((entry) => entry.workflowFilePath === workflow.filePath)
      : listed.value;
    summary.snapshots = snapshots;
    if (!ctx.args.jsonOutput) {
      if (snapshots.length === 0) {
        ctx.output.out(`No snapshots in ${store.getDirectory()}`);
      }
      for (const entry of snapshots) {
        ctx.output.out(formatSnapshotSummary(entry));
      }
    }
  }

  if (ctx.args.jsonOutput) {
    ctx.output.out(JSON.stringify(summary));
  }
  return ExitCode.SUCCESS;
}

/**
 * The snapshot to resume: --workflow-id, the only resumable snapshot of
 * this workflow, or the user's pick (the newest when nobody can be asked)
 */
async function selectWorkflowId(
  ctx: CommandContext,
  prepared: PreparedCommand,
  store: ResumeStateStore,
  workflow: WorkflowSource
): Promise<Result<string, CommandFailure>> {
  if (ctx.args.workflowId) {
    return ok(ctx.args.workflowId);
  }

  const listed = await store.list();
  if (!listed.ok) {
    return err({ exitCode: exitCodeForError(listed.error), message: listed.error.message });
  }
  const candidates = listed.value.filter(
    (entry) => entry.workflowFilePath === workflow.filePath && entry.status !== 'completed'
  );

  if (candidates.length === 0) {
    return err({
      exitCode: ExitCode.SNAPSHOT_ERROR,
      message: `No resumable snapshot found for ${workflow.filePath}; start one with: promptloop run ${ctx.args.workflowFile}`,
    });
  }
  if (candidates.length === 1) {
    return ok(candidates[0].workflowId);
  }

  const picked = await prepared.prompter.select({
    message: `${candidates.length} interrupted runs of ${workflow.name} found. Which one should be resumed?`,
    choices: candidates.map((entry) => ({
      name: entry.workflowId,
      value: entry.workflowId,
      description: `${entry.status}, ${entry.currentPhase}, last activity ${entry.lastActivity}`,
    })),
    default: candidates[0].workflowId,
  });
  if (!picked.ok) {
    return err({
      exitCode: picked.error.code === 'CANCELLED' ? ExitCode.CANCELLED : ExitCode.UNEXPECTED_ERROR,
      message: picked.error.message,
    });
  }
  return ok(picked.value);
}

/**
 * Ask before resuming a snapshot the current workflow no longer matches;
 * resolves to true when the user wants to go ahead regardless
 */
async function confirmIncompatible(
  ctx: CommandContext,
  prepared: PreparedCommand,
  runtime: Runtime,
  workflowId: string,
  workflow: WorkflowSource
): Promise<Result<boolean, CommandFailure>> {
  if (!prepared.prompter.isInteractive()) {
    return ok(false);
  }

  const loaded = await runtime.store.load(workflowId);
  if (!loaded.ok || !loaded.value || loaded.value.status === 'completed') {
    return ok(false);
  }

  const { compatibility } = prepared.config;
  const result = validateCompatibility(loaded.value, workflow.content, runtime.tools.names(), compatibility);
  if (result.canResume) {
    return ok(false);
  }

  ctx.output.err(
    `Snapshot ${workflowId} scores ${result.score.toFixed(2)} against the current workflow (needs ${compatibility.resumeThreshold}).`
  );
  for (const warning of result.warnings) {
    ctx.output.err(`  - ${warning}`);
  }

  const answer = await prepared.prompter.confirm({ message: 'Resume anyway?', default: false });
  if (!answer.ok) {
    if (answer.error.code === 'CANCELLED') {
      return err({ exitCode: ExitCode.CANCELLED, message: 'Resume cancelled' });
    }
    prepared.logger.warn(`Could not ask for confirmation: ${answer.error.message}`);
    return ok(false);
  }
  return ok(answer.value);
}

export async function resumeWorkflowCommand(ctx: CommandContext): Promise<ExitCode> {
  const { args } = ctx;

  let workflow: WorkflowSource | undefined;
  if (args.workflowFile) {
    const loaded = await loadCommandWorkflow(ctx);
    if (!loaded.ok) {
      return reportFailure(ctx, loaded.error);
    }
    workflow = loaded.value;
  }

  const prepared = prepareCommand(ctx, workflow);

  if (args.list || args.clean) {
    const store = createSnapshotStore(
      prepared.config,
      prepared.fileSystem,
      prepared.logger,
      ctx.clock ?? new SystemClock()
    );
    return manageSnapshots(ctx, store, prepared.config.resume.retentionDays, workflow);
  }

  if (!workflow) {
    return reportFailure(ctx, { exitCode: ExitCode.USAGE_ERROR, message: 'resume requires a workflow file' });
  }

  const runtime = await createCommandRuntime(ctx, prepared);
  if (!runtime.ok) {
    return reportFailure(ctx, runtime.error);
  }

  const selected = await selectWorkflowId(ctx, prepared, runtime.value.store, workflow);
  if (!selected.ok) {
    return reportFailure(ctx, selected.error);
  }

  let force = args.force;
  if (!force) {
    const confirmed = await confirmIncompatible(ctx, prepared, runtime.value, selected.value, workflow);
    if (!confirmed.ok) {
      return reportFailure(ctx, confirmed.error);
    }
    force = confirmed.value;
  }

  const spinner = prepared.spinner.start(`${workflow.name}: resuming ${selected.value}`);
  const result = await runtime.value.orchestrator.resume(selected.value, workflow, {
    force,
    signal: ctx.signal,
    observer: createSpinnerObserver(spinner, workflow.name),
  });

  return reportExecution(ctx, spinner, workflow, result);
}
