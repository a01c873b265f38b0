/**
 * Execution Orchestrator
 * Drives one workflow through the tool-calling loop, checkpointing as it
 * goes. Uses dependency injection for every external interaction.
 */

import {
  ExecutionEvent,
  ExecutionMachineContext,
  ExecutionState,
  TransitionResult,
  createInitialContext,
  transition,
} from './state-machine';
import { checkIterationLimit, checkTimeout } from './iteration-policy';

import { ChatMessage, FunctionCall, createMessage } from '../types/chat';
import { ChatCompletionClient, ExecutionSettings } from '../types/chat-client';
import { Clock } from '../types/clock';
import { EffectiveConfig } from '../types/effective-config';
import {
  ExecutionContext,
  createExecutionContext,
  setContextVariable,
} from '../types/execution-context';
import { JsonValue } from '../types/json';
import { Logger } from '../types/logger';
import { CompletedTool, SnapshotStatus } from '../types/resume-snapshot';
import { ToolCatalog, ToolResult } from '../types/tool';
import { WorkflowSource } from '../types/workflow';
import { WorkflowError, WorkflowErrorCode, createWorkflowError } from '../types/workflow-error';
import { ConversationStore } from '../conversation/conversation-store';
import { toSnapshot, fromSnapshot } from '../resume/resume-codec';
import { createResumeMessage } from '../resume/resume-message';
import { SnapshotStore } from '../resume/resume-state-store';
import { CompatibilityResult, validateCompatibility } from '../resume/compatibility-validator';
import { generateWorkflowId } from '../resume/workflow-id';
import { renderTemplate } from '../templates/prompt-template';
import { WorkflowValidationResult, validateWorkflow } from './workflow-validation';

/**
 * Dependencies required by the Orchestrator
 */
export interface OrchestratorDependencies {
  logger: Logger;
  clock: Clock;
  chatClient: ChatCompletionClient;
  /** Registry the declared tools are looked up in */
  tools: ToolCatalog;
  store: SnapshotStore;
  /** Working transcripts; a private store is created when omitted */
  conversations?: ConversationStore;
}

/**
 * Progress callbacks, used by the CLI spinner
 */
export interface ExecutionObserver {
  onStateChange?(state: ExecutionState, description: string): void;
  onIteration?(iteration: number, maxIterations: number): void;
  onToolCall?(functionName: string): void;
}

export interface RunOptions {
  /** Cooperative cancellation */
  signal?: AbortSignal;
  observer?: ExecutionObserver;
}

export interface ExecuteOptions extends RunOptions {
  /** Use this id instead of generating one */
  workflowId?: string;
}

export interface ResumeOptions extends RunOptions {
  /** Resume even when the snapshot is incompatible or already completed */
  force?: boolean;
}

export interface ExecutionResult {
  success: boolean;
  workflowId: string;
  /** Content of the final assistant message; empty unless the run completed */
  finalOutput: string;
  errorMessage?: string;
  error?: WorkflowError;
  /** Wall-clock milliseconds spent in this call */
  duration: number;
  /** Model turns taken in this call */
  iterations: number;
  status: ExecutionState;
  /** Present on resume once the snapshot has been scored */
  compatibility?: CompatibilityResult;
}

type AbortCause = 'cancel' | 'timeout';

/**
 * Working state of one execute/resume call
 */
interface ActiveRun {
  workflowId: string;
  workflow: WorkflowSource;
  context: ExecutionContext;
  machine: ExecutionMachineContext;
  logger: Logger;
  controller: AbortController;
  abortCause: AbortCause | null;
  observer?: ExecutionObserver;
  /** Model turns in this call */
  iteration: number;
  /** Model turns across every attempt */
  totalIterations: number;
  toolIterations: number;
  startedMs: number;
  lastCheckpointAt?: string;
  compatibility?: CompatibilityResult;
}

interface ToolOutcome {
  call: FunctionCall;
  result: ToolResult;
  startedAt: string;
  endedAt: string;
}

/**
 * Orchestrator class - main entry point for running workflows
 */
export class Orchestrator {
  private readonly config: EffectiveConfig;
  private readonly deps: OrchestratorDependencies;
  private readonly conversations: ConversationStore;

  constructor(config: EffectiveConfig, deps: OrchestratorDependencies) {
    this.config = config;
    this.deps = deps;
    this.conversations = deps.conversations ?? new ConversationStore();
  }

  getConfig(): EffectiveConfig {
    return this.config;
  }

  /**
   * Start a fresh execution of a workflow
   */
  async execute(
    workflow: WorkflowSource,
    initialVariables: Record<string, JsonValue> = {},
    options: ExecuteOptions = {}
  ): Promise<ExecutionResult> {
    const { clock } = this.deps;
    const workflowId = options.workflowId ?? generateWorkflowId(workflow.name, clock.now());
    this.conversations.create(workflowId);
    const run = this.createRun(workflowId, workflow, createExecutionContext(clock.iso()), options);

    const variables: Record<string, JsonValue> = {
      ...workflow.schemaDefaults,
      ...workflow.defaults,
      ...initialVariables,
    };

    run.logger.event('run_started', `Starting workflow ${workflow.name}`, {
      workflowFile: workflow.filePath,
      variables: Object.keys(variables),
    });

    try {
      this.processEvent(run, { type: 'START_RENDER' });
      const renderedAt = clock.iso();

      for (const [key, value] of Object.entries(variables)) {
        setContextVariable(run.context, key, value, {
          timestamp: renderedAt,
          source: 'workflow_start',
          reasoning: 'Initial workflow variable',
        });
      }

      const rendered = renderTemplate(
        { template: workflow.template, requiredVariables: workflow.requiredVariables },
        variables
      );
      run.context.executionHistory.push({
        name: workflow.name,
        kind: 'render',
        startedAt: renderedAt,
        endedAt: clock.iso(),
        success: rendered.ok,
        ...(rendered.ok ? {} : { errorMessage: rendered.error.message }),
      });
      if (!rendered.ok) {
        return this.fail(run, createWorkflowError('TEMPLATE_ERROR', rendered.error.message), null);
      }

      this.processEvent(run, { type: 'RENDERED' });
      this.conversations.append(workflowId, createMessage('user', rendered.value, clock.iso()));
      await this.checkpoint(run, 'in_progress');

      return await this.runLoop(run);
    } finally {
      this.finishRun(run);
    }
  }

  /**
   * Continue a stored execution
   */
  async resume(workflowId: string, workflow: WorkflowSource, options: ResumeOptions = {}): Promise<ExecutionResult> {
    const { clock, logger, store } = this.deps;
    const startedMs = clock.timestamp();
    const earlyFailure = (error: WorkflowError, compatibility?: CompatibilityResult): ExecutionResult => {
      logger.event('run_failed', error.message, { workflowId, code: error.code });
      return {
        success: false,
        workflowId,
        finalOutput: '',
        errorMessage: error.message,
        error,
        duration: clock.timestamp() - startedMs,
        iterations: 0,
        status: 'FAILED',
        ...(compatibility ? { compatibility } : {}),
      };
    };

    const loaded = await store.load(workflowId);
    if (!loaded.ok) {
      return earlyFailure(loaded.error);
    }
    const snapshot = loaded.value;
    if (!snapshot) {
      return earlyFailure(
        createWorkflowError('NO_RESUME_STATE', `No resume state found for workflow: ${workflowId}`, {
          workflowId,
        })
      );
    }
    if (snapshot.status === 'completed' && !options.force) {
      return earlyFailure(
        createWorkflowError(
          'NO_RESUME_STATE',
          `Workflow ${workflowId} already completed; use --force to run it again`,
          { workflowId }
        )
      );
    }

    const compatibility = validateCompatibility(
      snapshot,
      workflow.content,
      this.deps.tools.names(),
      this.config.compatibility
    );
    logger.event('compatibility_checked', `Compatibility score ${compatibility.score.toFixed(2)}`, {
      workflowId,
      canResume: compatibility.canResume,
      score: compatibility.score,
      similarity: compatibility.similarity,
      missingTools: compatibility.missingTools,
    });
    for (const warning of compatibility.warnings) {
      logger.warn(warning, { workflowId });
    }

    if (!compatibility.canResume && !options.force) {
      return earlyFailure(
        createWorkflowError(
          'RESUME_INCOMPATIBLE',
          `Workflow ${workflowId} cannot be resumed: compatibility score ${compatibility.score.toFixed(
            2
          )} is below ${this.config.compatibility.resumeThreshold}`,
          { workflowId, lastCheckpointAt: snapshot.lastActivity }
        ),
        compatibility
      );
    }

    if (this.conversations.has(workflowId)) {
      throw new Error(`Workflow ${workflowId} is already running`);
    }

    const { context, history } = fromSnapshot(snapshot);
    const run = this.createRun(workflowId, workflow, context, options);
    run.startedMs = startedMs;
    run.totalIterations = snapshot.iterationCount;
    run.lastCheckpointAt = snapshot.lastActivity;
    run.compatibility = compatibility;

    this.conversations.replace(workflowId, history);
    try {
      this.processEvent(run, { type: 'RESUMED', workflowId });
      run.logger.event('run_resumed', `Resuming workflow ${workflow.name}`, {
        previousStatus: snapshot.status,
        completedTools: snapshot.completedTools.length,
        messages: snapshot.chatHistory.length,
        forced: Boolean(options.force),
      });

      this.conversations.append(workflowId, createResumeMessage(snapshot, clock.iso()));
      await this.checkpoint(run, 'in_progress');

      return await this.runLoop(run);
    } finally {
      this.finishRun(run);
    }
  }

  /**
   * Static checks of a workflow against the registry; never calls the model
   */
  validate(workflow: WorkflowSource): WorkflowValidationResult {
    return validateWorkflow(workflow, this.deps.tools);
  }

  // ===========================================================================
  // Run lifecycle
  // ===========================================================================

  private createRun(
    workflowId: string,
    workflow: WorkflowSource,
    context: ExecutionContext,
    options: RunOptions
  ): ActiveRun {
    const { clock } = this.deps;
    const controller = new AbortController();
    const run: ActiveRun = {
      workflowId,
      workflow,
      context,
      machine: createInitialContext(clock.iso()),
      logger: this.deps.logger.child({ workflowId }),
      controller,
      abortCause: null,
      observer: options.observer,
      iteration: 0,
      totalIterations: 0,
      toolIterations: 0,
      startedMs: clock.timestamp(),
    };

    const external = options.signal;
    if (external) {
      const onAbort = (): void => this.abortRun(run, 'cancel');
      if (external.aborted) {
        onAbort();
      } else {
        external.addEventListener('abort', onAbort, { once: true });
        controller.signal.addEventListener('abort', () => external.removeEventListener('abort', onAbort), {
          once: true,
        });
      }
    }

    const { timeoutMs } = this.config.limits;
    if (timeoutMs > 0) {
      const timer = setTimeout(() => this.abortRun(run, 'timeout'), timeoutMs);
      timer.unref();
      controller.signal.addEventListener('abort', () => clearTimeout(timer), { once: true });
    }

    return run;
  }

  private abortRun(run: ActiveRun, cause: AbortCause): void {
    if (run.controller.signal.aborted) {
      return;
    }
    run.abortCause = cause;
    run.controller.abort();
  }

  /**
   * Release the timer and listeners and drop the working transcript
   */
  private finishRun(run: ActiveRun): void {
    if (!run.controller.signal.aborted) {
      run.controller.abort();
    }
    this.conversations.remove(run.workflowId);
  }

  private processEvent(run: ActiveRun, event: ExecutionEvent): TransitionResult {
    const result = transition(run.machine, event, this.deps.clock.iso());

    if (result.valid) {
      run.machine = result.context;
      run.logger.event('state_changed', result.description, {
        fromState: result.previousState,
        toState: result.newState,
        eventType: event.type,
        state: result.newState,
      });
      run.observer?.onStateChange?.(result.newState, result.description);
    } else {
      run.logger.warn(`Invalid transition: ${result.description}`, {
        state: run.machine.currentState,
        eventType: event.type,
      });
    }

    return result;
  }

  // ===========================================================================
  // Loop
  // ===========================================================================

  private async runLoop(run: ActiveRun): Promise<ExecutionResult> {
    const { clock, chatClient, tools } = this.deps;
    const { limits } = this.config;
    const definitions = tools.definitions(run.workflow.declaredTools);
    const settings = this.executionSettings();

    for (;;) {
      if (run.controller.signal.aborted) {
        return this.stopOnAbort(run);
      }

      const timeout = checkTimeout(limits, clock.timestamp() - run.startedMs);
      if (timeout.shouldStop) {
        this.abortRun(run, 'timeout');
        return this.stopOnAbort(run);
      }

      const limit = checkIterationLimit(limits, run.iteration);
      if (limit.shouldStop) {
        run.logger.event('limit_exceeded', limit.message, {
          iteration: run.iteration,
          nextSteps: limit.nextSteps,
        });
        return this.fail(run, createWorkflowError('MAX_ITERATIONS_EXCEEDED', limit.message), 'failed');
      }

      run.iteration += 1;
      run.totalIterations += 1;
      run.logger.event('iteration_started', `Iteration ${run.iteration}/${limits.maxIterations}`, {
        iteration: run.iteration,
      });
      run.observer?.onIteration?.(run.iteration, limits.maxIterations);

      const requestedAt = clock.iso();
      run.logger.event('model_request_started', 'Requesting model completion', {
        iteration: run.iteration,
        messages: this.conversations.get(run.workflowId).length,
        tools: definitions.map((tool) => tool.name),
      });
      const response = await chatClient.complete({
        messages: this.conversations.get(run.workflowId),
        tools: definitions,
        settings,
        signal: run.controller.signal,
      });

      if (run.controller.signal.aborted) {
        return this.stopOnAbort(run);
      }

      if (!response.ok) {
        const modelError = response.error;
        run.context.executionHistory.push({
          name: 'model',
          kind: 'model',
          startedAt: requestedAt,
          endedAt: clock.iso(),
          success: false,
          errorMessage: modelError.message,
        });
        run.logger.event('model_request_failed', modelError.message, {
          iteration: run.iteration,
          kind: modelError.kind,
          status: modelError.status,
        });
        return this.fail(
          run,
          createWorkflowError('MODEL_INTERFACE_ERROR', `Model request failed (${modelError.kind}): ${modelError.message}`, {
            modelErrorKind: modelError.kind,
            cause: modelError.cause,
          }),
          'failed'
        );
      }

      const completion = response.value;
      const message: ChatMessage = { ...completion.message, timestamp: clock.iso() };
      const calls = message.functionCalls ?? [];
      run.context.executionHistory.push({
        name: 'model',
        kind: 'model',
        startedAt: requestedAt,
        endedAt: message.timestamp,
        success: true,
      });
      run.logger.event('model_request_completed', `Model returned ${calls.length} tool call(s)`, {
        iteration: run.iteration,
        finishReason: completion.finishReason,
        usage: completion.usage,
      });

      if (calls.length === 0) {
        this.conversations.append(run.workflowId, message);
        return this.complete(run, message.content ?? '');
      }

      this.processEvent(run, { type: 'TOOL_CALLS_RECEIVED', count: calls.length });
      const outcomes = await this.invokeTools(run, calls, completion.parallelToolCalls);

      // Results that arrive after an abort never reach the transcript
      if (run.controller.signal.aborted) {
        run.logger.debug(`Discarded ${outcomes.length} tool result(s) after abort`);
        return this.stopOnAbort(run);
      }

      this.conversations.appendAll(run.workflowId, [
        message,
        ...outcomes.map((outcome) => this.recordOutcome(run, outcome, message.content)),
      ]);

      const failed = outcomes.filter((outcome) => !outcome.result.success).length;
      this.processEvent(run, { type: 'TOOLS_COMPLETED', succeeded: outcomes.length - failed, failed });
      run.logger.event('iteration_completed', `Iteration ${run.iteration} finished`, {
        iteration: run.iteration,
        succeeded: outcomes.length - failed,
        failed,
      });

      run.toolIterations += 1;
      if (run.toolIterations % this.config.resume.checkpointFrequency === 0) {
        await this.checkpoint(run, 'in_progress');
      }
    }
  }

  private executionSettings(): ExecutionSettings {
    const { model } = this.config;
    return { model: model.name, maxTokens: model.maxTokens, temperature: model.temperature };
  }

  /**
   * Run the calls of one assistant turn; outcomes come back in request order
   */
  private async invokeTools(run: ActiveRun, calls: FunctionCall[], parallel: boolean): Promise<ToolOutcome[]> {
    if (parallel && calls.length > 1) {
      return Promise.all(calls.map((call) => this.invokeTool(run, call)));
    }

    const outcomes: ToolOutcome[] = [];
    for (const call of calls) {
      if (run.controller.signal.aborted) {
        break;
      }
      outcomes.push(await this.invokeTool(run, call));
    }
    return outcomes;
  }

  private async invokeTool(run: ActiveRun, call: FunctionCall): Promise<ToolOutcome> {
    const { clock, tools } = this.deps;
    const startedAt = clock.iso();
    const metadata = { iteration: run.iteration, tool: call.functionName, callId: call.callId };

    if (!run.workflow.declaredTools.includes(call.functionName)) {
      const error = `Tool "${call.functionName}" is not allowed by this workflow`;
      run.logger.event('tool_rejected', error, metadata);
      return { call, result: { success: false, error }, startedAt, endedAt: startedAt };
    }

    if (call.argumentsError !== undefined) {
      run.logger.event('tool_rejected', call.argumentsError, metadata);
      return { call, result: { success: false, error: call.argumentsError }, startedAt, endedAt: startedAt };
    }

    run.logger.event('tool_invocation_started', `Invoking ${call.functionName}`, metadata);
    run.observer?.onToolCall?.(call.functionName);

    let result: ToolResult;
    try {
      result = await tools.invoke(call.functionName, call.parameters, run.controller.signal);
    } catch (error) {
      result = { success: false, error: error instanceof Error ? error.message : String(error) };
    }

    if (result.success) {
      run.logger.event('tool_invocation_completed', `${call.functionName} succeeded`, metadata);
    } else {
      run.logger.event('tool_invocation_failed', `${call.functionName} failed: ${result.error ?? 'unknown error'}`, metadata);
    }
    return { call, result, startedAt, endedAt: clock.iso() };
  }

  /**
   * Fold one tool outcome into the execution context; returns the
   * tool-role message for the transcript
   */
  private recordOutcome(run: ActiveRun, outcome: ToolOutcome, reasoning: string | null): ChatMessage {
    const { call, result } = outcome;
    const text = result.success ? result.output ?? '' : `Error: ${result.error ?? 'Tool execution failed'}`;

    const completed: CompletedTool = {
      functionName: call.functionName,
      parameters: call.parameters,
      result: result.success ? result.output ?? null : result.error ?? 'Tool execution failed',
      executedAt: outcome.endedAt,
      success: result.success,
      reasoning,
    };
    run.context.completedTools.push(completed);
    run.context.executionHistory.push({
      name: call.functionName,
      kind: 'tool',
      startedAt: outcome.startedAt,
      endedAt: outcome.endedAt,
      success: result.success,
      ...(result.success || completed.result === null ? {} : { errorMessage: completed.result }),
    });

    if (result.success && result.context) {
      for (const [key, value] of Object.entries(result.context)) {
        setContextVariable(run.context, key, value, {
          timestamp: outcome.endedAt,
          source: call.functionName,
          reasoning: `Set by ${call.functionName}`,
        });
      }
    }

    return createMessage('tool', text, outcome.endedAt, {
      toolCallId: call.callId,
      functionName: call.functionName,
    });
  }

  // ===========================================================================
  // Outcomes
  // ===========================================================================

  private async checkpoint(run: ActiveRun, status: SnapshotStatus): Promise<void> {
    const { clock, store, tools } = this.deps;
    const now = clock.now();
    const snapshot = toSnapshot(
      run.context,
      this.conversations.get(run.workflowId),
      {
        workflowId: run.workflowId,
        workflowFilePath: run.workflow.filePath,
        workflowContent: run.workflow.content,
        availableTools: run.workflow.declaredTools.filter((name) => tools.has(name)),
        status,
        iterationCount: run.totalIterations,
        now,
      },
      { pruning: this.config.pruning }
    );

    const saved = await store.save(snapshot);
    if (saved.ok) {
      run.lastCheckpointAt = snapshot.lastActivity;
      this.conversations.markFlushed(run.workflowId);
    } else {
      run.logger.event('checkpoint_failed', `Checkpoint failed: ${saved.error.message}`, {
        iteration: run.iteration,
        status,
      });
    }
  }

  private async complete(run: ActiveRun, finalOutput: string): Promise<ExecutionResult> {
    this.processEvent(run, { type: 'FINAL_ANSWER' });
    await this.checkpoint(run, 'completed');

    const duration = this.deps.clock.timestamp() - run.startedMs;
    run.logger.event('run_completed', `Workflow completed in ${run.iteration} iteration(s)`, {
      iteration: run.iteration,
      duration,
      toolCalls: run.machine.toolCallCount,
    });

    return {
      success: true,
      workflowId: run.workflowId,
      finalOutput,
      duration,
      iterations: run.iteration,
      status: run.machine.currentState,
      ...(run.compatibility ? { compatibility: run.compatibility } : {}),
    };
  }

  private async stopOnAbort(run: ActiveRun): Promise<ExecutionResult> {
    if (run.abortCause === 'timeout') {
      return this.fail(
        run,
        createWorkflowError('TIMEOUT', `Timed out after ${this.config.limits.timeoutMs}ms`),
        'failed'
      );
    }

    this.processEvent(run, { type: 'CANCEL' });
    await this.checkpoint(run, 'cancelled');
    return this.failureResult(run, this.withRunDetails(run, 'CANCELLED', 'Execution cancelled'));
  }

  /**
   * Move to FAILED; `checkpointStatus` null skips the final checkpoint
   */
  private async fail(
    run: ActiveRun,
    error: WorkflowError,
    checkpointStatus: SnapshotStatus | null
  ): Promise<ExecutionResult> {
    if (checkpointStatus) {
      await this.checkpoint(run, checkpointStatus);
    }
    const detailed = this.withRunDetails(run, error.code, error.message, error);
    this.processEvent(run, { type: 'ERROR', error: detailed });
    return this.failureResult(run, detailed);
  }

  private withRunDetails(
    run: ActiveRun,
    code: WorkflowErrorCode,
    message: string,
    base?: WorkflowError
  ): WorkflowError {
    return createWorkflowError(code, message, {
      workflowId: run.workflowId,
      iteration: run.iteration,
      lastCheckpointAt: run.lastCheckpointAt,
      resumable: base?.resumable,
      modelErrorKind: base?.modelErrorKind,
      cause: base?.cause,
    });
  }

  private failureResult(run: ActiveRun, error: WorkflowError): ExecutionResult {
    const cancelled = run.machine.currentState === 'CANCELLED';
    run.logger.event(cancelled ? 'run_cancelled' : 'run_failed', error.message, {
      code: error.code,
      iteration: run.iteration,
      resumable: error.resumable,
    });

    return {
      success: false,
      workflowId: run.workflowId,
      finalOutput: '',
      errorMessage: error.message,
      error,
      duration: this.deps.clock.timestamp() - run.startedMs,
      iterations: run.iteration,
      status: run.machine.currentState,
      ...(run.compatibility ? { compatibility: run.compatibility } : {}),
    };
  }
}

/**
 * Factory function to create an Orchestrator
 */
export function createOrchestrator(config: EffectiveConfig, deps: OrchestratorDependencies): Orchestrator {
  return new Orchestrator(config, deps);
}
