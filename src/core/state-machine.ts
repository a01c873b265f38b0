/**
 * Explicit State Machine for a workflow execution
 *
 * Models one execute/resume call as typed state transitions with a single
 * centralized location for all transition logic.
 */

import { WorkflowError } from '../types/workflow-error';

/**
 * All possible execution states
 */
export type ExecutionState =
  | 'CREATED'
  | 'RENDERING'
  | 'AWAITING_MODEL'
  | 'EXECUTING_TOOL'
  | 'COMPLETED'
  | 'FAILED'
  | 'CANCELLED';

/**
 * Events that trigger state transitions
 */
export type ExecutionEvent =
  | { type: 'START_RENDER' }
  | { type: 'RENDERED' }
  | { type: 'RESUMED'; workflowId: string }
  | { type: 'TOOL_CALLS_RECEIVED'; count: number }
  | { type: 'TOOLS_COMPLETED'; succeeded: number; failed: number }
  | { type: 'FINAL_ANSWER' }
  | { type: 'ERROR'; error: WorkflowError }
  | { type: 'CANCEL' };

/**
 * Context data maintained across state transitions
 */
export interface ExecutionMachineContext {
  /** Current state of the state machine */
  currentState: ExecutionState;
  /** Tool batches completed in this call */
  toolBatchCount: number;
  /** Tool calls completed in this call, successful or not */
  toolCallCount: number;
  /** Whether this call started from a snapshot */
  resumed: boolean;
  /** Last error that occurred */
  lastError?: WorkflowError;
  /** Timestamp when the call started */
  startedAt: string;
  /** Timestamp of last state change */
  lastTransitionAt: string;
}

/**
 * Result of a state transition
 */
export interface TransitionResult {
  /** The state before the event */
  previousState: ExecutionState;
  /** The new state after transition */
  newState: ExecutionState;
  /** Updated context */
  context: ExecutionMachineContext;
  /** Whether the transition was valid */
  valid: boolean;
  /** Human-readable description of what happened */
  description: string;
}

/**
 * Valid state transitions map
 * Key: current state, Value: array of valid next states
 */
export const VALID_TRANSITIONS: Readonly<Record<ExecutionState, readonly ExecutionState[]>> = {
  CREATED: ['RENDERING', 'AWAITING_MODEL', 'FAILED', 'CANCELLED'],
  RENDERING: ['AWAITING_MODEL', 'FAILED', 'CANCELLED'],
  AWAITING_MODEL: ['EXECUTING_TOOL', 'COMPLETED', 'FAILED', 'CANCELLED'],
  EXECUTING_TOOL: ['AWAITING_MODEL', 'FAILED', 'CANCELLED'],
  COMPLETED: [],
  FAILED: [],
  CANCELLED: [],
};

/**
 * Create initial context for a new execute/resume call
 */
export function createInitialContext(now: string = new Date().toISOString()): ExecutionMachineContext {
  return {
    currentState: 'CREATED',
    toolBatchCount: 0,
    toolCallCount: 0,
    resumed: false,
    startedAt: now,
    lastTransitionAt: now,
  };
}

/**
 * Check if a transition from one state to another is valid
 */
export function isValidTransition(from: ExecutionState, to: ExecutionState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * Process an event and return the resulting state transition
 */
export function transition(
  context: ExecutionMachineContext,
  event: ExecutionEvent,
  now: string = new Date().toISOString()
): TransitionResult {
  const { currentState } = context;
  let newState: ExecutionState | null = null;
  let newContext: ExecutionMachineContext = { ...context, lastTransitionAt: now };
  let description = '';

  switch (event.type) {
    case 'START_RENDER':
      if (currentState === 'CREATED') {
        newState = 'RENDERING';
        description = 'Rendering workflow template';
      }
      break;

    case 'RENDERED':
      if (currentState === 'RENDERING') {
        newState = 'AWAITING_MODEL';
        description = 'Template rendered, awaiting model';
      }
      break;

    case 'RESUMED':
      if (currentState === 'CREATED') {
        newState = 'AWAITING_MODEL';
        newContext = { ...newContext, resumed: true };
        description = `Resumed ${event.workflowId} from snapshot`;
      }
      break;

    case 'TOOL_CALLS_RECEIVED':
      if (currentState === 'AWAITING_MODEL') {
        newState = 'EXECUTING_TOOL';
        description = `Model requested ${event.count} tool call(s)`;
      }
      break;

    case 'TOOLS_COMPLETED':
      if (currentState === 'EXECUTING_TOOL') {
        newState = 'AWAITING_MODEL';
        newContext = {
          ...newContext,
          toolBatchCount: context.toolBatchCount + 1,
          toolCallCount: context.toolCallCount + event.succeeded + event.failed,
        };
        description = `Tool calls finished (${event.succeeded} succeeded, ${event.failed} failed)`;
      }
      break;

    case 'FINAL_ANSWER':
      if (currentState === 'AWAITING_MODEL') {
        newState = 'COMPLETED';
        description = 'Model returned a final answer';
      }
      break;

    case 'ERROR':
      if (!isTerminalState(currentState)) {
        newState = 'FAILED';
        newContext = { ...newContext, lastError: event.error };
        description = `Error: ${event.error.message}`;
      }
      break;

    case 'CANCEL':
      if (!isTerminalState(currentState)) {
        newState = 'CANCELLED';
        description = 'Execution cancelled';
      }
      break;
  }

  const valid = newState !== null && isValidTransition(currentState, newState);
  if (!valid || newState === null) {
    return {
      previousState: currentState,
      newState: currentState,
      context,
      valid: false,
      description: `Invalid transition from ${currentState} via ${event.type}`,
    };
  }

  return {
    previousState: currentState,
    newState,
    context: { ...newContext, currentState: newState },
    valid: true,
    description,
  };
}

/**
 * Get human-readable description of a state
 */
export function getStateDescription(state: ExecutionState): string {
  const descriptions: Record<ExecutionState, string> = {
    CREATED: 'Waiting to start',
    RENDERING: 'Rendering workflow template',
    AWAITING_MODEL: 'Waiting for the model',
    EXECUTING_TOOL: 'Running tool calls',
    COMPLETED: 'Workflow complete',
    FAILED: 'Workflow failed',
    CANCELLED: 'Workflow cancelled',
  };
  return descriptions[state];
}

/**
 * Check if the execution is in a terminal state
 */
export function isTerminalState(state: ExecutionState): boolean {
  return state === 'COMPLETED' || state === 'FAILED' || state === 'CANCELLED';
}
