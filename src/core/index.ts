/**
 * Core module - orchestration logic and state machine
 * This module contains the central orchestration logic
 * and must not import from ui/ or touch the console directly.
 */

// State machine
export {
  VALID_TRANSITIONS,
  createInitialContext,
  isValidTransition,
  transition,
  getStateDescription,
  isTerminalState,
} from './state-machine';
export type { ExecutionState, ExecutionEvent, ExecutionMachineContext, TransitionResult } from './state-machine';

// Iteration policies
export { checkIterationLimit, checkTimeout } from './iteration-policy';
export type { StopReason, StopConditionResult } from './iteration-policy';

// Orchestrator
export { Orchestrator, createOrchestrator } from './orchestrator';
export type {
  OrchestratorDependencies,
  ExecutionObserver,
  RunOptions,
  ExecuteOptions,
  ResumeOptions,
  ExecutionResult,
} from './orchestrator';

// Static validation
export { validateWorkflow } from './workflow-validation';
export type { WorkflowValidationResult } from './workflow-validation';
