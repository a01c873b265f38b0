/**
 * Workflow errors
 * Fatal execution outcomes carried as data
 */

import { ModelErrorKind } from './chat-client';

export type WorkflowErrorCode =
  | 'TEMPLATE_ERROR'
  | 'TOOL_INVOCATION_ERROR'
  | 'MODEL_INTERFACE_ERROR'
  | 'MAX_ITERATIONS_EXCEEDED'
  | 'TIMEOUT'
  | 'CANCELLED'
  | 'RESUME_INCOMPATIBLE'
  | 'SNAPSHOT_CORRUPT'
  | 'NO_RESUME_STATE'
  | 'STORAGE_ERROR';

export interface WorkflowError {
  code: WorkflowErrorCode;
  message: string;
  workflowId?: string;
  /** Loop iteration at which the error surfaced */
  iteration?: number;
  /** ISO 8601 of the last snapshot that was written */
  lastCheckpointAt?: string;
  /** Whether `resume` can continue this execution */
  resumable: boolean;
  modelErrorKind?: ModelErrorKind;
  cause?: Error;
}

const RESUMABLE_CODES: ReadonlySet<WorkflowErrorCode> = new Set([
  'MODEL_INTERFACE_ERROR',
  'MAX_ITERATIONS_EXCEEDED',
  'TIMEOUT',
  'CANCELLED',
]);

export function createWorkflowError(
  code: WorkflowErrorCode,
  message: string,
  details: Partial<Omit<WorkflowError, 'code' | 'message'>> = {}
): WorkflowError {
  return {
    code,
    message,
    resumable: details.resumable ?? RESUMABLE_CODES.has(code),
    ...stripUndefined(details),
  };
}

function stripUndefined(
  details: Partial<Omit<WorkflowError, 'code' | 'message'>>
): Partial<Omit<WorkflowError, 'code' | 'message'>> {
  const result: Partial<Omit<WorkflowError, 'code' | 'message'>> = {};
  if (details.workflowId !== undefined) result.workflowId = details.workflowId;
  if (details.iteration !== undefined) result.iteration = details.iteration;
  if (details.lastCheckpointAt !== undefined) result.lastCheckpointAt = details.lastCheckpointAt;
  if (details.resumable !== undefined) result.resumable = details.resumable;
  if (details.modelErrorKind !== undefined) result.modelErrorKind = details.modelErrorKind;
  if (details.cause !== undefined) result.cause = details.cause;
  return result;
}

/**
 * Render an error with a line saying whether, and how, it can be resumed
 */
export function formatWorkflowError(error: WorkflowError, workflowFile?: string): string {
  const command = `promptloop resume ${workflowFile ?? '<workflow-file>'} --workflow-id ${error.workflowId ?? '<id>'}`;
  let hint: string;
  if (error.resumable && error.lastCheckpointAt && error.workflowId) {
    hint = `A checkpoint from ${error.lastCheckpointAt} exists. Resume with: ${command}`;
  } else if (error.code === 'RESUME_INCOMPATIBLE' && error.workflowId) {
    // The snapshot is intact; only the workflow changed
    hint = `The checkpoint is kept. Resume anyway with: ${command} --force`;
  } else {
    hint = 'No resumable checkpoint exists.';
  }
  return `${error.message}\n${hint}`;
}
