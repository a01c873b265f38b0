/**
 * Iteration Policies
 *
 * Centralizes the stop conditions of the tool-calling loop.
 * Always produces clear outcomes when limits are reached.
 */

import { ExecutionLimits } from '../types/effective-config';

/**
 * Stop condition outcomes
 */
export type StopReason = 'LIMIT_REACHED' | 'TIMEOUT' | 'USER_CANCELLED';

/**
 * Result of checking a stop condition
 */
export interface StopConditionResult {
  /** Whether to stop */
  shouldStop: boolean;
  /** Reason for stopping (if shouldStop is true) */
  reason?: StopReason;
  /** Human-readable message explaining the decision */
  message: string;
  /** Suggested next steps for the user */
  nextSteps?: string[];
}

/**
 * Check whether another model turn is allowed; `iteration` counts the
 * turns already taken in this execute/resume call
 */
export function checkIterationLimit(limits: ExecutionLimits, iteration: number): StopConditionResult {
  const { maxIterations } = limits;

  if (iteration >= maxIterations) {
    return {
      shouldStop: true,
      reason: 'LIMIT_REACHED',
      message: `Reached maximum iterations (${maxIterations})`,
      nextSteps: [
        'Resume with `promptloop resume` to continue where you left off',
        'Increase --max-iterations to allow more model turns',
      ],
    };
  }

  return {
    shouldStop: false,
    message: `Continuing (${iteration + 1}/${maxIterations})`,
  };
}

/**
 * Check the overall wall-clock budget; a timeout of 0 never expires
 */
export function checkTimeout(limits: ExecutionLimits, elapsedMs: number): StopConditionResult {
  const { timeoutMs } = limits;

  if (timeoutMs > 0 && elapsedMs >= timeoutMs) {
    return {
      shouldStop: true,
      reason: 'TIMEOUT',
      message: `Timed out after ${timeoutMs}ms`,
      nextSteps: [
        'Resume with `promptloop resume` to continue where you left off',
        'Increase --timeout to allow a longer run',
      ],
    };
  }

  return {
    shouldStop: false,
    message: timeoutMs > 0 ? `${timeoutMs - elapsedMs}ms remaining` : 'No timeout',
  };
}
