/**
 * Progress observer
 * Feeds orchestrator progress into a spinner
 */

import { ExecutionObserver } from '../core/orchestrator';
import { Spinner } from './spinner-service';

export function createSpinnerObserver(spinner: Spinner, workflowName: string): ExecutionObserver {
  let turn = '';
  return {
    onIteration(iteration, maxIterations) {
      turn = `${iteration}/${maxIterations}`;
      spinner.setText(`${workflowName}: waiting for the model (turn ${turn})`);
    },
    onToolCall(functionName) {
      spinner.setText(`${workflowName}: running ${functionName} (turn ${turn})`);
    },
    onStateChange(state, description) {
      if (state === 'RENDERING') {
        spinner.setText(`${workflowName}: ${description}`);
      }
    },
  };
}
