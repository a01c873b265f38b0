/**
 * Execution context
 * Mutable working state of one execution; the codec turns it into a
 * ResumeSnapshot at every checkpoint
 */

import { JsonValue } from './json';
import { CompletedTool, ContextChange } from './resume-snapshot';

export interface HistoryEntry {
  name: string;
  kind: 'render' | 'model' | 'tool';
  startedAt: string;
  endedAt: string;
  success: boolean;
  errorMessage?: string;
}

export interface ExecutionContext {
  /** Number of variable changes applied so far */
  currentStep: number;
  /** Insertion-ordered variables */
  variables: Map<string, JsonValue>;
  executionHistory: HistoryEntry[];
  /** ISO 8601 */
  startTime: string;
  completedTools: CompletedTool[];
  contextChanges: ContextChange[];
  keyInsights: string[];
}

export function createExecutionContext(startTime: string): ExecutionContext {
  return {
    currentStep: 0,
    variables: new Map(),
    executionHistory: [],
    startTime,
    completedTools: [],
    contextChanges: [],
    keyInsights: [],
  };
}

/**
 * Set a variable and record the change
 */
export function setContextVariable(
  context: ExecutionContext,
  key: string,
  value: JsonValue,
  change: { timestamp: string; source: string; reasoning: string }
): void {
  const oldValue = context.variables.get(key) ?? null;
  context.variables.set(key, value);
  context.contextChanges.push({
    timestamp: change.timestamp,
    key,
    oldValue,
    newValue: value,
    source: change.source,
    reasoning: change.reasoning,
  });
  context.currentStep += 1;
}
