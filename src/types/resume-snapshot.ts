/**
 * Resume snapshot types
 * The durable record of a paused or finished execution
 */

import { ChatHistory } from './chat';
import { JsonObject, JsonValue } from './json';

export type SnapshotStatus = 'in_progress' | 'completed' | 'failed' | 'cancelled';

/**
 * Record of one tool invocation; never mutated after creation
 */
export interface CompletedTool {
  readonly functionName: string;
  readonly parameters: JsonObject;
  /** Tool output, or the error text for failures */
  readonly result: string | null;
  /** ISO 8601 */
  readonly executedAt: string;
  readonly success: boolean;
  readonly reasoning: string | null;
}

/**
 * A single change to a context variable
 */
export interface ContextChange {
  timestamp: string;
  key: string;
  oldValue: JsonValue | null;
  newValue: JsonValue | null;
  /** Who made the change: workflow_start, a tool name, resume, ... */
  source: string;
  reasoning: string;
}

export interface ContextEvolution {
  /** Latest value for every key with a recorded change */
  currentContext: Record<string, JsonValue>;
  keyInsights: string[];
  changes: ContextChange[];
}

export interface ResumeSnapshot {
  workflowId: string;
  workflowFilePath: string;
  /** SHA-256 hex of originalWorkflowContent */
  originalWorkflowHash: string;
  originalWorkflowContent: string;
  completedTools: CompletedTool[];
  chatHistory: ChatHistory;
  contextEvolution: ContextEvolution;
  variables: Record<string, JsonValue>;
  currentPhase: string;
  currentStrategy: string;
  /** ISO 8601 */
  startTime: string;
  /** ISO 8601 of the last checkpoint */
  lastActivity: string;
  availableTools: string[];
  status: SnapshotStatus;
  /** Model turns taken so far, across all attempts */
  iterationCount: number;
}

/**
 * Catalog entry produced by listing stored snapshots
 */
export interface SnapshotSummary {
  workflowId: string;
  workflowFilePath: string;
  status: SnapshotStatus;
  startedAt: string;
  lastActivity: string;
  currentPhase: string;
  completedToolCount: number;
  messageCount: number;
  sizeBytes: number;
  compressed: boolean;
}

export function isResumableStatus(status: SnapshotStatus): boolean {
  return status !== 'completed';
}
