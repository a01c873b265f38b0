/**
 * Resume State Codec
 *
 * Converts a live execution (context + transcript) into a bounded
 * ResumeSnapshot and back, and translates snapshots to and from the
 * on-disk file layout. toSnapshot is deterministic given the same inputs
 * and `metadata.now`.
 */

import { ChatHistory, ChatMessage, FunctionCall } from '../types/chat';
import { ExecutionContext, HistoryEntry } from '../types/execution-context';
import { JsonValue } from '../types/json';
import {
  CompletedTool,
  ContextChange,
  ResumeSnapshot,
  SnapshotStatus,
} from '../types/resume-snapshot';
import { PruningConfig, DEFAULT_PRUNING } from '../types/effective-config';
import {
  ResumeFile,
  ResumeFileMessage,
  RESUME_FILE_SCHEMA_VERSION,
} from '../schemas/resume-file.schema';
import { parseResumeFile, ValidationResult } from '../schemas/validators';
import { ImportanceScorer, defaultImportanceScorer, isImportantChange } from './importance-scorer';
import { determinePhase, extractStrategy, extractKeyInsights } from './resume-heuristics';
import { hashWorkflowContent } from './content-hash';

export interface SnapshotMetadata {
  workflowId: string;
  workflowFilePath: string;
  workflowContent: string;
  availableTools: readonly string[];
  status: SnapshotStatus;
  iterationCount: number;
  /** Checkpoint time; also the reference point for recency scoring */
  now: Date;
}

export interface CodecOptions {
  pruning?: PruningConfig;
  scorer?: ImportanceScorer;
}

export interface RehydratedExecution {
  context: ExecutionContext;
  history: ChatHistory;
}

// =============================================================================
// Pruning
// =============================================================================

/**
 * Drop the oldest failed calls first, then the oldest successful ones
 */
export function pruneCompletedTools(tools: readonly CompletedTool[], max: number): CompletedTool[] {
  let excess = tools.length - max;
  if (excess <= 0) {
    return [...tools];
  }

  const dropped = new Set<number>();
  for (const successPass of [false, true]) {
    tools.forEach((tool, index) => {
      if (excess > 0 && tool.success === successPass) {
        dropped.add(index);
        excess -= 1;
      }
    });
  }

  return tools.filter((_, index) => !dropped.has(index));
}

/**
 * Insight lines standing in for messages that fall out of the window
 */
export function condenseMessages(dropped: ChatHistory): string[] {
  if (dropped.length === 0) {
    return [];
  }
  const toolNames = new Set<string>();
  for (const message of dropped) {
    for (const call of message.functionCalls ?? []) {
      toolNames.add(call.functionName);
    }
  }
  const tools = toolNames.size > 0 ? Array.from(toolNames).join(', ') : 'none';
  return [
    ...extractKeyInsights(dropped),
    `Condensed ${dropped.length} earlier messages; tools used: ${tools}`,
  ];
}

/**
 * Keep the highest-scoring variables, preserving their original order
 */
export function pruneVariables(
  variables: ReadonlyMap<string, JsonValue>,
  changes: readonly ContextChange[],
  max: number,
  now: Date,
  scorer: ImportanceScorer = defaultImportanceScorer
): Record<string, JsonValue> {
  const lastChanged = new Map<string, string>();
  for (const change of changes) {
    lastChanged.set(change.key, change.timestamp);
  }

  const ranked = Array.from(variables.entries()).map(([key, value], index) => ({
    key,
    value,
    index,
    score: scorer.score({ key, value, lastChangedAt: lastChanged.get(key), now }),
  }));

  const kept =
    ranked.length <= max
      ? ranked
      : [...ranked]
          .sort((a, b) => b.score - a.score || a.index - b.index)
          .slice(0, max)
          .sort((a, b) => a.index - b.index);

  const result: Record<string, JsonValue> = {};
  for (const entry of kept) {
    result[entry.key] = entry.value;
  }
  return result;
}

/**
 * Important changes first, remaining slots filled with the most recent
 * others; output stays chronological
 */
export function pruneContextChanges(
  changes: readonly ContextChange[],
  max: number,
  now: Date
): ContextChange[] {
  if (changes.length <= max) {
    return [...changes];
  }

  const indexed = changes.map((change, index) => ({ change, index }));
  const important = indexed.filter((entry) => isImportantChange(entry.change, now));
  const others = indexed.filter((entry) => !isImportantChange(entry.change, now));

  const selected =
    important.length >= max
      ? important.slice(-max)
      : [...important, ...others.slice(-(max - important.length))];

  return selected.sort((a, b) => a.index - b.index).map((entry) => entry.change);
}

/**
 * Distinct insights, most recent `max`
 */
export function pruneInsights(insights: readonly string[], max: number): string[] {
  return Array.from(new Set(insights)).slice(-max);
}

// =============================================================================
// Snapshot <-> live execution
// =============================================================================

export function toSnapshot(
  context: ExecutionContext,
  history: ChatHistory,
  metadata: SnapshotMetadata,
  options: CodecOptions = {}
): ResumeSnapshot {
  const pruning = options.pruning ?? DEFAULT_PRUNING;
  const now = metadata.now;

  const droppedCount = Math.max(0, history.length - pruning.maxChatHistory);
  const dropped = history.slice(0, droppedCount);
  const kept = history.slice(droppedCount);

  const insights = pruneInsights(
    [...context.keyInsights, ...condenseMessages(dropped), ...extractKeyInsights(kept)],
    pruning.maxKeyInsights
  );

  const successfulTools = context.completedTools.filter((tool) => tool.success).length;
  const variables = pruneVariables(
    context.variables,
    context.contextChanges,
    pruning.maxContextVariables,
    now,
    options.scorer
  );

  return {
    workflowId: metadata.workflowId,
    workflowFilePath: metadata.workflowFilePath,
    originalWorkflowHash: hashWorkflowContent(metadata.workflowContent),
    originalWorkflowContent: metadata.workflowContent,
    completedTools: pruneCompletedTools(context.completedTools, pruning.maxCompletedTools),
    chatHistory: kept.map(cloneMessage),
    contextEvolution: {
      // Same bound as `variables`; the change log may already be pruned
      currentContext: { ...variables },
      keyInsights: insights,
      changes: pruneContextChanges(context.contextChanges, pruning.maxContextChanges, now),
    },
    variables,
    currentPhase: determinePhase(context.variables, history, successfulTools),
    currentStrategy: extractStrategy(history),
    startTime: context.startTime,
    lastActivity: now.toISOString(),
    availableTools: [...metadata.availableTools],
    status: metadata.status,
    iterationCount: metadata.iterationCount,
  };
}

export function fromSnapshot(snapshot: ResumeSnapshot): RehydratedExecution {
  const executionHistory = snapshot.completedTools.map(
    (tool): HistoryEntry => ({
      name: tool.functionName,
      kind: 'tool',
      startedAt: tool.executedAt,
      endedAt: tool.executedAt,
      success: tool.success,
      ...(tool.success || tool.result === null ? {} : { errorMessage: tool.result }),
    })
  );

  return {
    context: {
      // Approximation: one step per recorded change
      currentStep: snapshot.contextEvolution.changes.length,
      variables: new Map(Object.entries(snapshot.variables)),
      executionHistory,
      startTime: snapshot.startTime,
      completedTools: [...snapshot.completedTools],
      contextChanges: [...snapshot.contextEvolution.changes],
      keyInsights: [...snapshot.contextEvolution.keyInsights],
    },
    history: snapshot.chatHistory.map(cloneMessage),
  };
}

function cloneMessage(message: ChatMessage): ChatMessage {
  return {
    ...message,
    ...(message.functionCalls
      ? { functionCalls: message.functionCalls.map((call) => ({ ...call })) }
      : {}),
  };
}

// =============================================================================
// Snapshot <-> file layout
// =============================================================================

export function encodeResumeFile(snapshot: ResumeSnapshot): ResumeFile {
  return {
    workflow_metadata: {
      schema_version: RESUME_FILE_SCHEMA_VERSION,
      id: snapshot.workflowId,
      file_path: snapshot.workflowFilePath,
      workflow_hash: snapshot.originalWorkflowHash,
      original_content: snapshot.originalWorkflowContent,
      started_at: snapshot.startTime,
      last_checkpoint: snapshot.lastActivity,
      status: snapshot.status,
      current_phase: snapshot.currentPhase,
      current_strategy: snapshot.currentStrategy,
      available_tools: snapshot.availableTools,
      iteration_count: snapshot.iterationCount,
    },
    completed_tools: snapshot.completedTools.map((tool) => ({
      function_name: tool.functionName,
      parameters: tool.parameters,
      result: tool.result,
      executed_at: tool.executedAt,
      success: tool.success,
      ai_reasoning: tool.reasoning,
    })),
    chat_history: snapshot.chatHistory.map(encodeMessage),
    context_evolution: {
      current_context: snapshot.contextEvolution.currentContext,
      key_insights: snapshot.contextEvolution.keyInsights,
      changes: snapshot.contextEvolution.changes.map((change) => ({
        timestamp: change.timestamp,
        key: change.key,
        old_value: change.oldValue,
        new_value: change.newValue,
        source: change.source,
        reasoning: change.reasoning,
      })),
    },
    workflow_variables: snapshot.variables,
  };
}

function encodeMessage(message: ChatMessage): ResumeFileMessage {
  const encoded: ResumeFileMessage = {
    role: message.role,
    content: message.content,
    timestamp: message.timestamp,
  };
  if (message.toolCallId !== undefined) encoded.tool_call_id = message.toolCallId;
  if (message.functionName !== undefined) encoded.function_name = message.functionName;
  if (message.functionCalls !== undefined) {
    encoded.function_calls = message.functionCalls.map((call) => ({
      function_name: call.functionName,
      parameters: call.parameters,
      call_id: call.callId,
    }));
  }
  return encoded;
}

function decodeMessage(message: ResumeFileMessage): ChatMessage {
  const decoded: ChatMessage = {
    role: message.role,
    content: message.content,
    timestamp: message.timestamp,
  };
  if (message.tool_call_id !== undefined) decoded.toolCallId = message.tool_call_id;
  if (message.function_name !== undefined) decoded.functionName = message.function_name;
  if (message.function_calls !== undefined) {
    decoded.functionCalls = message.function_calls.map(
      (call): FunctionCall => ({
        callId: call.call_id,
        functionName: call.function_name,
        parameters: call.parameters,
      })
    );
  }
  return decoded;
}

export function decodeResumeFileObject(file: ResumeFile): ResumeSnapshot {
  const metadata = file.workflow_metadata;
  return {
    workflowId: metadata.id,
    workflowFilePath: metadata.file_path,
    originalWorkflowHash: metadata.workflow_hash,
    originalWorkflowContent: metadata.original_content,
    completedTools: file.completed_tools.map((tool) => ({
      functionName: tool.function_name,
      parameters: tool.parameters,
      result: tool.result,
      executedAt: tool.executed_at,
      success: tool.success,
      reasoning: tool.ai_reasoning,
    })),
    chatHistory: file.chat_history.map(decodeMessage),
    contextEvolution: {
      currentContext: file.context_evolution.current_context,
      keyInsights: file.context_evolution.key_insights,
      changes: file.context_evolution.changes.map((change) => ({
        timestamp: change.timestamp,
        key: change.key,
        oldValue: change.old_value,
        newValue: change.new_value,
        source: change.source,
        reasoning: change.reasoning,
      })),
    },
    variables: file.workflow_variables,
    currentPhase: metadata.current_phase,
    currentStrategy: metadata.current_strategy,
    startTime: metadata.started_at,
    lastActivity: metadata.last_checkpoint,
    availableTools: metadata.available_tools,
    status: metadata.status,
    iterationCount: metadata.iteration_count,
  };
}

/**
 * Serialize a snapshot to the JSON file text
 */
export function serializeSnapshot(snapshot: ResumeSnapshot): string {
  return JSON.stringify(encodeResumeFile(snapshot), null, 2);
}

/**
 * Parse and validate snapshot file text
 */
export function deserializeSnapshot(json: string): ValidationResult<ResumeSnapshot> {
  const parsed = parseResumeFile(json);
  if (!parsed.success || !parsed.data) {
    return { success: false, errors: parsed.errors ?? ['Invalid snapshot file'] };
  }
  return { success: true, data: decodeResumeFileObject(parsed.data) };
}
