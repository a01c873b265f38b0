/**
 * Builders for execution contexts, transcripts and snapshots
 */

import { ChatMessage } from '../../src/types/chat';
import { CompletedTool, ContextChange, ResumeSnapshot } from '../../src/types/resume-snapshot';
import { ExecutionContext, createExecutionContext } from '../../src/types/execution-context';
import { JsonObject, JsonValue } from '../../src/types/json';
import { EffectiveConfig, DEFAULT_CONFIG } from '../../src/types/effective-config';
import { WorkflowSource } from '../../src/types/workflow';
import { hashWorkflowContent } from '../../src/resume/content-hash';

export const BASE_TIME = new Date('2025-01-01T00:00:00.000Z');

/**
 * ISO timestamp `seconds` after BASE_TIME
 */
export function at(seconds: number): string {
  return new Date(BASE_TIME.getTime() + seconds * 1000).toISOString();
}

export function userMessage(content: string, seconds = 0): ChatMessage {
  return { role: 'user', content, timestamp: at(seconds) };
}

export function assistantMessage(content: string | null, seconds = 0): ChatMessage {
  return { role: 'assistant', content, timestamp: at(seconds) };
}

export function completedTool(
  functionName: string,
  success = true,
  parameters: JsonObject = {},
  seconds = 0
): CompletedTool {
  return {
    functionName,
    parameters,
    result: success ? `${functionName} ok` : `ERROR: ${functionName} failed`,
    executedAt: at(seconds),
    success,
    reasoning: success ? null : 'Tool execution failed',
  };
}

export function contextChange(
  key: string,
  newValue: JsonValue,
  source = 'file-read',
  seconds = 0,
  reasoning = 'Tool output'
): ContextChange {
  return { timestamp: at(seconds), key, oldValue: null, newValue, source, reasoning };
}

export function buildContext(overrides: Partial<ExecutionContext> = {}): ExecutionContext {
  return { ...createExecutionContext(BASE_TIME.toISOString()), ...overrides };
}

export function buildSnapshot(overrides: Partial<ResumeSnapshot> = {}): ResumeSnapshot {
  const content = overrides.originalWorkflowContent ?? 'Summarize {{topic}}';
  return {
    workflowId: 'workflow_demo_20250101_000000_0000abcd',
    workflowFilePath: '/work/demo.prompt.md',
    originalWorkflowHash: hashWorkflowContent(content),
    originalWorkflowContent: content,
    completedTools: [],
    chatHistory: [userMessage('Summarize tests')],
    contextEvolution: { currentContext: {}, keyInsights: [], changes: [] },
    variables: { topic: 'tests' },
    currentPhase: 'understanding',
    currentStrategy: 'Comprehensive analysis and problem-solving approach',
    startTime: BASE_TIME.toISOString(),
    lastActivity: at(60),
    availableTools: ['file-read', 'file-write'],
    status: 'in_progress',
    iterationCount: 1,
    ...overrides,
  };
}

export function buildWorkflow(overrides: Partial<WorkflowSource> = {}): WorkflowSource {
  return {
    name: 'notes',
    filePath: '/work/notes.prompt.md',
    content: '---\ntools: [file-read, file-list]\n---\nSummarize {{topic}} in {{path}}\n',
    template: 'Summarize {{topic}} in {{path}}',
    declaredTools: ['file-read', 'file-list'],
    defaults: { topic: 'tests' },
    schemaDefaults: {},
    requiredVariables: [],
    settings: {},
    ...overrides,
  };
}

/**
 * Effective config with defaults; sections are replaced wholesale
 */
export function buildConfig(overrides: Partial<EffectiveConfig> = {}): EffectiveConfig {
  return {
    ...DEFAULT_CONFIG,
    resume: { ...DEFAULT_CONFIG.resume, storageDirectory: '/work/.promptloop/resume' },
    paths: { workingDirectory: '/work' },
    runId: 'test-run',
    resolvedAt: BASE_TIME.toISOString(),
    sources: {},
    ...overrides,
  };
}
