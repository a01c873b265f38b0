/**
 * Orchestration module - wires together core, llm, resume, tools and logging
 * This module provides the high-level entry points for running workflows
 */

export {
  createRuntime,
  createChatClient,
  createCliLogger,
  createBuiltinTools,
  createSnapshotStore,
} from './orchestrator-factory';
export type { RuntimeOptions, Runtime } from './orchestrator-factory';
