/**
 * IO module - filesystem abstraction for testability
 */

export { RealFileSystem, createRealFileSystem } from './real-file-system';
export { MemoryFileSystem, createMemoryFileSystem } from './memory-file-system';
export type { InjectedFault, FaultOperation } from './memory-file-system';

// Workflow files
export { loadWorkflow, parseWorkflowSource, workflowNameFromPath } from './load-workflow';
export type { WorkflowLoadError, WorkflowLoadErrorCode } from './load-workflow';
