/**
 * Resume module - snapshot codec, persistence and compatibility checks
 */

export { hashWorkflowContent } from './content-hash';
export { generateWorkflowId, isValidWorkflowId, WORKFLOW_ID_PATTERN } from './workflow-id';
export {
  CRITICAL_CONTEXT_KEYS,
  defaultImportanceScorer,
  isImportantChange,
} from './importance-scorer';
export type { ImportanceScorer, ScoringInput } from './importance-scorer';
export { determinePhase, extractStrategy, extractKeyInsights, DEFAULT_STRATEGY } from './resume-heuristics';
export type { WorkflowPhase } from './resume-heuristics';
export {
  toSnapshot,
  fromSnapshot,
  encodeResumeFile,
  decodeResumeFileObject,
  serializeSnapshot,
  deserializeSnapshot,
  pruneCompletedTools,
  pruneVariables,
  pruneContextChanges,
  pruneInsights,
  condenseMessages,
} from './resume-codec';
export type { SnapshotMetadata, CodecOptions, RehydratedExecution } from './resume-codec';
export { buildResumeMessageContent, createResumeMessage, RESUME_MESSAGE_HEADER } from './resume-message';
export { ResumeStateStore, createResumeStateStore } from './resume-state-store';
export type { ResumeStateStoreOptions, SaveResult, CleanupOptions, SnapshotStore } from './resume-state-store';
export {
  validateCompatibility,
  calculateSimilarity,
  levenshteinDistance,
  CONTENT_CHANGED_WARNING,
  RESET_ADAPTATION,
} from './compatibility-validator';
export type { CompatibilityResult, MigrationStrategies } from './compatibility-validator';
