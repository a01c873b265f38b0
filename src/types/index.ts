/**
 * Types module - shared interfaces and types
 */

export { ok, err, toError } from './result';
export type { Result, Ok, Err } from './result';

export {
  ExitCode,
  getExitCodeDescription,
  isSuccessExitCode,
  isResumableExitCode,
  exitCodeForError,
} from './exit-codes';

export { createFileSystemError, globToRegex } from './file-system';
export type {
  FileSystem,
  FileStats,
  WriteOptions,
  ListOptions,
  FileSystemError,
  FileSystemErrorCode,
} from './file-system';

export { createPrompterError } from './prompter';
export type {
  Prompter,
  SelectChoice,
  ConfirmOptions,
  SelectOptions,
  PrompterError,
  PrompterErrorCode,
  PromptResult,
} from './prompter';

export { SystemClock, MockClock } from './clock';
export type { Clock } from './clock';

export { shouldLog, EVENT_LEVELS, DEFAULT_REDACT_PATTERNS, redactSecrets } from './logger';
export type { Logger, LogLevel, LogEventType, LogMetadata, LogEvent, LoggerOptions } from './logger';

export { DEFAULT_CONFIG, DEFAULT_PRUNING, DEFAULT_COMPATIBILITY, RESUME_DIRECTORY } from './effective-config';
export type {
  EffectiveConfig,
  ModelProvider,
  ExecutionLimits,
  ModelConfig,
  ResumeConfig,
  PruningConfig,
  CompatibilityConfig,
  VerbosityConfig,
  InteractivityConfig,
  PathConfig,
  ConfigSource,
} from './effective-config';

export { stringifyJsonValue } from './json';
export type { JsonValue, JsonObject, JsonPrimitive } from './json';

export { createMessage } from './chat';
export type { ChatRole, ChatMessage, ChatHistory, FunctionCall } from './chat';

export { isResumableStatus } from './resume-snapshot';
export type {
  SnapshotStatus,
  CompletedTool,
  ContextChange,
  ContextEvolution,
  ResumeSnapshot,
  SnapshotSummary,
} from './resume-snapshot';

export { createExecutionContext, setContextVariable } from './execution-context';
export type { ExecutionContext, HistoryEntry } from './execution-context';

export type { Tool, ToolDefinition, ToolParameters, ToolResult, ToolCatalog } from './tool';

export { DEFAULT_EXECUTION_SETTINGS } from './chat-client';
export type {
  ExecutionSettings,
  ChatCompletionRequest,
  ChatCompletion,
  TokenUsage,
  ModelErrorKind,
  ModelInterfaceError,
  ChatCompletionClient,
} from './chat-client';

export type { WorkflowSource, WorkflowSettings } from './workflow';

export { createWorkflowError, formatWorkflowError } from './workflow-error';
export type { WorkflowError, WorkflowErrorCode } from './workflow-error';
