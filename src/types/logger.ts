/**
 * Structured logging. Every line is a LogEvent with a type from the
 * workflow lifecycle, so tests can assert on events rather than text.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured event types for the workflow lifecycle
 */
export type LogEventType =
  // Run lifecycle
  | 'run_started'
  | 'run_completed'
  | 'run_failed'
  | 'run_cancelled'
  | 'run_resumed'
  // State machine
  | 'state_changed'
  // Iteration lifecycle
  | 'iteration_started'
  | 'iteration_completed'
  // Model calls
  | 'model_request_started'
  | 'model_request_completed'
  | 'model_request_failed'
  // Tool calls
  | 'tool_invocation_started'
  | 'tool_invocation_completed'
  | 'tool_invocation_failed'
  | 'tool_rejected'
  // Persistence
  | 'checkpoint_saved'
  | 'checkpoint_failed'
  | 'snapshot_loaded'
  | 'snapshot_corrupt'
  | 'snapshot_cleanup'
  | 'compatibility_checked'
  // Stop conditions
  | 'limit_exceeded'
  // User interaction
  | 'prompt_shown'
  | 'prompt_answered'
  // General
  | 'debug'
  | 'info'
  | 'warn'
  | 'error';

export interface LogMetadata {
  /** Workflow execution this event belongs to */
  workflowId?: string;
  /** Orchestrator state at the time of the event */
  state?: string;
  /** Current loop iteration */
  iteration?: number;
  [key: string]: unknown;
}

export interface LogEvent {
  /** ISO 8601 */
  timestamp: string;
  level: LogLevel;
  eventType: LogEventType;
  message: string;
  metadata: LogMetadata;
}

export interface LoggerOptions {
  minLevel?: LogLevel;
  /** Pretty output only */
  includeTimestamp?: boolean;
  /** One JSON object per line instead of pretty output */
  jsonOutput?: boolean;
  redactPatterns?: RegExp[];
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;

  /** The level comes from the event type (see EVENT_LEVELS) */
  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void;

  /** Everything recorded by this logger, its parent and its children */
  getEvents(): LogEvent[];

  /** Same sink and level, with `context` merged into every event */
  child(context: LogMetadata): Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[minLevel];
}

/** Event types not listed log at info */
export const EVENT_LEVELS: Partial<Record<LogEventType, LogLevel>> = {
  run_failed: 'error',
  model_request_failed: 'error',
  checkpoint_failed: 'error',
  snapshot_corrupt: 'error',
  error: 'error',
  tool_invocation_failed: 'warn',
  tool_rejected: 'warn',
  limit_exceeded: 'warn',
  run_cancelled: 'warn',
  warn: 'warn',
  model_request_started: 'debug',
  model_request_completed: 'debug',
  tool_invocation_started: 'debug',
  checkpoint_saved: 'debug',
  state_changed: 'debug',
  iteration_completed: 'debug',
  prompt_shown: 'debug',
  prompt_answered: 'debug',
  debug: 'debug',
};

/** API keys, bearer tokens and `password=`-style assignments */
export const DEFAULT_REDACT_PATTERNS: RegExp[] = [
  /(?:api[_-]?key|apikey)[=:\s]*['"]?([a-zA-Z0-9_-]{20,})['"]?/gi,
  /Bearer\s+[a-zA-Z0-9_.-]{16,}/gi,
  /(?:AKIA|ABIA|ACCA|ASIA)[A-Z0-9]{16}/g,
  /gh[pousr]_[a-zA-Z0-9]{36}/g,
  /sk-(?:proj-)?[a-zA-Z0-9_-]{32,}/g,
  /(?:password|secret|token|credential)[=:\s]*['"]?([^\s'"]{8,})['"]?/gi,
];

/** Keeps up to four leading characters of each match */
export function redactSecrets(text: string, patterns: RegExp[] = DEFAULT_REDACT_PATTERNS): string {
  return patterns.reduce(
    (redacted, pattern) =>
      redacted.replace(pattern, (match) => `${match.slice(0, Math.min(4, Math.floor(match.length / 4)))}[REDACTED]`),
    text
  );
}
