/**
 * Prints events to the console, either as JSON lines (--json) or as one
 * readable line each. Errors go to stderr in both modes.
 */

import { Logger, LogLevel, LogEvent, LoggerOptions } from '../types/logger';
import { BaseLogger } from './base-logger';

const LEVEL_ICONS: Record<LogLevel, string> = {
  debug: '🔍',
  info: 'ℹ️',
  warn: '⚠️',
  error: '❌',
};

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.log(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

/** `[time] icon (event_type) message {workflow=…, state=…, iter=…}` */
export function formatEventLine(event: LogEvent, includeTimestamp: boolean): string {
  const parts: string[] = [];
  if (includeTimestamp) {
    parts.push(`[${new Date(event.timestamp).toLocaleTimeString()}]`);
  }
  parts.push(LEVEL_ICONS[event.level]);
  if (event.eventType !== event.level) {
    parts.push(`(${event.eventType})`);
  }
  parts.push(event.message);

  const { workflowId, state, iteration } = event.metadata;
  const tags = [
    workflowId ? `workflow=${workflowId}` : null,
    state ? `state=${state}` : null,
    iteration !== undefined ? `iter=${iteration}` : null,
  ].filter((tag): tag is string => tag !== null);
  if (tags.length > 0) {
    parts.push(`{${tags.join(', ')}}`);
  }
  return parts.join(' ');
}

export class ConsoleLogger extends BaseLogger {
  constructor(options: LoggerOptions = {}) {
    super(options, 'info');
  }

  protected createChild(options: LoggerOptions): BaseLogger {
    return new ConsoleLogger(options);
  }

  protected emit(event: LogEvent): void {
    if (this.options.jsonOutput) {
      // stdout stays machine-readable; only errors leave it
      (event.level === 'error' ? WRITERS.error : WRITERS.info)(JSON.stringify(event));
      return;
    }
    WRITERS[event.level](formatEventLine(event, this.options.includeTimestamp ?? true));
  }
}

export function createConsoleLogger(options?: LoggerOptions): Logger {
  return new ConsoleLogger(options);
}
