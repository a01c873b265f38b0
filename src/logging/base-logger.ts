/**
 * Level filtering, redaction and context merging shared by every logger.
 * Subclasses only decide where an accepted event goes.
 */

import {
  Logger,
  LogLevel,
  LogEventType,
  LogMetadata,
  LogEvent,
  LoggerOptions,
  EVENT_LEVELS,
  shouldLog,
  redactSecrets,
} from '../types/logger';

export abstract class BaseLogger implements Logger {
  protected readonly options: LoggerOptions;
  private readonly minLevel: LogLevel;
  private context: LogMetadata = {};
  // Shared with every logger derived through child()
  private events: LogEvent[] = [];

  constructor(options: LoggerOptions, defaultLevel: LogLevel) {
    this.options = options;
    this.minLevel = options.minLevel ?? defaultLevel;
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.record('debug', 'debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.record('info', 'info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.record('warn', 'warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.record('error', 'error', message, metadata);
  }

  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void {
    this.record(EVENT_LEVELS[eventType] ?? 'info', eventType, message, metadata);
  }

  getEvents(): LogEvent[] {
    return [...this.events];
  }

  child(context: LogMetadata): Logger {
    const child = this.createChild({ ...this.options, minLevel: this.minLevel });
    child.events = this.events;
    child.context = { ...this.context, ...context };
    return child;
  }

  protected get recorded(): readonly LogEvent[] {
    return this.events;
  }

  protected abstract createChild(options: LoggerOptions): BaseLogger;

  protected abstract emit(event: LogEvent): void;

  private record(level: LogLevel, eventType: LogEventType, message: string, metadata: LogMetadata = {}): void {
    if (!shouldLog(level, this.minLevel)) {
      return;
    }

    const merged: LogMetadata = {};
    for (const [key, value] of Object.entries({ ...this.context, ...metadata })) {
      merged[key] = typeof value === 'string' ? this.redact(value) : value;
    }

    const event: LogEvent = {
      timestamp: new Date().toISOString(),
      level,
      eventType,
      message: this.redact(message),
      metadata: merged,
    };
    this.events.push(event);
    this.emit(event);
  }

  private redact(text: string): string {
    return redactSecrets(text, this.options.redactPatterns);
  }
}
