/**
 * Records events without printing them; every test that checks what the
 * orchestrator did reads this buffer.
 */

import { LogLevel, LogEventType, LogEvent, LoggerOptions } from '../types/logger';
import { BaseLogger } from './base-logger';

export class BufferLogger extends BaseLogger {
  constructor(options: LoggerOptions = {}) {
    super(options, 'debug');
  }

  getEventsByLevel(level: LogLevel): LogEvent[] {
    return this.recorded.filter((event) => event.level === level);
  }

  getEventsByType(eventType: LogEventType): LogEvent[] {
    return this.recorded.filter((event) => event.eventType === eventType);
  }

  hasEventType(eventType: LogEventType): boolean {
    return this.recorded.some((event) => event.eventType === eventType);
  }

  getLastEvent(): LogEvent | undefined {
    return this.recorded[this.recorded.length - 1];
  }

  getEventsMatching(pattern: RegExp): LogEvent[] {
    return this.recorded.filter((event) => pattern.test(event.message));
  }

  protected createChild(options: LoggerOptions): BaseLogger {
    return new BufferLogger(options);
  }

  protected emit(): void {
    // buffered only
  }
}
