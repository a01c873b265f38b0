import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleLogger } from './console-logger';
import { BufferLogger } from './buffer-logger';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes JSON lines when jsonOutput is set', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ jsonOutput: true });

    logger.event('run_started', 'Starting', { workflowId: 'wf-1' });

    expect(log).toHaveBeenCalledTimes(1);
    const line = String(log.mock.calls[0][0]);
    const parsed = JSON.parse(line);
    expect(parsed.eventType).toBe('run_started');
    expect(parsed.level).toBe('info');
    expect(parsed.metadata.workflowId).toBe('wf-1');
  });

  it('prints metadata in pretty mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ includeTimestamp: false });

    logger.event('run_resumed', 'Resuming', { workflowId: 'wf-2', iteration: 3 });

    expect(log).toHaveBeenCalledWith('ℹ️ (run_resumed) Resuming {workflow=wf-2, iter=3}');
  });

  it('routes error events to stderr', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ includeTimestamp: false });

    logger.event('checkpoint_failed', 'Disk full');

    expect(error).toHaveBeenCalledWith('❌ (checkpoint_failed) Disk full');
  });

  it('keeps the parent level in child loggers', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ minLevel: 'warn', includeTimestamp: false });

    logger.child({ workflowId: 'wf-3' }).info('hidden');

    expect(log).not.toHaveBeenCalled();
  });

  it('drops events below the minimum level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new ConsoleLogger();

    logger.debug('hidden');

    expect(log).not.toHaveBeenCalled();
    expect(logger.getEvents()).toHaveLength(0);
  });
});

describe('BufferLogger', () => {
  it('derives levels from event types', () => {
    const logger = new BufferLogger();

    logger.event('tool_rejected', 'Not allowed');
    logger.event('model_request_failed', 'Boom');
    logger.event('checkpoint_saved', 'Saved');

    expect(logger.getEventsByLevel('warn')).toHaveLength(1);
    expect(logger.getEventsByLevel('error')).toHaveLength(1);
    expect(logger.getEventsByLevel('debug')).toHaveLength(1);
  });

  it('redacts secrets from messages and metadata', () => {
    const logger = new BufferLogger();

    logger.info('password=test-secret', { header: 'token: placeholder-value' });

    const event = logger.getLastEvent();
    expect(event?.message).toBe('pass[REDACTED]');
    expect(event?.metadata.header).toBe('toke[REDACTED]');
  });

  it('carries context into child loggers', () => {
    const logger = new BufferLogger();

    const child = logger.child({ workflowId: 'wf-9' }).child({ state: 'AWAITING_MODEL' });
    child.info('hello');

    expect(child.getEvents()[0].metadata).toEqual({ workflowId: 'wf-9', state: 'AWAITING_MODEL' });
    expect(logger.getEvents()).toHaveLength(1);
  });
});
