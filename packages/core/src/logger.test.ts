import { stripVTControlCharacters } from 'node:util';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { resetConfig } from './config.js';
import { createLogger, formatLogLine } from './logger.js';

describe('formatLogLine', () => {
  it('should prefix the namespace and level', () => {
    const line = formatLogLine('wait', 'info', 'Task entered running phase');
    expect(stripVTControlCharacters(line)).toBe(
      '[taskwait:wait] info Task entered running phase\n'
    );
  });

  it('should append metadata as JSON', () => {
    const line = formatLogLine('wait', 'warn', 'Status sets overlap', {
      statuses: ['queued'],
    });
    expect(stripVTControlCharacters(line)).toBe(
      '[taskwait:wait] warn Status sets overlap {"statuses":["queued"]}\n'
    );
  });

  it('should omit empty metadata', () => {
    const line = formatLogLine('wait', 'error', 'failed', {});
    expect(stripVTControlCharacters(line)).toBe(
      '[taskwait:wait] error failed\n'
    );
  });
});

describe('createLogger', () => {
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(() => {
    originalEnv = { ...process.env };
    resetConfig();
  });

  afterEach(() => {
    process.env = originalEnv;
    resetConfig();
    vi.restoreAllMocks();
  });

  it('should write to stderr', () => {
    const spy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    createLogger('test').warn('careful');
    expect(spy).toHaveBeenCalledTimes(1);
    expect(stripVTControlCharacters(String(spy.mock.calls[0]?.[0]))).toBe(
      '[taskwait:test] warn careful\n'
    );
  });

  it('should drop debug lines when debug is disabled', () => {
    delete process.env.TASKWAIT_DEBUG;
    const spy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    createLogger('test').debug('hidden');
    expect(spy).not.toHaveBeenCalled();
  });

  it('should write debug lines when TASKWAIT_DEBUG is set', () => {
    process.env.TASKWAIT_DEBUG = '1';
    const spy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    createLogger('test').debug('shown', { status: 'running' });
    expect(stripVTControlCharacters(String(spy.mock.calls[0]?.[0]))).toBe(
      '[taskwait:test] debug shown {"status":"running"}\n'
    );
  });

  it('should warn once and keep debug off for an unknown TASKWAIT_DEBUG', () => {
    process.env.TASKWAIT_DEBUG = 'yes';
    const spy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = createLogger('test');
    logger.debug('hidden');
    logger.debug('still hidden');
    expect(spy).toHaveBeenCalledTimes(1);
    expect(stripVTControlCharacters(String(spy.mock.calls[0]?.[0]))).toBe(
      '[taskwait:config] warn Ignoring TASKWAIT_DEBUG=yes: must be one of 1, 0, true, false\n'
    );
  });
});
