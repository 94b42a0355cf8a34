import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Logger, AppError, handleError, parseLogLevel } from './logger.js';

describe('Logger', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = new Logger({ context: 'test', level: 'debug' });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Basic Logging', () => {
    it('should log info messages with context', () => {
      const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      logger.info('Test message');
      expect(consoleSpy).toHaveBeenCalledOnce();
      expect(String(consoleSpy.mock.calls[0][0])).toContain('INFO  [test] Test message');
    });

    it('should log debug messages', () => {
      const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      logger.debug('Debug message');
      expect(consoleSpy).toHaveBeenCalledOnce();
    });

    it('should log warning messages to console.warn', () => {
      const consoleSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      logger.warn('Warning message');
      expect(consoleSpy).toHaveBeenCalledOnce();
    });

    it('should log errors with their message', () => {
      const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      logger.error('An error occurred', new Error('Test error'));
      expect(String(consoleSpy.mock.calls[0][0])).toContain('Error: Test error');
    });
  });

  describe('Log Levels', () => {
    it('should drop messages below the minimum level', () => {
      const errorLogger = new Logger({ context: 'test', level: 'error' });
      const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      errorLogger.info('Info');
      expect(consoleSpy).not.toHaveBeenCalled();
      expect(errorLogger.getLogs()).toHaveLength(0);
    });

    it('should change level at runtime', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      logger.setMinLevel('error');
      logger.warn('Hidden');
      expect(logger.getMinLevel()).toBe('error');
      expect(logger.getLogs()).toHaveLength(0);
    });

    it('should parse level names case-insensitively', () => {
      expect(parseLogLevel('WARN')).toBe('warn');
      expect(parseLogLevel(' debug ')).toBe('debug');
      expect(parseLogLevel('verbose')).toBe('info');
      expect(parseLogLevel(undefined, 'error')).toBe('error');
    });
  });

  describe('Log buffer', () => {
    it('should keep only the most recent entries', () => {
      const small = new Logger({ context: 'buffer', level: 'debug', maxLogs: 2 });
      vi.spyOn(console, 'log').mockImplementation(() => undefined);
      small.info('one');
      small.info('two');
      small.info('three');
      expect(small.getLogs().map((entry) => entry.message)).toEqual(['two', 'three']);
    });

    it('should filter entries by level and clear', () => {
      vi.spyOn(console, 'log').mockImplementation(() => undefined);
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      logger.info('a');
      logger.warn('b');
      expect(logger.getLogs('warn').map((entry) => entry.message)).toEqual(['b']);
      logger.clear();
      expect(logger.getLogs()).toEqual([]);
    });
  });

  describe('Logger Integration', () => {
    it('should create child loggers with nested context', () => {
      const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      logger.child('child').info('hello');
      expect(String(consoleSpy.mock.calls[0][0])).toContain('[test:child] hello');
    });

    it('should let child loggers follow the parent level', () => {
      const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const child = logger.child('child');
      logger.setMinLevel('warn');
      child.info('hidden');
      expect(child.getMinLevel()).toBe('warn');
      expect(consoleSpy).not.toHaveBeenCalled();

      child.setMinLevel('debug');
      child.info('shown');
      expect(consoleSpy).toHaveBeenCalledTimes(1);
    });

    it('should handle circular references in data', () => {
      const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const node: Record<string, unknown> = { a: 1 };
      node.self = node;
      expect(() => logger.info('Message', { node })).not.toThrow();
      expect(String(consoleSpy.mock.calls[0][0])).toContain('"self": "[Circular]"');
    });
  });
});

describe('AppError', () => {
  it('should create custom error with code', () => {
    const error = new AppError('Test error', 'BUSY');
    expect(error.message).toBe('Test error');
    expect(error.code).toBe('BUSY');
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('AppError');
  });

  it('should have default status code 500', () => {
    expect(new AppError('Error', 'UNKNOWN_ERROR').statusCode).toBe(500);
  });

  it('should serialize to JSON', () => {
    const error = new AppError('Bad destination', 'INVALID_CONFIGURATION', 400, { detail: 'info' });
    expect(error.toJSON()).toEqual({
      name: 'AppError',
      message: 'Bad destination',
      code: 'INVALID_CONFIGURATION',
      statusCode: 400,
      context: { detail: 'info' },
    });
  });
});

describe('handleError', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should return AppErrors unchanged', () => {
    const original = new AppError('Busy', 'BUSY', 409);
    expect(handleError(original)).toBe(original);
  });

  it('should wrap plain errors as internal errors', () => {
    const wrapped = handleError(new Error('boom'), 'scan');
    expect(wrapped.code).toBe('INTERNAL_ERROR');
    expect(wrapped.message).toBe('boom');
  });

  it('should wrap non-error values as unknown errors', () => {
    const wrapped = handleError('odd failure');
    expect(wrapped.code).toBe('UNKNOWN_ERROR');
    expect(wrapped.message).toBe('odd failure');
  });
});
