/**
 * Logger Tests
 * ============
 * Tests for the centralized logging system
 */

import { describe, it, expect, vi } from 'vitest';
import { logger, Logger, LogLevel, winstonLogger, createPackageLogger, LogHelpers } from '../../src/index.js';

describe('Logger', () => {
  describe('Log Levels', () => {
    it('should have all required log levels', () => {
      expect(LogLevel.ERROR).toBe('error');
      expect(LogLevel.WARN).toBe('warn');
      expect(LogLevel.INFO).toBe('info');
      expect(LogLevel.DEBUG).toBe('debug');
      expect(LogLevel.TRACE).toBe('trace');
    });
  });

  describe('Logger Instance', () => {
    it('should tag messages with its namespace', () => {
      const spy = vi.spyOn(winstonLogger, 'info').mockImplementation(() => winstonLogger);

      logger.info('Test info message', { experimentName: 'exp1' });

      expect(spy).toHaveBeenCalledWith('Test info message', {
        namespace: 'expsync',
        experimentName: 'exp1',
      });
    });

    it('should serialize Error instances passed to error()', () => {
      const spy = vi.spyOn(winstonLogger, 'error').mockImplementation(() => winstonLogger);
      const failure = new Error('pool exhausted');

      logger.error('Query failed', failure, { target: 'postgres://localhost/expsync_test' });

      expect(spy).toHaveBeenCalledWith('Query failed', {
        namespace: 'expsync',
        target: 'postgres://localhost/expsync_test',
        error: { message: 'pool exhausted', stack: failure.stack, name: 'Error' },
      });
    });

    it('should log trace messages at debug level', () => {
      const spy = vi.spyOn(winstonLogger, 'debug').mockImplementation(() => winstonLogger);

      logger.trace('Row decoded');

      expect(spy).toHaveBeenCalledWith('Row decoded', { namespace: 'expsync', level: 'trace' });
    });
  });

  describe('Context', () => {
    it('should merge persistent context into every message', () => {
      const spy = vi.spyOn(winstonLogger, 'warn').mockImplementation(() => winstonLogger);
      const scoped = new Logger('scoped');
      scoped.setContext({ experimentName: 'exp1' });

      scoped.warn('Slow save', { durationSeconds: 3.5 });

      expect(spy).toHaveBeenCalledWith('Slow save', {
        namespace: 'scoped',
        experimentName: 'exp1',
        durationSeconds: 3.5,
      });
      scoped.clearContext();
      expect(scoped.getContext()).toEqual({});
    });

    it('should give child loggers the parent context and namespace', () => {
      const parent = new Logger('parent');
      parent.setContext({ experimentName: 'exp1' });

      const child = parent.child({ strategyName: 'sobol+gpei' });

      expect(child.getNamespace()).toBe('parent');
      expect(child.getContext()).toEqual({ experimentName: 'exp1', strategyName: 'sobol+gpei' });
      expect(parent.getContext()).toEqual({ experimentName: 'exp1' });
    });
  });

  describe('Package loggers', () => {
    it('should return one logger per package name', () => {
      const first = createPackageLogger('@expsync/test-package');
      const second = createPackageLogger('@expsync/test-package');

      expect(first).toBe(second);
      expect(first.getNamespace()).toBe('@expsync/test-package');
    });

    it('should log database queries at debug level', () => {
      const packageLogger = createPackageLogger('@expsync/test-db');
      const spy = vi.spyOn(packageLogger, 'debug').mockImplementation(() => {});

      LogHelpers.dbQuery(packageLogger, 'upsert', 'expsync_experiment', 12, { experimentName: 'exp1' });

      expect(spy).toHaveBeenCalledWith('Database Query', {
        operation: 'upsert',
        table: 'expsync_experiment',
        duration: 12,
        experimentName: 'exp1',
      });
    });
  });
});
