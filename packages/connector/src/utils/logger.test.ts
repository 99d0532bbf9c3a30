/**
 * Unit tests for Logger Configuration Module
 * @remarks
 * Tests Pino logger configuration and log level resolution.
 */

import pino from 'pino';
import { createLogger, getValidLogLevel, isLogLevel, Logger } from './logger';

describe('Logger Configuration', () => {
  describe('createLogger', () => {
    const originalLogLevel = process.env.LOG_LEVEL;

    afterEach(() => {
      if (originalLogLevel === undefined) {
        delete process.env.LOG_LEVEL;
      } else {
        process.env.LOG_LEVEL = originalLogLevel;
      }
    });

    it('should return a Pino logger instance', () => {
      // Arrange & Act
      const logger = createLogger('test-peer');

      // Assert
      expect(typeof logger.info).toBe('function');
      expect(typeof logger.warn).toBe('function');
      expect(typeof logger.error).toBe('function');
      expect(typeof logger.debug).toBe('function');
    });

    it('should include peerId in all log entries using child logger pattern', () => {
      // Arrange
      const logs: string[] = [];
      const baseLogger = pino(
        { level: 'info' },
        {
          write: (chunk: string): void => {
            logs.push(chunk);
          },
        }
      );
      const logger = baseLogger.child({ peerId: 'test-peer' });

      // Act
      logger.info({ remotePeerId: 'peer-b' }, 'Peer admitted');

      // Assert
      expect(logs.length).toBe(1);
      const logEntry = JSON.parse(logs[0] ?? '{}');
      expect(logEntry.peerId).toBe('test-peer');
      expect(logEntry.remotePeerId).toBe('peer-b');
      expect(logEntry.msg).toBe('Peer admitted');
    });

    it('should use INFO level by default when LOG_LEVEL not set', () => {
      delete process.env.LOG_LEVEL;

      expect(createLogger('test-peer').level).toBe('info');
    });

    it('should respect LOG_LEVEL environment variable', () => {
      process.env.LOG_LEVEL = 'debug';

      expect(createLogger('test-peer').level).toBe('debug');
    });

    it('should handle case-insensitive LOG_LEVEL values', () => {
      process.env.LOG_LEVEL = 'ERROR';

      expect(createLogger('test-peer').level).toBe('error');
    });

    it('should use INFO level for invalid LOG_LEVEL values', () => {
      process.env.LOG_LEVEL = 'invalid-level';

      expect(createLogger('test-peer').level).toBe('info');
    });

    it('should allow log level override via parameter', () => {
      process.env.LOG_LEVEL = 'debug';

      expect(createLogger('test-peer', 'warn').level).toBe('warn');
    });
  });

  describe('getValidLogLevel', () => {
    it('should normalize valid levels', () => {
      expect(getValidLogLevel('Warn')).toBe('warn');
    });

    it('should fall back to info', () => {
      expect(getValidLogLevel(undefined)).toBe('info');
      expect(getValidLogLevel('trace')).toBe('info');
    });
  });

  describe('isLogLevel', () => {
    it('should accept only supported levels', () => {
      expect(isLogLevel('error')).toBe(true);
      expect(isLogLevel('fatal')).toBe(false);
    });
  });

  describe('Logger Type Interface', () => {
    it('should support all required log levels', () => {
      // Arrange
      const logs: string[] = [];
      const baseLogger = pino(
        { level: 'debug' },
        {
          write: (chunk: string): void => {
            logs.push(chunk);
          },
        }
      );
      const logger: Logger = baseLogger.child({ peerId: 'test-peer' });

      // Act
      logger.debug({ field: 'debug' }, 'Debug message');
      logger.info({ field: 'info' }, 'Info message');
      logger.warn({ field: 'warn' }, 'Warn message');
      logger.error({ field: 'error' }, 'Error message');

      // Assert
      const levels = logs.map((log) => JSON.parse(log).level);
      expect(levels).toEqual([20, 30, 40, 50]);
    });
  });
});
