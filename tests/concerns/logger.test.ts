import { describe, it, expect } from 'vitest';
import { createLogger, getLoggerOptionsFromEnv } from '../../src/concerns/logger.js';

describe('logger', () => {
  describe('getLoggerOptionsFromEnv', () => {
    it('should read level and format, case-insensitively', () => {
      expect(getLoggerOptionsFromEnv({
        LATENCY_HEATMAP_LOG_LEVEL: 'DEBUG',
        LATENCY_HEATMAP_LOG_FORMAT: 'Json',
      })).toEqual({ level: 'debug', format: 'json' });
    });

    it('should ignore unknown values', () => {
      expect(getLoggerOptionsFromEnv({
        LATENCY_HEATMAP_LOG_LEVEL: 'verbose',
        LATENCY_HEATMAP_LOG_FORMAT: 'xml',
      })).toEqual({});
    });

    it('should return nothing when unset', () => {
      expect(getLoggerOptionsFromEnv({})).toEqual({});
    });
  });

  describe('createLogger', () => {
    it('should apply the requested level', () => {
      const logger = createLogger({ level: 'warn', format: 'json', name: 'test' });

      expect(logger.level).toBe('warn');
      expect(logger.isLevelEnabled('info')).toBe(false);
      expect(logger.isLevelEnabled('error')).toBe(true);
    });

    it('should default to info', () => {
      expect(createLogger({ format: 'json' }).level).toBe('info');
    });
  });
});
