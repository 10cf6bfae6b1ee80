import { describe, expect, it } from 'vitest';
import {
  DEFAULT_LOGGER_CONFIG,
  createLogger,
  getLoggerConfigFromEnv,
  validateLoggerConfig,
} from '../../src/core/logging/index.js';

describe('logger configuration', () => {
  it('should use the defaults without environment variables', () => {
    expect(getLoggerConfigFromEnv({})).toEqual(DEFAULT_LOGGER_CONFIG);
  });

  it('should read every supported variable', () => {
    expect(
      getLoggerConfigFromEnv({
        RECONCILER_LOG_LEVEL: 'DEBUG',
        RECONCILER_LOG_PRETTY: 'true',
        RECONCILER_LOG_DESTINATION: '/var/log/reconciler.log',
        RECONCILER_LOG_TIMESTAMP: 'false',
      })
    ).toEqual({
      level: 'debug',
      pretty: true,
      destination: '/var/log/reconciler.log',
      options: { timestamp: false },
    });
  });

  it('should ignore unknown log levels', () => {
    expect(getLoggerConfigFromEnv({ RECONCILER_LOG_LEVEL: 'loud' }).level).toBe('info');
  });

  it('should pretty print in development', () => {
    expect(getLoggerConfigFromEnv({ NODE_ENV: 'development' }).pretty).toBe(true);
  });

  it('should accept valid configurations', () => {
    expect(() => validateLoggerConfig({ level: 'warn' })).not.toThrow();
  });

  it('should create child loggers', () => {
    const logger = createLogger({ level: 'fatal' }).child({ component: 'test' });

    expect(() => logger.info('hidden', { key: 'value' })).not.toThrow();
    expect(() => logger.error('hidden', new Error('boom'))).not.toThrow();
  });
});
