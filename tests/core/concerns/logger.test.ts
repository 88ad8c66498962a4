import { describe, it, expect, afterEach } from 'vitest';

import {
  createLogger,
  getGlobalLogger,
  getLoggerOptionsFromEnv,
  isLogLevel,
  resetGlobalLogger,
} from '../../../src/concerns/logger.js';

describe('getLoggerOptionsFromEnv()', () => {
  it('reads level and format from the environment', () => {
    expect(getLoggerOptionsFromEnv({}, { INVENTORY_LOG_LEVEL: 'DEBUG', INVENTORY_LOG_FORMAT: 'pretty' })).toEqual({
      level: 'debug',
      format: 'pretty',
    });
  });

  it('keeps options the caller set', () => {
    expect(getLoggerOptionsFromEnv({ level: 'warn' }, { INVENTORY_LOG_LEVEL: 'trace' })).toEqual({ level: 'warn' });
  });

  it('ignores unknown values', () => {
    expect(getLoggerOptionsFromEnv({}, { INVENTORY_LOG_LEVEL: 'loud', INVENTORY_LOG_FORMAT: 'xml' })).toEqual({});
  });
});

describe('isLogLevel()', () => {
  it('accepts pino level names only', () => {
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});

describe('createLogger()', () => {
  afterEach(() => {
    resetGlobalLogger();
  });

  it('applies the level and bindings', () => {
    const logger = createLogger({ level: 'warn', format: 'json', bindings: { namespace: 'sqs' } });

    expect(logger.level).toBe('warn');
    expect(logger.bindings()).toEqual({ namespace: 'sqs' });
  });

  it('shares one global logger until reset', () => {
    const first = getGlobalLogger();

    expect(getGlobalLogger()).toBe(first);
    resetGlobalLogger();
    expect(getGlobalLogger()).not.toBe(first);
  });
});
