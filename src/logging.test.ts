import { describe, expect, it } from 'vitest';
import logger, { resolveLogLevel } from './logging.js';

describe('resolveLogLevel', () => {
  it('follows NODE_ENV', () => {
    expect(resolveLogLevel({})).toBe('debug');
    expect(resolveLogLevel({ NODE_ENV: 'development' })).toBe('debug');
    expect(resolveLogLevel({ NODE_ENV: 'test' })).toBe('silent');
    expect(resolveLogLevel({ NODE_ENV: 'production' })).toBe('info');
  });

  it('lets LOG_LEVEL win', () => {
    expect(resolveLogLevel({ NODE_ENV: 'production', LOG_LEVEL: 'warn' })).toBe('warn');
    expect(resolveLogLevel({ NODE_ENV: 'test', LOG_LEVEL: '' })).toBe('silent');
  });
});

describe('logger', () => {
  it('is quiet under the test runner', () => {
    expect(logger.level).toBe('silent');
  });
});
