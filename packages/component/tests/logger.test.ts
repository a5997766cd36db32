import { describe, expect, it } from 'vitest';

import { childLogger, logger, resolveLogLevel } from '../src/logging/logger.js';

describe('logger', () => {
  it('takes the level from HINGE_LOG_LEVEL when it names a pino level', () => {
    expect(resolveLogLevel({ HINGE_LOG_LEVEL: 'debug' })).toBe('debug');
    expect(resolveLogLevel({ HINGE_LOG_LEVEL: ' INFO ', NODE_ENV: 'test' })).toBe('info');
  });

  it('is silent under test and logs warnings otherwise', () => {
    expect(resolveLogLevel({ HINGE_LOG_LEVEL: 'loud', NODE_ENV: 'test' })).toBe('silent');
    expect(resolveLogLevel({ NODE_ENV: 'production' })).toBe('warn');
    expect(resolveLogLevel({})).toBe('warn');
  });

  it('binds child loggers to the package logger', () => {
    const child = childLogger({ component: 'Greeting' });

    expect(child.bindings()).toMatchObject({ component: 'Greeting' });
    expect(child.level).toBe(logger.level);
    expect(logger.level).toBe('silent');
  });
});
