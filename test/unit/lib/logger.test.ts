import { describe, it, expect, afterEach } from '@jest/globals';
import { createLogger, createTimer } from '../../../src/lib/logger';
import { createMockLogger } from '../../__support__/utilities/mock-infrastructure';

describe('createLogger', () => {
  const savedLevel = process.env.LOG_LEVEL;

  afterEach(() => {
    if (savedLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = savedLevel;
    }
  });

  it('defaults to info regardless of the environment', () => {
    process.env.LOG_LEVEL = 'trace';
    expect(createLogger().level).toBe('info');
  });

  it('uses the configured level and name', () => {
    const logger = createLogger({ name: 'catalog', level: 'warn' });
    expect(logger.level).toBe('warn');
    expect(logger.bindings().name).toBe('catalog');
  });
});

describe('createTimer', () => {
  it('reports the elapsed time on end and on error', () => {
    const timer = createTimer(createMockLogger(), 'catalog test');
    expect(timer.end()).toBeGreaterThanOrEqual(0);
    expect(timer.error(new Error('boom'))).toBeGreaterThanOrEqual(0);
  });
});
