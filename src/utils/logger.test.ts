import { afterEach, describe, expect, it, vi } from 'vitest';
import { createClientLogger, LOG_LEVEL_ENV } from './logger.js';

describe('createClientLogger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('is silent without a configured level', () => {
    vi.stubEnv(LOG_LEVEL_ENV, '');
    const logger = createClientLogger();

    expect(logger.silent).toBe(true);
    expect(logger.level).toBe('info');
  });

  it('reads the level from the environment', () => {
    vi.stubEnv(LOG_LEVEL_ENV, 'debug');
    const logger = createClientLogger();

    expect(logger.silent).toBe(false);
    expect(logger.level).toBe('debug');
  });

  it('prefers explicit options', () => {
    vi.stubEnv(LOG_LEVEL_ENV, 'debug');
    const logger = createClientLogger({ level: 'warn', silent: true });

    expect(logger.silent).toBe(true);
    expect(logger.level).toBe('warn');
  });
});
