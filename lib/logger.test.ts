import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger } from './logger';

describe('Logger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('is silent under test by default', () => {
    vi.stubEnv('LOG_LEVEL', '');
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});

    createLogger('Cache').info('hit');
    expect(info).not.toHaveBeenCalled();
  });

  it('prefixes messages with the scope and passes data through', () => {
    vi.stubEnv('LOG_LEVEL', 'info');
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    createLogger('Stat Cache').warn('stale fallback', { key: 'k' });
    expect(warn).toHaveBeenCalledWith('[Stat Cache] stale fallback', { key: 'k' });
  });

  it('drops messages below the configured level', () => {
    vi.stubEnv('LOG_LEVEL', 'warn');
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    const log = createLogger('Line Tracker');
    log.info('moved');
    log.error('write failed');

    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[Line Tracker] write failed');
  });
});
