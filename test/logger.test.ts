import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from '../src/logger.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops messages below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = createLogger('warn');

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown', { attempt: 2 });

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] WARN shown$/);
    expect(warn.mock.calls[0][1]).toEqual({ attempt: 2 });
  });

  it('writes errors to stderr', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    createLogger('debug').error('Session sweep failed:');

    expect(error.mock.calls[0][0]).toMatch(/ ERROR Session sweep failed:$/);
  });
});
