import { describe, it, expect, vi, afterEach } from 'vitest';
import { get_log_level, logger, parse_level, set_log_level } from './logger.util';

describe('logger', () => {
  const initial = get_log_level();

  afterEach(() => {
    set_log_level(initial);
    vi.restoreAllMocks();
  });

  it('parses level names case-insensitively', () => {
    expect(parse_level(' Debug ')).toBe('debug');
    expect(parse_level('verbose')).toBeNull();
    expect(parse_level(undefined)).toBeNull();
  });

  it('writes prefixed lines at or above the current level', () => {
    const info = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    set_log_level('info');

    logger.debug('hidden');
    logger.info('round_resolved', { round: 1 });
    logger.error('boom');

    expect(info).toHaveBeenCalledTimes(1);
    expect(info.mock.calls[0][0]).toMatch(/^\[ace\] \S+ INFO round_resolved \{"round":1\}$/);
    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0][0]).toMatch(/ ERROR boom$/);
  });

  it('stays quiet when silent', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    set_log_level('silent');
    logger.error('nothing');
    expect(spy).not.toHaveBeenCalled();
  });
});
