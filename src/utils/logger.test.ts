import { afterEach, describe, it, expect, vi } from 'vitest';
import { Logger } from './logger';
import { transpile } from '../lib/transpiler';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes every level to stderr and nothing to stdout', () => {
    const stdout = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new Logger('debug');

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    expect(stdout).not.toHaveBeenCalled();
    expect(stderr.mock.calls).toEqual([['[DEBUG] d'], ['[INFO] i'], ['[WARN] w'], ['[ERROR] e']]);
  });

  it('skips levels below the threshold', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new Logger('warn');

    logger.debug('d');
    logger.info('i');
    logger.warn('w');

    expect(stderr.mock.calls).toEqual([['[WARN] w']]);
  });

  it('keeps stdout clean while a conversion logs debug output', () => {
    const stdout = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    transpile('BEGIN NULL; END;', 'oracle', 'mysql', {}, new Logger('debug'));

    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledWith('[DEBUG] Converting 1 unit(s) from oracle to mysql');
  });
});
