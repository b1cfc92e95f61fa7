import { describe, it, expect, vi } from 'vitest';
import { Logger, parseLogLevel } from '../../src/core/logger';

describe('Logger', () => {
  it('writes timestamped lines with the level and context', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    new Logger('Test', 'info').info('hello');

    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO \] \[Test\] hello$/);
  });

  it('hides messages below the minimum level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const logger = new Logger('Test', 'warn');
    logger.debug('noise');
    logger.warn('careful');

    expect(debug).not.toHaveBeenCalled();
    expect(warn.mock.calls[0][0]).toContain('[WARN ] [Test] careful');
  });

  it('prints the error object on its own line', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const boom = new Error('boom');

    new Logger('Test', 'info').error('failed', boom);

    expect(error).toHaveBeenCalledTimes(2);
    expect(error.mock.calls[0][0]).toContain('[ERROR] [Test] failed');
    expect(error.mock.calls[1][0]).toBe(boom);
  });

  it('derives child contexts', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    new Logger('Test', 'info').child('abc').info('step');

    expect(log.mock.calls[0][0]).toContain('[Test:abc] step');
  });
});

describe('parseLogLevel', () => {
  it('accepts known levels case-insensitively and defaults to info', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel('warning')).toBe('warn');
    expect(parseLogLevel(undefined)).toBe('info');
    expect(parseLogLevel('verbose')).toBe('info');
  });
});
