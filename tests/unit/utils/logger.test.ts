import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, isLogLevel } from '../../../src/utils/logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should recognize log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });

  it('should write info lines to stderr with the prefix', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    createLogger({ level: 'info', prefix: 'test' }).info('hello', { rows: 2 });

    expect(write).toHaveBeenCalledWith('[test] INFO: hello {"rows":2}\n');
  });

  it('should drop messages above the configured level', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = createLogger({ level: 'warn' });
    logger.info('quiet');
    logger.debug('quieter');

    expect(write).not.toHaveBeenCalled();
  });

  it('should change level at runtime', () => {
    const logger = createLogger({ level: 'error' });
    logger.setLevel('debug');

    expect(logger.getLevel()).toBe('debug');
  });
});
