import { describe, expect, test, vi } from 'vitest';

import { Logger, createConsoleLogger, isLogLevel } from './index';

function createMockConsole() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

describe('Logger', () => {
  test('exposes the methods it was built with', () => {
    const methods = createMockConsole();
    const logger = new Logger(methods);

    logger.warn('[Test] careful', 42);

    expect(methods.warn).toHaveBeenCalledWith('[Test] careful', 42);
    expect(logger.debug).toBe(methods.debug);
  });
});

describe('createConsoleLogger', () => {
  test('defaults to info level and drops debug messages', () => {
    const target = createMockConsole();
    const logger = createConsoleLogger({ console: target });

    logger.debug('hidden');
    logger.info('shown');

    expect(target.debug).not.toHaveBeenCalled();
    expect(target.info).toHaveBeenCalledWith('shown');
  });

  test('forwards every level when set to debug', () => {
    const target = createMockConsole();
    const logger = createConsoleLogger({ level: 'debug', console: target });

    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    logger.error('d');

    expect(target.debug).toHaveBeenCalledWith('a');
    expect(target.info).toHaveBeenCalledWith('b');
    expect(target.warn).toHaveBeenCalledWith('c');
    expect(target.error).toHaveBeenCalledWith('d');
  });

  test('keeps only errors at error level', () => {
    const target = createMockConsole();
    const logger = createConsoleLogger({ level: 'error', console: target });

    logger.info('no');
    logger.warn('no');
    logger.error('yes', new Error('boom'));

    expect(target.info).not.toHaveBeenCalled();
    expect(target.warn).not.toHaveBeenCalled();
    expect(target.error).toHaveBeenCalledTimes(1);
  });
});

describe('isLogLevel', () => {
  test('accepts known levels only', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
