import { ConfigurationError } from '@ordoscan/pdf-text';
import { describe, expect, test } from 'vitest';

import { loadCliConfig } from './env';

describe('loadCliConfig', () => {
  test('defaults to info level and no tool paths', () => {
    expect(loadCliConfig({})).toEqual({
      logLevel: 'info',
      continueOnError: false,
      tools: {
        popplerPath: undefined,
        tesseractPath: undefined,
        tessdataPrefix: undefined,
      },
    });
  });

  test('normalizes the log level', () => {
    expect(loadCliConfig({ LOG_LEVEL: ' DEBUG ' }).logLevel).toBe('debug');
    expect(loadCliConfig({ LOG_LEVEL: '' }).logLevel).toBe('info');
  });

  test('reads CONTINUE_ON_ERROR', () => {
    expect(loadCliConfig({ CONTINUE_ON_ERROR: 'true' }).continueOnError).toBe(
      true,
    );
    expect(loadCliConfig({ CONTINUE_ON_ERROR: ' 1 ' }).continueOnError).toBe(
      true,
    );
    expect(loadCliConfig({ CONTINUE_ON_ERROR: '0' }).continueOnError).toBe(
      false,
    );
    expect(loadCliConfig({ CONTINUE_ON_ERROR: '' }).continueOnError).toBe(
      false,
    );
  });

  test('rejects an unknown CONTINUE_ON_ERROR value', () => {
    expect(() => loadCliConfig({ CONTINUE_ON_ERROR: 'maybe' })).toThrow(
      /^Invalid CLI configuration: CONTINUE_ON_ERROR: /,
    );
  });

  test('reads the tool locations', () => {
    const config = loadCliConfig({
      POPPLER_PATH: '/opt/poppler/bin',
      TESSERACT_PATH: '/usr/local/bin/tesseract',
      TESSDATA_PREFIX: ' ',
    });

    expect(config.tools).toEqual({
      popplerPath: '/opt/poppler/bin',
      tesseractPath: '/usr/local/bin/tesseract',
      tessdataPrefix: undefined,
    });
  });

  test('returns a frozen config', () => {
    expect(Object.isFrozen(loadCliConfig({}))).toBe(true);
  });

  test('rejects an unknown log level', () => {
    expect(() => loadCliConfig({ LOG_LEVEL: 'verbose' })).toThrow(
      ConfigurationError,
    );
    expect(() => loadCliConfig({ LOG_LEVEL: 'verbose' })).toThrow(
      'Invalid CLI configuration: LOG_LEVEL: Expected one of debug, info, warn, error',
    );
  });
});
