import { describe, expect, test } from 'vitest';

import { ConfigurationError } from '../errors/configuration-error';
import { loadToolConfig } from './tool-config';

describe('loadToolConfig', () => {
  test('reads all tool locations', () => {
    const config = loadToolConfig({
      POPPLER_PATH: '/opt/poppler/bin',
      TESSERACT_PATH: '/usr/local/bin/tesseract',
      TESSDATA_PREFIX: '/usr/share/tessdata',
    });

    expect(config).toEqual({
      popplerPath: '/opt/poppler/bin',
      tesseractPath: '/usr/local/bin/tesseract',
      tessdataPrefix: '/usr/share/tessdata',
    });
  });

  test('leaves missing variables undefined', () => {
    const config = loadToolConfig({});

    expect(config.popplerPath).toBeUndefined();
    expect(config.tesseractPath).toBeUndefined();
    expect(config.tessdataPrefix).toBeUndefined();
  });

  test('treats blank values as unset and trims the rest', () => {
    const config = loadToolConfig({
      POPPLER_PATH: '   ',
      TESSERACT_PATH: '',
      TESSDATA_PREFIX: ' /data/tessdata ',
    });

    expect(config.popplerPath).toBeUndefined();
    expect(config.tesseractPath).toBeUndefined();
    expect(config.tessdataPrefix).toBe('/data/tessdata');
  });

  test('ignores unrelated variables', () => {
    const config = loadToolConfig({
      POPPLER_PATH: '/opt/poppler/bin',
      HOME: '/home/test',
    } as Record<string, string>);

    expect(Object.keys(config).sort()).toEqual([
      'popplerPath',
      'tessdataPrefix',
      'tesseractPath',
    ]);
  });

  test('returns a frozen object', () => {
    expect(Object.isFrozen(loadToolConfig({}))).toBe(true);
  });

  test('throws ConfigurationError for non-string values', () => {
    const env = { POPPLER_PATH: 42 } as unknown as Record<string, string>;

    expect(() => loadToolConfig(env)).toThrow(ConfigurationError);
    expect(() => loadToolConfig(env)).toThrow(
      /^Invalid tool configuration: POPPLER_PATH: /,
    );
  });
});
