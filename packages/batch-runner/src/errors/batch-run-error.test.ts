import { describe, expect, test } from 'vitest';

import {
  BatchRunError,
  DirectoryNotFoundError,
  NoInputError,
} from './batch-run-error';

describe('BatchRunError', () => {
  test('getErrorMessage reads Error instances and other values', () => {
    expect(BatchRunError.getErrorMessage(new Error('boom'))).toBe('boom');
    expect(BatchRunError.getErrorMessage(undefined)).toBe('undefined');
  });
});

describe('DirectoryNotFoundError', () => {
  test('names the missing directory', () => {
    const error = new DirectoryNotFoundError('/data/contracts');

    expect(error.name).toBe('DirectoryNotFoundError');
    expect(error.message).toBe('Input directory not found: /data/contracts');
    expect(error.directory).toBe('/data/contracts');
    expect(error).toBeInstanceOf(BatchRunError);
  });
});

describe('NoInputError', () => {
  test('names the directory and extension', () => {
    const error = new NoInputError('/data/ordonnances', '.pdf');

    expect(error.name).toBe('NoInputError');
    expect(error.message).toBe('No .pdf files found in: /data/ordonnances');
    expect(error.extension).toBe('.pdf');
    expect(error).toBeInstanceOf(BatchRunError);
  });
});
