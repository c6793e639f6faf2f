import { describe, expect, test } from 'vitest';

import { describeToolFailure } from './tool-failure';

describe('describeToolFailure', () => {
  test('prefers trimmed stderr', () => {
    expect(
      describeToolFailure({
        stdout: '',
        stderr: '  Syntax Error: Invalid XRef\n',
        code: 1,
        signal: 'SIGKILL',
      }),
    ).toBe('Syntax Error: Invalid XRef');
  });

  test('names the signal when stderr is empty', () => {
    expect(
      describeToolFailure({
        stdout: 'part',
        stderr: '',
        code: 1,
        signal: 'SIGKILL',
      }),
    ).toBe('killed by SIGKILL');
  });

  test('falls back to a generic message', () => {
    expect(describeToolFailure({ stdout: '', stderr: '\n', code: 2 })).toBe(
      'Unknown error',
    );
  });
});
