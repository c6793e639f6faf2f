import type { SpawnResult } from '@ordoscan/shared';

/**
 * Reason a tool run failed: its stderr, or the signal that killed it
 */
export function describeToolFailure(result: SpawnResult): string {
  const stderr = result.stderr.trim();
  if (stderr) {
    return stderr;
  }
  return result.signal ? `killed by ${result.signal}` : 'Unknown error';
}
