import { join } from 'node:path';

/**
 * Resolve the executable for an external tool.
 *
 * When `directory` is set the binary is looked up inside it, otherwise the
 * bare name is returned and resolved through PATH by the OS.
 */
export function resolveToolBinary(
  binary: string,
  directory?: string,
): string {
  return directory ? join(directory, binary) : binary;
}
