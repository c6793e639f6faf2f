import type { ResultSet } from '@ordoscan/model';

import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

/** Indentation of the saved JSON */
export const RESULT_SET_INDENT = 4;

/**
 * Serialize records as a JSON array. Non-ASCII characters stay literal and
 * absent fields stay `null`.
 */
export function serializeResultSet<TFields extends object>(
  records: ResultSet<TFields>,
): string {
  return JSON.stringify(records, null, RESULT_SET_INDENT);
}

/**
 * Write the whole result set to `outputFile` in UTF-8, replacing any
 * previous content.
 */
export function writeResultSet<TFields extends object>(
  outputFile: string,
  records: ResultSet<TFields>,
): void {
  mkdirSync(dirname(outputFile), { recursive: true });
  writeFileSync(outputFile, serializeResultSet(records), 'utf-8');
}
