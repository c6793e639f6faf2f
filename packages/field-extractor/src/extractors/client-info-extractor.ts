import type { ClientInfo } from '@ordoscan/model';

import type { FieldExtractor } from './field-extractor';

import { CLIENT_INFO } from '../config/constants';
import { normalizeWhitespace } from '../utils/whitespace';

/** Options for client contract extraction */
export interface ClientInfoExtractorOptions {
  /** Minimum captured identifier span, first digit included (default: 11) */
  minIdentifierLength?: number;
}

/** Name line; matched on the raw text so it cannot cross a line break */
const NAME_PATTERN =
  /Mon\s+nom\s+ou\s+celui\s+de\s+mon\s+ayant\s+droit\s*[:\-]?\s*([^\n]+)/i;

function buildIdentifierPattern(minLength: number): RegExp {
  const repeat = Math.max(minLength, 1) - 1;
  return new RegExp(
    `Mon\\s+num[eé]ro\\s*[:\\-]?\\s*([0-9][0-9 \\-]{${repeat},})`,
    'i',
  );
}

/**
 * Format a digit string as its first digit followed by pairs.
 *
 * @example
 * formatGroupedIdentifier('274012345678901'); // '2 74 01 23 45 67 89 01'
 */
export function formatGroupedIdentifier(digits: string): string {
  if (digits.length === 0) {
    return '';
  }

  const groups = [digits[0]];
  for (let i = 1; i < digits.length; i += 2) {
    groups.push(digits.slice(i, i + 2));
  }
  return groups.join(' ');
}

function normalizeIdentifier(captured: string): string {
  const digits = captured.replace(/\D/g, '');

  if (digits.length >= CLIENT_INFO.IDENTIFIER_DIGITS) {
    return formatGroupedIdentifier(
      digits.slice(0, CLIENT_INFO.IDENTIFIER_DIGITS),
    );
  }

  // Too short to regroup: keep the spacing found in the document
  return captured.replace(/[^0-9 ]/g, '').trim();
}

/**
 * Extract the client name and identifier from the text of a contract.
 *
 * The identifier follows "Mon numéro"; the name is the rest of the line
 * after "Mon nom ou celui de mon ayant droit". Either may be null.
 */
export function extractClientInfo(
  text: string,
  options: ClientInfoExtractorOptions = {},
): ClientInfo {
  const normalized = normalizeWhitespace(text);
  const identifierPattern = buildIdentifierPattern(
    options.minIdentifierLength ?? CLIENT_INFO.MIN_IDENTIFIER_CAPTURE_LENGTH,
  );

  const numberMatch = identifierPattern.exec(normalized);
  const nameMatch = NAME_PATTERN.exec(text);

  return {
    client_name: nameMatch ? nameMatch[1].trim() : null,
    client_number: numberMatch
      ? normalizeIdentifier(numberMatch[1].trim())
      : null,
  };
}

/**
 * Build the client contract extraction strategy
 */
export function createClientInfoExtractor(
  options: ClientInfoExtractorOptions = {},
): FieldExtractor<ClientInfo> {
  return {
    name: 'client-info',
    extract: (text) => extractClientInfo(text, options),
    summarize: (fields) =>
      `name=${fields.client_name ?? 'null'}, number=${fields.client_number ?? 'null'}`,
  };
}

export const clientInfoExtractor = createClientInfoExtractor();
