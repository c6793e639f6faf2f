import { describe, expect, test } from 'vitest';

import {
  clientInfoExtractor,
  createClientInfoExtractor,
  extractClientInfo,
  formatGroupedIdentifier,
} from './client-info-extractor';

const CONTRACT = [
  'CONTRAT DE SOINS',
  'Mon nom ou celui de mon ayant droit : DUPONT Jean',
  'Mon numéro : 1 84 12 76 451 089 46',
  'Signature',
].join('\n');

describe('formatGroupedIdentifier', () => {
  test('puts the first digit alone then pairs', () => {
    expect(formatGroupedIdentifier('748012345678901')).toBe(
      '7 48 01 23 45 67 89 01',
    );
  });

  test('leaves a trailing single digit as its own group', () => {
    expect(formatGroupedIdentifier('1234')).toBe('1 23 4');
  });

  test('returns an empty string for no digits', () => {
    expect(formatGroupedIdentifier('')).toBe('');
  });
});

describe('extractClientInfo', () => {
  test('extracts name and regrouped 15-digit identifier', () => {
    expect(extractClientInfo(CONTRACT)).toEqual({
      client_name: 'DUPONT Jean',
      client_number: '1 84 12 76 45 10 89 46',
    });
  });

  test('truncates identifiers longer than 15 digits', () => {
    const info = extractClientInfo('Mon numéro: 748012345678901234');

    expect(info.client_number).toBe('7 48 01 23 45 67 89 01');
  });

  test('keeps original spacing when fewer than 15 digits are found', () => {
    const info = extractClientInfo('Mon numéro - 12 34-56 78 90\nSuite');

    expect(info.client_number).toBe('12 3456 78 90');
  });

  test('ignores identifier spans shorter than 11 characters', () => {
    const info = extractClientInfo('Mon numéro : 12 34 56');

    expect(info.client_number).toBeNull();
  });

  test('honours a custom minimum identifier length', () => {
    const info = extractClientInfo('Mon numéro : 12 34 56', {
      minIdentifierLength: 5,
    });

    expect(info.client_number).toBe('12 34 56');
  });

  test('matches labels case-insensitively across extra whitespace', () => {
    const info = extractClientInfo(
      'MON \t  NUMERO:2 74 01 23 45 67 89 01 23',
    );

    expect(info.client_number).toBe('2 74 01 23 45 67 89 01');
  });

  test('finds an identifier split by non-breaking spaces', () => {
    const info = extractClientInfo(
      'Mon\u00A0numéro :\u00A02\u00A074\u00A001 23 45 67 89 01',
    );

    expect(info.client_number).toBe('2 74 01 23 45 67 89 01');
  });

  test('reads the name from the raw text, keeping inner spacing', () => {
    const info = extractClientInfo(
      'Mon nom ou\tcelui de mon ayant droit\u00A0: Marie  Curie  \nAutre ligne',
    );

    expect(info.client_name).toBe('Marie  Curie');
  });

  test('stops the name at the end of its line', () => {
    const info = extractClientInfo(
      'Mon nom ou celui de mon ayant droit : Jean Dupont\nMon numéro : 1 84 12 76 451 089 46',
    );

    expect(info.client_name).toBe('Jean Dupont');
  });

  test('extracts each field independently', () => {
    expect(
      extractClientInfo('Mon nom ou celui de mon ayant droit - Léa Martin'),
    ).toEqual({ client_name: 'Léa Martin', client_number: null });

    expect(extractClientInfo('Mon numéro 1 84 12 76 451 089 46')).toEqual({
      client_name: null,
      client_number: '1 84 12 76 45 10 89 46',
    });
  });

  test('returns nulls for unrelated text', () => {
    expect(extractClientInfo('Facture n° 2024-118')).toEqual({
      client_name: null,
      client_number: null,
    });
  });

  test('returns nulls for empty text', () => {
    expect(extractClientInfo('')).toEqual({
      client_name: null,
      client_number: null,
    });
  });
});

describe('clientInfoExtractor', () => {
  test('extracts through the strategy interface', () => {
    expect(clientInfoExtractor.name).toBe('client-info');
    expect(clientInfoExtractor.extract(CONTRACT).client_name).toBe(
      'DUPONT Jean',
    );
  });

  test('summarizes fields with explicit nulls', () => {
    expect(
      clientInfoExtractor.summarize({
        client_name: 'DUPONT Jean',
        client_number: null,
      }),
    ).toBe('name=DUPONT Jean, number=null');
  });

  test('passes options through to extraction', () => {
    const extractor = createClientInfoExtractor({ minIdentifierLength: 5 });

    expect(extractor.extract('Mon numéro : 12 34 56').client_number).toBe(
      '12 34 56',
    );
  });
});
