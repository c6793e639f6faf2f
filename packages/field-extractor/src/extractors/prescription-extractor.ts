import type { PrescriptionInfo } from '@ordoscan/model';

import type { FieldExtractor } from './field-extractor';

import { normalizeWhitespace } from '../utils/whitespace';

/** Title, name and parenthesized birth date; all three match or none does */
const PERSON_PATTERN =
  /\b(Monsieur|Madame|Mlle|M\.|Enfant)\s+([A-Za-zÀ-ÿ' \-]+?)\s*\((\d{2}\/\d{2}\/\d{4})\)/i;

/** Signed decimal, comma or dot separator */
const EYE_VALUE = String.raw`\s*[:\-]?\s*([+\-]?\d+(?:[.,]\d+)?)`;

const RIGHT_EYE_PATTERN = new RegExp(
  String.raw`(?:Oeil|Œil)\s*Droit` + EYE_VALUE,
  'i',
);
const LEFT_EYE_PATTERN = new RegExp(
  String.raw`(?:Oeil|Œil)\s*Gauche` + EYE_VALUE,
  'i',
);

function toDotDecimal(value: string): string {
  return value.replace(/,/g, '.');
}

/**
 * Extract patient identity and eye values from the text of a prescription
 * ("ordonnance").
 */
export function parseOrdonnance(text: string): PrescriptionInfo {
  const normalized = normalizeWhitespace(text);

  const person = PERSON_PATTERN.exec(normalized);
  const rightEye = RIGHT_EYE_PATTERN.exec(normalized);
  const leftEye = LEFT_EYE_PATTERN.exec(normalized);

  return {
    title: person ? person[1].trim() : null,
    full_name: person ? person[2].trim() : null,
    birthdate: person ? person[3].trim() : null,
    eye_right: rightEye ? toDotDecimal(rightEye[1]) : null,
    eye_left: leftEye ? toDotDecimal(leftEye[1]) : null,
  };
}

/**
 * Prescription extraction strategy
 */
export const prescriptionExtractor: FieldExtractor<PrescriptionInfo> = {
  name: 'prescription',
  extract: parseOrdonnance,
  summarize: (fields) => {
    const name = fields.full_name
      ? `${fields.title ?? ''} ${fields.full_name}`.trim()
      : null;
    return [
      `name=${name ?? 'null'}`,
      `birthdate=${fields.birthdate ?? 'null'}`,
      `eye_right=${fields.eye_right ?? 'null'}`,
      `eye_left=${fields.eye_left ?? 'null'}`,
    ].join(', ');
  },
};
