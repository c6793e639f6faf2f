/**
 * Fields read from an eyeglass prescription ("ordonnance")
 *
 * `title`, `full_name` and `birthdate` come from a single pattern and are
 * null together when it does not match.
 */
export interface PrescriptionInfo {
  /** "Monsieur", "Madame", "Mlle", "M." or "Enfant", as written */
  title: string | null;
  full_name: string | null;
  /** Literal dd/mm/yyyy */
  birthdate: string | null;
  /** Right eye value with "." as decimal separator, sign kept */
  eye_right: string | null;
  /** Left eye value with "." as decimal separator, sign kept */
  eye_left: string | null;
}

/**
 * Persisted record for one prescription
 */
export interface PrescriptionRecord extends PrescriptionInfo {
  /**
   * Basename of the source PDF
   */
  file: string;
}
