/**
 * Fields read from a client contract
 *
 * Each field is independently nullable: a missing name never prevents the
 * identifier from being reported, and the reverse.
 */
export interface ClientInfo {
  /**
   * Text following "Mon nom ou celui de mon ayant droit", trimmed
   */
  client_name: string | null;

  /**
   * Client identifier
   *
   * With 15 or more digits captured, the first 15 are re-grouped as the
   * first digit then seven pairs ("2 74 01 23 45 67 89 01"). Shorter
   * captures keep their original spacing, with every character other than
   * digits and spaces removed.
   */
  client_number: string | null;
}

/**
 * Persisted record for one client contract
 */
export interface ClientRecord extends ClientInfo {
  /**
   * Basename of the source PDF
   */
  file: string;
}
