/**
 * Configuration constants for the client contract extractor
 */
export const CLIENT_INFO = {
  /**
   * Minimum length of the identifier span captured after "Mon numéro"
   * (first digit included). Shorter runs are treated as unrelated numbers.
   */
  MIN_IDENTIFIER_CAPTURE_LENGTH: 11,

  /**
   * Number of digits in a complete identifier
   */
  IDENTIFIER_DIGITS: 15,
} as const;
