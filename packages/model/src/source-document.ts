/**
 * A PDF discovered in the input directory
 *
 * Created once at scan time and consumed once by the pipeline.
 */
export interface SourceDocument {
  /**
   * Absolute path to the file
   */
  readonly path: string;

  /**
   * File name without its directory (e.g. "contrat-2024.pdf")
   *
   * Written to the `file` field of the extracted record.
   */
  readonly basename: string;
}
