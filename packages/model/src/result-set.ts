/**
 * Shape shared by every persisted record
 */
export interface FileRecord {
  /**
   * Basename of the source PDF
   */
  file: string;
}

/**
 * Record produced for one document: the extracted fields plus its file name
 */
export type ExtractedRecord<TFields extends object> = FileRecord & TFields;

/**
 * Records of one batch run, in sorted document discovery order
 */
export type ResultSet<TFields extends object> = ExtractedRecord<TFields>[];
