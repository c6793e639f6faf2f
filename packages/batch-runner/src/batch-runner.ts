import type { FieldExtractor } from '@ordoscan/field-extractor';
import type { LoggerMethods } from '@ordoscan/logger';
import type {
  ExtractedRecord,
  ResultSet,
  SourceDocument,
} from '@ordoscan/model';

import { ConfigurationError } from '@ordoscan/pdf-text';

import { findDocuments } from './discovery/document-finder';
import { BatchRunError } from './errors/batch-run-error';
import { writeResultSet } from './output/result-writer';

/**
 * Anything that turns a PDF path into its text. TextAcquirer in production.
 */
export interface TextSource {
  acquireText(pdfPath: string): Promise<string>;
}

/** Options for BatchRunner */
export interface BatchRunnerOptions {
  /** Write the result set here once every document is processed */
  outputFile?: string;
  /**
   * Log and skip a document whose text cannot be acquired instead of
   * aborting the batch (default: false). ConfigurationError always aborts.
   */
  continueOnError?: boolean;
  /** Document extension, dot included (default: '.pdf') */
  extension?: string;
}

/** Options for a single run */
export interface RunOptions {
  /** Descend into subdirectories of the input directory (default: false) */
  recursive?: boolean;
}

/**
 * BatchRunner
 *
 * Walks a directory of PDFs in sorted order, one document at a time:
 * acquire text, extract fields, tag the record with the file name. The
 * result set is written in a single pass after the last document, so an
 * aborted run leaves any previous output untouched.
 */
export class BatchRunner<TFields extends object> {
  private readonly continueOnError: boolean;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly textSource: TextSource,
    private readonly extractor: FieldExtractor<TFields>,
    private readonly options: BatchRunnerOptions = {},
  ) {
    this.continueOnError = options.continueOnError ?? false;
  }

  async run(
    inputDir: string,
    options: RunOptions = {},
  ): Promise<ResultSet<TFields>> {
    const documents = findDocuments(inputDir, {
      recursive: options.recursive ?? false,
      extension: this.options.extension,
    });

    this.logger.info(
      `[BatchRunner] Running ${this.extractor.name} extraction on ${documents.length} documents from ${inputDir}`,
    );

    const records: ResultSet<TFields> = [];
    let skipped = 0;

    for (const [index, document] of documents.entries()) {
      const position = `(${index + 1}/${documents.length})`;
      const record = await this.processDocument(document, position);

      if (record === null) {
        skipped++;
        continue;
      }

      records.push(record);
    }

    if (skipped > 0) {
      this.logger.warn(
        `[BatchRunner] Skipped ${skipped} of ${documents.length} documents`,
      );
    }

    if (this.options.outputFile) {
      writeResultSet(this.options.outputFile, records);
      this.logger.info(
        `[BatchRunner] Saved ${records.length} records to ${this.options.outputFile}`,
      );
    }

    return records;
  }

  /**
   * @returns The record, or null when the document was skipped
   */
  private async processDocument(
    document: SourceDocument,
    position: string,
  ): Promise<ExtractedRecord<TFields> | null> {
    let text: string;
    try {
      text = await this.textSource.acquireText(document.path);
    } catch (error) {
      if (!this.continueOnError || error instanceof ConfigurationError) {
        throw error;
      }
      this.logger.error(
        `[BatchRunner] ${position} ${document.basename}: skipped, ${BatchRunError.getErrorMessage(error)}`,
      );
      return null;
    }

    const fields = this.extractor.extract(text);
    this.logger.info(
      `[BatchRunner] ${position} ${document.basename}: ${this.extractor.summarize(fields)}`,
    );

    return { file: document.basename, ...fields };
  }
}
