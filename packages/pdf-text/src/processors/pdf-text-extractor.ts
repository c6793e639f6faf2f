import type { LoggerMethods } from '@ordoscan/logger';

import type { ToolConfig } from '../config/tool-config';

import { resolveToolBinary, spawnAsync } from '@ordoscan/shared';

import { StructuralExtractionError } from '../errors/text-acquisition-error';
import { describeToolFailure } from '../utils/tool-failure';

/**
 * Reads the embedded text layer of a PDF with Poppler's pdftotext.
 *
 * Unlike the OCR path this never renders pixels. Every failure is thrown as
 * a StructuralExtractionError (or the spawn error itself when the binary is
 * missing); callers decide whether that is fatal.
 *
 * ## System Requirements
 * - Poppler utils (`pdfinfo`, `pdftotext`), on PATH or under POPPLER_PATH
 */
export class PdfTextExtractor {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly config: ToolConfig = {},
  ) {}

  /**
   * Extract the text of every page, in page order.
   *
   * @param pdfPath - Path to the source PDF file
   * @returns One string per page, form feeds removed (may be empty)
   */
  async extractText(pdfPath: string): Promise<string[]> {
    const totalPages = await this.getPageCount(pdfPath);
    const pageTexts: string[] = [];

    for (let page = 1; page <= totalPages; page++) {
      pageTexts.push(await this.extractPageText(pdfPath, page));
    }

    const nonEmptyCount = pageTexts.filter((t) => t.trim().length > 0).length;
    this.logger.debug(
      `[PdfTextExtractor] Extracted text from ${nonEmptyCount}/${totalPages} pages`,
    );

    return pageTexts;
  }

  /**
   * Get total page count of a PDF using pdfinfo.
   */
  async getPageCount(pdfPath: string): Promise<number> {
    const result = await spawnAsync(this.binary('pdfinfo'), [pdfPath]);
    if (result.code !== 0) {
      throw new StructuralExtractionError(
        `pdfinfo failed: ${describeToolFailure(result)}`,
      );
    }

    const match = result.stdout.match(/^Pages:\s+(\d+)/m);
    if (!match) {
      throw new StructuralExtractionError(
        'pdfinfo output has no page count',
      );
    }
    return parseInt(match[1], 10);
  }

  /**
   * Extract text from a single 1-based page using pdftotext.
   */
  async extractPageText(pdfPath: string, page: number): Promise<string> {
    const result = await spawnAsync(this.binary('pdftotext'), [
      '-f',
      page.toString(),
      '-l',
      page.toString(),
      '-enc',
      'UTF-8',
      pdfPath,
      '-',
    ]);

    if (result.code !== 0) {
      throw new StructuralExtractionError(
        `pdftotext failed for page ${page}: ${describeToolFailure(result)}`,
      );
    }

    return result.stdout.replace(/\f/g, '');
  }

  private binary(name: string): string {
    return resolveToolBinary(name, this.config.popplerPath);
  }
}
