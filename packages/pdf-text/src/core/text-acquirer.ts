import type { LoggerMethods } from '@ordoscan/logger';

import type { ToolConfig } from '../config/tool-config';

import { accessSync, constants, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import {
  OCR_ENGINE,
  PAGE_RENDERER,
  TEXT_ACQUISITION,
} from '../config/constants';
import { TextAcquisitionError } from '../errors/text-acquisition-error';
import { OcrEngine } from '../processors/ocr-engine';
import { PageRenderer } from '../processors/page-renderer';
import { PdfTextExtractor } from '../processors/pdf-text-extractor';

/**
 * Outcome of reading the PDF text layer
 */
export type StructuralAttempt =
  | { kind: 'structural'; text: string }
  | { kind: 'needs-ocr'; reason: string };

/** Tuning options for TextAcquirer */
export interface TextAcquirerOptions {
  /** Text layer must be strictly longer than this to be used (default: 30) */
  minStructuralTextLength?: number;
  /** Rasterization DPI for the OCR fallback (default: 400) */
  dpi?: number;
  /** Tesseract language for the OCR fallback (default: 'eng') */
  ocrLanguage?: string;
}

/** Collaborators, replaceable for tests */
export interface TextAcquirerDependencies {
  textExtractor: Pick<PdfTextExtractor, 'extractText'>;
  pageRenderer: Pick<PageRenderer, 'renderPages'>;
  ocrEngine: Pick<OcrEngine, 'recognize'>;
}

/**
 * Produces the full text of a PDF.
 *
 * The embedded text layer is tried first. When it cannot be read, or is too
 * short to belong to a real text PDF, every page is rendered and OCR'd
 * instead. The result is one or the other, never a merge.
 */
export class TextAcquirer {
  private readonly minStructuralTextLength: number;
  private readonly dpi: number;
  private readonly ocrLanguage: string;
  private readonly textExtractor: Pick<PdfTextExtractor, 'extractText'>;
  private readonly pageRenderer: Pick<PageRenderer, 'renderPages'>;
  private readonly ocrEngine: Pick<OcrEngine, 'recognize'>;

  constructor(
    private readonly logger: LoggerMethods,
    config: ToolConfig,
    options: TextAcquirerOptions = {},
    dependencies: Partial<TextAcquirerDependencies> = {},
  ) {
    this.minStructuralTextLength =
      options.minStructuralTextLength ??
      TEXT_ACQUISITION.MIN_STRUCTURAL_TEXT_LENGTH;
    this.dpi = options.dpi ?? PAGE_RENDERER.DPI;
    this.ocrLanguage = options.ocrLanguage ?? OCR_ENGINE.LANGUAGE;
    this.textExtractor =
      dependencies.textExtractor ?? new PdfTextExtractor(logger, config);
    this.pageRenderer =
      dependencies.pageRenderer ?? new PageRenderer(logger, config);
    this.ocrEngine = dependencies.ocrEngine ?? new OcrEngine(logger, config);
  }

  /**
   * Acquire the text of a PDF.
   *
   * @param pdfPath - Path to the source PDF file
   * @returns Trimmed text-layer text, or the page-joined OCR output as-is
   * @throws the filesystem error when the file cannot be read
   * @throws ConfigurationError when OCR is needed and POPPLER_PATH is unset
   */
  async acquireText(pdfPath: string): Promise<string> {
    accessSync(pdfPath, constants.R_OK);

    const attempt = await this.attemptStructural(pdfPath);
    if (attempt.kind === 'structural') {
      this.logger.debug(
        `[TextAcquirer] Using text layer (${attempt.text.length} chars): ${pdfPath}`,
      );
      return attempt.text;
    }

    this.logger.info(
      `[TextAcquirer] Falling back to OCR for ${pdfPath}: ${attempt.reason}`,
    );
    return this.recognizePages(pdfPath);
  }

  /**
   * Read the text layer and decide whether it is usable.
   * Never throws: any extraction failure becomes `needs-ocr`.
   */
  async attemptStructural(pdfPath: string): Promise<StructuralAttempt> {
    let text: string;
    try {
      const pageTexts = await this.textExtractor.extractText(pdfPath);
      text = pageTexts
        .filter((pageText) => pageText.length > 0)
        .join('\n')
        .trim();
    } catch (error) {
      const reason = TextAcquisitionError.getErrorMessage(error);
      this.logger.debug(`[TextAcquirer] Text layer unreadable: ${reason}`);
      return { kind: 'needs-ocr', reason: `text layer unreadable (${reason})` };
    }

    if (text.length > this.minStructuralTextLength) {
      return { kind: 'structural', text };
    }

    return {
      kind: 'needs-ocr',
      reason: `text layer has ${text.length} characters, more than ${this.minStructuralTextLength} required`,
    };
  }

  private async recognizePages(pdfPath: string): Promise<string> {
    const workDir = mkdtempSync(
      join(tmpdir(), TEXT_ACQUISITION.WORK_DIR_PREFIX),
    );

    try {
      const { pageFiles } = await this.pageRenderer.renderPages(
        pdfPath,
        workDir,
        { dpi: this.dpi },
      );

      const pageTexts: string[] = [];
      for (const pageFile of pageFiles) {
        pageTexts.push(
          await this.ocrEngine.recognize(pageFile, {
            language: this.ocrLanguage,
          }),
        );
      }

      this.logger.debug(
        `[TextAcquirer] OCR completed for ${pageTexts.length} pages: ${pdfPath}`,
      );
      return pageTexts.join('\n');
    } finally {
      rmSync(workDir, { recursive: true, force: true });
    }
  }
}
