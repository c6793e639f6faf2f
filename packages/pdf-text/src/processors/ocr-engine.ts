import type { LoggerMethods } from '@ordoscan/logger';

import type { ToolConfig } from '../config/tool-config';

import { spawnAsync } from '@ordoscan/shared';

import { OCR_ENGINE } from '../config/constants';
import { OcrError } from '../errors/text-acquisition-error';
import { describeToolFailure } from '../utils/tool-failure';

/** Options for a single recognition */
export interface OcrOptions {
  /** Tesseract language code (default: 'eng') */
  language?: string;
}

/**
 * Runs the tesseract command-line binary on a page image.
 *
 * Engine and page segmentation modes are fixed (`--oem 3 --psm 6`), tuned
 * for forms made of short blocks of text.
 *
 * ## System Requirements
 * - Tesseract (`tesseract`), on PATH or at TESSERACT_PATH
 * - Language data under TESSDATA_PREFIX when not installed system-wide
 */
export class OcrEngine {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly config: ToolConfig = {},
  ) {}

  /**
   * Recognize the text of one image.
   *
   * @param imagePath - Path to a rendered page image
   * @returns Raw tesseract output, untrimmed
   */
  async recognize(imagePath: string, options?: OcrOptions): Promise<string> {
    const language = options?.language ?? OCR_ENGINE.LANGUAGE;

    this.logger.debug(`[OcrEngine] Recognizing ${imagePath} (${language})`);

    const result = await spawnAsync(
      this.config.tesseractPath ?? 'tesseract',
      [
        imagePath,
        'stdout',
        '-l',
        language,
        '--oem',
        OCR_ENGINE.ENGINE_MODE.toString(),
        '--psm',
        OCR_ENGINE.PAGE_SEGMENTATION_MODE.toString(),
      ],
      { env: this.buildEnv() },
    );

    if (result.code !== 0) {
      throw new OcrError(
        `[OcrEngine] tesseract failed: ${describeToolFailure(result)}`,
        imagePath,
      );
    }

    return result.stdout;
  }

  private buildEnv(): NodeJS.ProcessEnv {
    if (!this.config.tessdataPrefix) {
      return process.env;
    }
    return { ...process.env, TESSDATA_PREFIX: this.config.tessdataPrefix };
  }
}
