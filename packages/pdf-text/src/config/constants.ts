/**
 * Configuration constants for TextAcquirer
 */
export const TEXT_ACQUISITION = {
  /**
   * A text layer is accepted only when it has strictly more characters than
   * this. Scanned PDFs often carry a few characters of metadata text; 30 is
   * an empirical cutoff, not a derived one.
   */
  MIN_STRUCTURAL_TEXT_LENGTH: 30,

  /**
   * Prefix of the temporary working directory holding rendered pages
   */
  WORK_DIR_PREFIX: 'ordoscan-',
} as const;

/**
 * Configuration constants for PageRenderer
 */
export const PAGE_RENDERER = {
  /**
   * Rasterization DPI. High enough for small print to survive OCR.
   */
  DPI: 400,

  /**
   * File name root passed to pdftoppm (pages become page-1.png, page-2.png...)
   */
  PAGE_FILE_ROOT: 'page',
} as const;

/**
 * Configuration constants for OcrEngine
 */
export const OCR_ENGINE = {
  /**
   * Tesseract language. "eng" reads digits reliably; "fra" needs its
   * traineddata installed under TESSDATA_PREFIX.
   */
  LANGUAGE: 'eng',

  /**
   * OCR engine mode: default, based on what is available
   */
  ENGINE_MODE: 3,

  /**
   * Page segmentation mode: a single uniform block of text
   */
  PAGE_SEGMENTATION_MODE: 6,
} as const;
