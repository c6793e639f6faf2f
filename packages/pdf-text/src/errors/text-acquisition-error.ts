/**
 * TextAcquisitionError
 *
 * Base error class for failures of the external PDF and OCR tools.
 */
export class TextAcquisitionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TextAcquisitionError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}

/**
 * StructuralExtractionError
 *
 * pdfinfo or pdftotext could not read the PDF text layer.
 * Recovered by falling back to OCR.
 */
export class StructuralExtractionError extends TextAcquisitionError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StructuralExtractionError';
  }
}

/**
 * RasterizationError
 *
 * pdftoppm failed to render the PDF pages.
 */
export class RasterizationError extends TextAcquisitionError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RasterizationError';
  }
}

/**
 * OcrError
 *
 * tesseract failed on a rendered page.
 */
export class OcrError extends TextAcquisitionError {
  constructor(
    message: string,
    public readonly imagePath: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'OcrError';
  }
}
