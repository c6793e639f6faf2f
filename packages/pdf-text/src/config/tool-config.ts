import { z } from 'zod';

import { ConfigurationError } from '../errors/configuration-error';

/**
 * Locations of the external tools used for text acquisition.
 *
 * Built once at startup and passed to each component; nothing reads the
 * environment after that.
 */
export interface ToolConfig {
  /** Directory holding pdfinfo, pdftotext and pdftoppm. Required for OCR fallback. */
  readonly popplerPath?: string;
  /** Full path of the tesseract binary. Falls back to `tesseract` on PATH. */
  readonly tesseractPath?: string;
  /** Directory holding tesseract traineddata files */
  readonly tessdataPrefix?: string;
}

/** Blank values count as unset */
const optionalPath = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

/** Zod schema for the tool-location environment variables */
export const toolEnvSchema = z.object({
  POPPLER_PATH: optionalPath,
  TESSERACT_PATH: optionalPath,
  TESSDATA_PREFIX: optionalPath,
});

export type ToolEnv = z.input<typeof toolEnvSchema>;

/**
 * Build a ToolConfig from environment variables.
 *
 * @throws ConfigurationError when a variable is present but not a string
 */
export function loadToolConfig(env: ToolEnv = process.env): ToolConfig {
  const result = toolEnvSchema.safeParse(env);

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid tool configuration: ${details}`, {
      cause: result.error,
    });
  }

  return Object.freeze({
    popplerPath: result.data.POPPLER_PATH,
    tesseractPath: result.data.TESSERACT_PATH,
    tessdataPrefix: result.data.TESSDATA_PREFIX,
  });
}
