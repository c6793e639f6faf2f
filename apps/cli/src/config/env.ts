import type { LogLevel } from '@ordoscan/logger';
import type { ToolConfig } from '@ordoscan/pdf-text';

import { LOG_LEVELS, isLogLevel } from '@ordoscan/logger';
import { ConfigurationError, loadToolConfig } from '@ordoscan/pdf-text';
import { z } from 'zod';

/** Environment variables as found on `process.env` */
export type Environment = Record<string, string | undefined>;

/** Zod schema for the CLI-only environment variables */
export const cliEnvSchema = z.object({
  LOG_LEVEL: z
    .string()
    .optional()
    .transform((value) => value?.trim().toLowerCase() || 'info')
    .refine(isLogLevel, {
      message: `Expected one of ${LOG_LEVELS.join(', ')}`,
    }),
  CONTINUE_ON_ERROR: z
    .string()
    .optional()
    .transform((value) => value?.trim().toLowerCase() || 'false')
    .pipe(z.enum(['true', 'false', '1', '0']))
    .transform((value) => value === 'true' || value === '1'),
});

/** Resolved settings for one CLI invocation */
export interface CliConfig {
  readonly logLevel: LogLevel;
  /** Skip documents whose text cannot be acquired instead of aborting */
  readonly continueOnError: boolean;
  readonly tools: ToolConfig;
}

/**
 * Read the CLI settings from the environment. `.env` must already be loaded.
 *
 * @throws ConfigurationError when a variable has an invalid value
 */
export function loadCliConfig(env: Environment = process.env): CliConfig {
  const result = cliEnvSchema.safeParse(env);

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid CLI configuration: ${details}`, {
      cause: result.error,
    });
  }

  return Object.freeze({
    logLevel: result.data.LOG_LEVEL,
    continueOnError: result.data.CONTINUE_ON_ERROR,
    tools: loadToolConfig(env),
  });
}
