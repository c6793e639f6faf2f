import type { TextSource } from '@ordoscan/batch-runner';
import type { LogLevel, LoggerMethods } from '@ordoscan/logger';
import type { ToolConfig } from '@ordoscan/pdf-text';

import type { PipelinePreset } from './pipelines';

import { BatchRunner } from '@ordoscan/batch-runner';
import { createConsoleLogger } from '@ordoscan/logger';
import { TextAcquirer } from '@ordoscan/pdf-text';
import { resolve } from 'node:path';

import { type Environment, loadCliConfig } from './config/env';

/** Process exit codes */
export const EXIT_CODE = {
  SUCCESS: 0,
  FAILURE: 1,
} as const;

export interface RunPipelineOptions {
  /** Defaults to process.env */
  env?: Environment;
  /** Base of the output file (default: process.cwd()) */
  cwd?: string;
  console?: Pick<Console, LogLevel>;
  /** Defaults to a TextAcquirer on the configured tools */
  createTextSource?: (logger: LoggerMethods, tools: ToolConfig) => TextSource;
}

function describeError(error: unknown): string {
  return error instanceof Error
    ? `${error.name}: ${error.message}`
    : String(error);
}

/**
 * Run one preset end to end and report the outcome as an exit code.
 * Every failure is logged here; nothing is rethrown.
 */
export async function runPipeline<TFields extends object>(
  preset: PipelinePreset<TFields>,
  options: RunPipelineOptions = {},
): Promise<number> {
  const {
    env = process.env,
    cwd = process.cwd(),
    console: target = console,
    createTextSource = (logger, tools) => new TextAcquirer(logger, tools),
  } = options;

  let logger: LoggerMethods = createConsoleLogger({ console: target });

  try {
    const config = loadCliConfig(env);
    logger = createConsoleLogger({ level: config.logLevel, console: target });

    const runner = new BatchRunner(
      logger,
      createTextSource(logger, config.tools),
      preset.extractor,
      {
        outputFile: resolve(cwd, preset.outputFile),
        continueOnError: config.continueOnError,
      },
    );
    await runner.run(preset.inputDir, { recursive: preset.recursive });

    return EXIT_CODE.SUCCESS;
  } catch (error) {
    logger.error(`[${preset.name}] ${describeError(error)}`);
    return EXIT_CODE.FAILURE;
  }
}
