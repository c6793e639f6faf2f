import type { FieldExtractor } from '@ordoscan/field-extractor';
import type { ClientInfo, PrescriptionInfo } from '@ordoscan/model';

import {
  clientInfoExtractor,
  prescriptionExtractor,
} from '@ordoscan/field-extractor';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

/** apps/cli, where the input folders live */
export const CLI_ROOT = fileURLToPath(new URL('..', import.meta.url));

/**
 * Fixed wiring of one executable: where documents are read from, how they
 * are parsed and where the records go.
 */
export interface PipelinePreset<TFields extends object> {
  /** Executable name, used as log prefix */
  readonly name: string;
  readonly inputDir: string;
  readonly recursive: boolean;
  /** Relative to the working directory */
  readonly outputFile: string;
  readonly extractor: FieldExtractor<TFields>;
}

export const clientsPipeline: PipelinePreset<ClientInfo> = {
  name: 'extract-clients',
  inputDir: join(CLI_ROOT, 'contracts'),
  recursive: false,
  outputFile: 'clients.json',
  extractor: clientInfoExtractor,
};

export const prescriptionsPipeline: PipelinePreset<PrescriptionInfo> = {
  name: 'extract-prescriptions',
  inputDir: join(CLI_ROOT, 'ordonnances'),
  recursive: true,
  outputFile: 'ordonnances.json',
  extractor: prescriptionExtractor,
};
