import { config } from 'dotenv';

import { prescriptionsPipeline } from '../pipelines';
import { runPipeline } from '../run-pipeline';

config();

process.exitCode = await runPipeline(prescriptionsPipeline);
