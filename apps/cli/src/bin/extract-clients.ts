import { config } from 'dotenv';

import { clientsPipeline } from '../pipelines';
import { runPipeline } from '../run-pipeline';

config();

process.exitCode = await runPipeline(clientsPipeline);
