export {
  SIGNAL_EXIT_CODE,
  spawnAsync,
  type SpawnAsyncOptions,
  type SpawnResult,
} from './utils/spawn-utils';
export { resolveToolBinary } from './utils/tool-path';
