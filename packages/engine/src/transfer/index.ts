export { planTransfer } from './transfer-planner.js';
export {
  writeChunks,
  progressStep,
  PROGRESS_REPORTS_PER_FILE,
  PROGRESS_MIN_STEP_BYTES,
} from './byte-sink.js';
export type { WriteChunksOptions } from './byte-sink.js';
export { ItemFetcher } from './item-fetcher.js';
export { ensureDirectory } from './local-fs.js';
export type {
  TransferDecision,
  WriteMode,
  SkipPlan,
  FreshPlan,
  ResumePlan,
  TransferPlan,
  ProgressEvent,
  FetchResult,
  TransferReporter,
  IOErrorPolicy,
  FetchOptions,
} from './types.js';
