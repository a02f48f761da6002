// Errors
export {
  MirrorError,
  NotFoundError,
  LocalIOError,
  TransferError,
  errorMessage,
} from './errors.js';
export type { MirrorErrorCode } from './errors.js';

// Remote contract and S3 adapter
export * from './remote/index.js';

// Transfer pipeline
export * from './transfer/index.js';

// Walkers
export { TreeWalker, CollectionWalker } from './walk/index.js';

// Mirror runs
export * from './mirror/index.js';
