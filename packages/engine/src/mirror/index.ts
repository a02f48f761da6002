export { MirrorEngine } from './mirror-engine.js';
export type { TypedMirrorEngineEmitter, MirrorRemotes } from './mirror-engine.js';
export { buildMirrorConfig, validateMirrorConfig, resolveDestination } from './config.js';
export { planRequest, emptyRequest } from './request.js';
export {
  assetLabel,
  formatAlbumName,
  listAssetLabels,
  listAlbumAssetLabels,
  listAlbumNames,
} from './listing.js';
export type {
  MirrorConfig,
  MirrorRequest,
  RequestPlan,
  MirrorRunResult,
  RunPhase,
  MirrorEngineEvents,
} from './types.js';
export { DEFAULT_MIRROR_CONFIG } from './types.js';
