export { S3RemoteStore, ALBUM_METADATA_FILE } from './s3-remote-store.js';
export { MemoryRemoteStore, memoryFile, memoryFolder } from './memory-remote-store.js';
export type {
  MemoryFile,
  MemoryFolder,
  MemoryEntry,
  MemoryAsset,
  MemoryAlbum,
  MemoryRemoteContents,
  MemoryRequest,
} from './memory-remote-store.js';
export {
  buildS3RemoteConfig,
  validateS3RemoteConfig,
  normalizePrefix,
  DEFAULT_S3_REMOTE_CONFIG,
} from './config.js';
export type { S3RemoteConfig } from './config.js';
export { assetFileName, expectedAssetSize, isPathSegment, rangeFrom } from './types.js';
export type {
  ByteStream,
  RangeHeaders,
  RemoteFolder,
  RemoteFile,
  RemoteNode,
  AssetVersion,
  MediaAsset,
  Album,
  AlbumIndex,
  RemoteDrive,
  PhotoLibrary,
} from './types.js';
