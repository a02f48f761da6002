/**
 * Capability contract between the mirror engine and a remote store.
 *
 * The engine only reads through these interfaces; session setup and
 * credentials belong to whoever constructs the implementation.
 */

/** A block-wise byte stream returned by a remote download call */
export type ByteStream = AsyncIterable<Uint8Array>;

/** Request headers for a partial download (`bytes=<offset>-`) */
export interface RangeHeaders {
  Range: string;
}

/** A folder in the remote drive */
export interface RemoteFolder {
  kind: 'folder';

  /** Last path segment */
  name: string;

  /** Path relative to the drive root ('' for the root itself) */
  path: string;
}

/** A file in the remote drive */
export interface RemoteFile {
  kind: 'file';

  /** Last path segment */
  name: string;

  /** Path relative to the drive root */
  path: string;

  /** Size in bytes as reported by the remote; absent when unknown */
  size?: number;
}

export type RemoteNode = RemoteFolder | RemoteFile;

/** One stored rendition of a media asset */
export interface AssetVersion {
  size?: number;
}

/** A photo or video living outside the drive hierarchy */
export interface MediaAsset {
  /** Opaque identifier, always present */
  id: string;

  /** Original file name; absent for some assets */
  filename?: string;

  /** Stored renditions; the original may be missing */
  versions: {
    original?: AssetVersion;
  };
}

/** A named, ordered collection of assets */
export interface Album {
  /** Remote key of the album */
  key: string;

  /** Display name; may differ from the key */
  title: string;

  /** Lazily iterate the album's assets in remote order */
  assets(): AsyncIterable<MediaAsset>;
}

/** Albums indexed by the name a user requests them by */
export type AlbumIndex = ReadonlyMap<string, Album>;

/** Hierarchical file store */
export interface RemoteDrive {
  root(): Promise<RemoteFolder>;

  /** Children of a folder in the order the remote reports them */
  iterate(folder: RemoteFolder): AsyncIterable<RemoteNode>;

  /** Resolve a path relative to the drive root. Throws NotFoundError. */
  lookupByPath(path: string): Promise<RemoteNode>;

  openStream(file: RemoteFile, range?: RangeHeaders): Promise<ByteStream>;
}

/** Flat media collection with albums */
export interface PhotoLibrary {
  allAssets(): AsyncIterable<MediaAsset>;

  albums(): Promise<AlbumIndex>;

  downloadAsset(asset: MediaAsset, range?: RangeHeaders): Promise<ByteStream>;
}

/** Name an asset is stored under locally */
export function assetFileName(asset: MediaAsset): string {
  return asset.filename ? asset.filename : `${asset.id}.bin`;
}

/** Expected byte size of an asset, taken from its original rendition */
export function expectedAssetSize(asset: MediaAsset): number | undefined {
  return asset.versions.original?.size;
}

/** Range header asking for everything from `offset` on */
export function rangeFrom(offset: number): RangeHeaders {
  return { Range: `bytes=${offset}-` };
}

/** Whether `name` can be used as a single local folder or file name. */
export function isPathSegment(name: string): boolean {
  return name !== '' && name !== '.' && name !== '..' && !/[\/\\]/.test(name);
}
