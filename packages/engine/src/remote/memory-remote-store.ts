/**
 * In-process remote store.
 *
 * Holds a drive tree and a photo library in memory and serves them through
 * the same contract as S3RemoteStore, including byte ranges. Useful for
 * dry runs and for exercising the engine without a network.
 */

import { NotFoundError } from '../errors.js';
import type {
  Album,
  AlbumIndex,
  ByteStream,
  MediaAsset,
  PhotoLibrary,
  RangeHeaders,
  RemoteDrive,
  RemoteFile,
  RemoteFolder,
  RemoteNode,
} from './types.js';
import { isPathSegment } from './types.js';

export interface MemoryFile {
  kind: 'file';
  content: Uint8Array;

  /** Size the store reports; null means unknown. Defaults to content length. */
  reportedSize?: number | null;
}

export interface MemoryFolder {
  kind: 'folder';
  children: Record<string, MemoryEntry>;
}

export type MemoryEntry = MemoryFile | MemoryFolder;

export interface MemoryAsset {
  asset: MediaAsset;
  content: Uint8Array;
}

export interface MemoryAlbum {
  key: string;
  title: string;
  assetIds: string[];
}

export interface MemoryRemoteContents {
  drive?: MemoryFolder;
  assets?: MemoryAsset[];
  albums?: MemoryAlbum[];
}

/** One download served by the store */
export interface MemoryRequest {
  /** Drive path or asset id */
  target: string;
  range?: string;
}

/** Build a file entry from text or bytes. */
export function memoryFile(
  content: string | Uint8Array,
  reportedSize?: number | null
): MemoryFile {
  return {
    kind: 'file',
    content: typeof content === 'string' ? Buffer.from(content) : content,
    reportedSize,
  };
}

export function memoryFolder(children: Record<string, MemoryEntry> = {}): MemoryFolder {
  return { kind: 'folder', children };
}

/** Parse `bytes=<start>-` into its start offset. */
function rangeStart(range: RangeHeaders | undefined): number {
  if (!range) return 0;
  const match = /^bytes=(\d+)-$/.exec(range.Range);
  if (!match?.[1]) {
    throw new Error(`Unsupported range: ${range.Range}`);
  }
  return parseInt(match[1], 10);
}

function joinPath(parent: string, name: string): string {
  return parent ? `${parent}/${name}` : name;
}

export class MemoryRemoteStore implements RemoteDrive, PhotoLibrary {
  private readonly drive: MemoryFolder;
  private readonly assets: MemoryAsset[];
  private readonly albumSpecs: MemoryAlbum[];
  private readonly chunkSize: number;

  /** Every stream opened, in order */
  readonly requests: MemoryRequest[] = [];

  constructor(contents: MemoryRemoteContents, chunkSize = 64 * 1024) {
    this.drive = contents.drive ?? memoryFolder();
    this.assets = contents.assets ?? [];
    this.albumSpecs = contents.albums ?? [];
    this.chunkSize = chunkSize;
  }

  async root(): Promise<RemoteFolder> {
    return { kind: 'folder', name: '', path: '' };
  }

  async *iterate(folder: RemoteFolder): AsyncGenerator<RemoteNode> {
    const entry = this.resolve(folder.path);
    if (!entry || entry.kind !== 'folder') {
      throw new NotFoundError(folder.path, `Not found in drive: ${folder.path}`);
    }

    for (const [name, child] of Object.entries(entry.children)) {
      yield this.toNode(joinPath(folder.path, name), name, child);
    }
  }

  async lookupByPath(drivePath: string): Promise<RemoteNode> {
    const normalized = drivePath.replace(/^\/+/, '').replace(/\/+$/, '');
    const entry = this.resolve(normalized);
    if (!entry) {
      throw new NotFoundError(drivePath, `Not found in drive: ${drivePath}`);
    }
    const segments = normalized.split('/');
    return this.toNode(normalized, segments[segments.length - 1] ?? '', entry);
  }

  async openStream(file: RemoteFile, range?: RangeHeaders): Promise<ByteStream> {
    const entry = this.resolve(file.path);
    if (!entry || entry.kind !== 'file') {
      throw new NotFoundError(file.path, `Not found in drive: ${file.path}`);
    }
    this.requests.push({ target: file.path, range: range?.Range });
    return this.chunks(entry.content, rangeStart(range));
  }

  async *allAssets(): AsyncGenerator<MediaAsset> {
    for (const stored of this.assets) {
      yield stored.asset;
    }
  }

  async albums(): Promise<AlbumIndex> {
    const index = new Map<string, Album>();
    for (const entry of this.albumSpecs) {
      if (!isPathSegment(entry.title) || index.has(entry.title)) continue;
      const members = entry.assetIds
        .map((id) => this.assets.find((stored) => stored.asset.id === id))
        .filter((stored): stored is MemoryAsset => stored !== undefined);

      index.set(entry.title, {
        key: entry.key,
        title: entry.title,
        assets: async function* (): AsyncGenerator<MediaAsset> {
          for (const stored of members) {
            yield stored.asset;
          }
        },
      });
    }
    return index;
  }

  async downloadAsset(asset: MediaAsset, range?: RangeHeaders): Promise<ByteStream> {
    const stored = this.assets.find((candidate) => candidate.asset.id === asset.id);
    if (!stored) {
      throw new NotFoundError(asset.id, `Asset not found: ${asset.id}`);
    }
    this.requests.push({ target: asset.id, range: range?.Range });
    return this.chunks(stored.content, rangeStart(range));
  }

  private resolve(drivePath: string): MemoryEntry | undefined {
    let current: MemoryEntry = this.drive;
    if (!drivePath) return current;

    for (const segment of drivePath.split('/')) {
      if (current.kind !== 'folder') return undefined;
      const next: MemoryEntry | undefined = current.children[segment];
      if (!next) return undefined;
      current = next;
    }
    return current;
  }

  private toNode(drivePath: string, name: string, entry: MemoryEntry): RemoteNode {
    if (entry.kind === 'folder') {
      return { kind: 'folder', name, path: drivePath };
    }
    const size =
      entry.reportedSize === undefined ? entry.content.byteLength : entry.reportedSize;
    return size === null
      ? { kind: 'file', name, path: drivePath }
      : { kind: 'file', name, path: drivePath, size };
  }

  private async *chunks(content: Uint8Array, start: number): AsyncGenerator<Uint8Array> {
    for (let offset = start; offset < content.byteLength; offset += this.chunkSize) {
      yield content.subarray(offset, Math.min(offset + this.chunkSize, content.byteLength));
    }
  }
}
