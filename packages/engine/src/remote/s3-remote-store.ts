/**
 * S3-backed remote store.
 *
 * Layout under the configured prefix:
 *
 *   drive/<path...>                 drive folders ('/'-delimited) and files
 *   photos/library/<name>           every asset of the photo library
 *   photos/albums/<key>/<name>      album assets
 *   photos/albums/<key>/.album.json optional { "title": string }
 *
 * Credentials come from the S3Client the caller builds (the AWS SDK default
 * chain); this class never sees them.
 */

import * as path from 'node:path';
import { Readable } from 'node:stream';
import {
  S3Client,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import type {
  GetObjectCommandOutput,
  ListObjectsV2CommandInput,
  ListObjectsV2CommandOutput,
} from '@aws-sdk/client-s3';
import type { Logger } from 'pino';
import { NotFoundError, TransferError, errorMessage } from '../errors.js';
import { validateS3RemoteConfig } from './config.js';
import type { S3RemoteConfig } from './config.js';
import { isPathSegment } from './types.js';
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

/** Object holding an album's display metadata */
export const ALBUM_METADATA_FILE = '.album.json';

/** Max keys per ListObjectsV2 request */
const MAX_LIST_KEYS = 1000;

/** Whether an S3 error means "no such key" */
function isNotFound(err: unknown): boolean {
  if (err instanceof S3ServiceException) {
    return (
      err.name === 'NotFound' ||
      err.name === 'NoSuchKey' ||
      err.$metadata.httpStatusCode === 404
    );
  }
  return err instanceof Error && (err.name === 'NotFound' || err.name === 'NoSuchKey');
}

async function* singleChunk(bytes: Uint8Array): AsyncGenerator<Uint8Array> {
  yield bytes;
}

function parseAlbumTitle(raw: string): string | undefined {
  const parsed: unknown = JSON.parse(raw);
  if (
    parsed !== null &&
    typeof parsed === 'object' &&
    'title' in parsed &&
    typeof parsed.title === 'string' &&
    parsed.title
  ) {
    return parsed.title;
  }
  return undefined;
}

export class S3RemoteStore implements RemoteDrive, PhotoLibrary {
  private readonly client: S3Client;
  private readonly config: S3RemoteConfig;
  private readonly logger: Logger;

  constructor(config: S3RemoteConfig, logger: Logger, client?: S3Client) {
    const errors = validateS3RemoteConfig(config);
    if (errors.length > 0) {
      throw new Error(`Invalid S3 remote config: ${errors.join('; ')}`);
    }

    this.config = config;
    this.logger = logger.child({ component: 's3-remote-store' });
    this.client = client ?? new S3Client({ region: config.region });
  }

  private get driveRoot(): string {
    return `${this.config.prefix}drive/`;
  }

  private get photosRoot(): string {
    return `${this.config.prefix}photos/`;
  }

  // ── Drive ───────────────────────────────────────────────────────────

  async root(): Promise<RemoteFolder> {
    return { kind: 'folder', name: '', path: '' };
  }

  /**
   * Children of a folder. Within each list page, sub-folders and files are
   * merged back into key order.
   */
  async *iterate(folder: RemoteFolder): AsyncGenerator<RemoteNode> {
    const folderPrefix = folder.path ? `${this.driveRoot}${folder.path}/` : this.driveRoot;

    for await (const page of this.listPages({ Prefix: folderPrefix, Delimiter: '/' })) {
      const entries: Array<{ key: string; node: RemoteNode }> = [];

      for (const common of page.CommonPrefixes ?? []) {
        if (!common.Prefix) continue;
        const name = common.Prefix.slice(folderPrefix.length).replace(/\/$/, '');
        if (!name) continue;
        entries.push({
          key: common.Prefix,
          node: { kind: 'folder', name, path: this.toDrivePath(common.Prefix) },
        });
      }

      for (const obj of page.Contents ?? []) {
        if (!obj.Key || obj.Key.endsWith('/')) continue;
        entries.push({
          key: obj.Key,
          node: {
            kind: 'file',
            name: obj.Key.slice(folderPrefix.length),
            path: this.toDrivePath(obj.Key),
            size: obj.Size,
          },
        });
      }

      entries.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
      for (const entry of entries) {
        yield entry.node;
      }
    }
  }

  /**
   * Resolve a drive path: an object at the key is a file, a non-empty
   * prefix is a folder.
   */
  async lookupByPath(drivePath: string): Promise<RemoteNode> {
    const normalized = drivePath.replace(/^\/+/, '').replace(/\/+$/, '');
    if (!normalized) {
      return this.root();
    }

    const key = `${this.driveRoot}${normalized}`;
    try {
      const head = await this.client.send(
        new HeadObjectCommand({ Bucket: this.config.bucketName, Key: key })
      );
      return {
        kind: 'file',
        name: path.posix.basename(normalized),
        path: normalized,
        size: head.ContentLength,
      };
    } catch (err) {
      if (!isNotFound(err)) {
        throw new TransferError(key, `HeadObject failed for ${key}: ${errorMessage(err)}`, err);
      }
    }

    let listing: ListObjectsV2CommandOutput;
    try {
      listing = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.config.bucketName,
          Prefix: `${key}/`,
          MaxKeys: 1,
        })
      );
    } catch (err) {
      throw new TransferError(key, `ListObjectsV2 failed for ${key}/: ${errorMessage(err)}`, err);
    }
    if ((listing.KeyCount ?? listing.Contents?.length ?? 0) > 0) {
      return { kind: 'folder', name: path.posix.basename(normalized), path: normalized };
    }

    throw new NotFoundError(drivePath, `Not found in drive: ${drivePath}`);
  }

  openStream(file: RemoteFile, range?: RangeHeaders): Promise<ByteStream> {
    return this.getObjectStream(`${this.driveRoot}${file.path}`, range);
  }

  // ── Photos ──────────────────────────────────────────────────────────

  allAssets(): AsyncGenerator<MediaAsset> {
    return this.listAssets(`${this.photosRoot}library/`);
  }

  /** Albums keyed by title; the folder key is kept on each album. */
  async albums(): Promise<AlbumIndex> {
    const albumsPrefix = `${this.photosRoot}albums/`;
    const index = new Map<string, Album>();

    for await (const page of this.listPages({ Prefix: albumsPrefix, Delimiter: '/' })) {
      for (const common of page.CommonPrefixes ?? []) {
        if (!common.Prefix) continue;
        const key = common.Prefix.slice(albumsPrefix.length).replace(/\/$/, '');
        if (!key) continue;

        let title = (await this.readAlbumTitle(common.Prefix)) ?? key;
        if (!isPathSegment(title)) {
          this.logger.warn({ title, key }, 'Album title is not a usable folder name; using its key');
          title = key;
        }
        if (!isPathSegment(title)) {
          this.logger.warn({ key }, 'Album key is not a usable folder name; skipping');
          continue;
        }
        if (index.has(title)) {
          this.logger.warn({ title, key }, 'Duplicate album title; keeping the first');
          continue;
        }

        const albumPrefix = common.Prefix;
        index.set(title, {
          key,
          title,
          assets: () => this.listAssets(albumPrefix),
        });
      }
    }

    this.logger.debug({ albums: index.size }, 'Listed albums');
    return index;
  }

  downloadAsset(asset: MediaAsset, range?: RangeHeaders): Promise<ByteStream> {
    return this.getObjectStream(`${this.photosRoot}${asset.id}`, range);
  }

  // ── Helpers ─────────────────────────────────────────────────────────

  private toDrivePath(key: string): string {
    return key.slice(this.driveRoot.length).replace(/\/$/, '');
  }

  private async *listAssets(prefix: string): AsyncGenerator<MediaAsset> {
    for await (const page of this.listPages({ Prefix: prefix })) {
      for (const obj of page.Contents ?? []) {
        if (!obj.Key || obj.Key.endsWith('/')) continue;

        const filename = path.posix.basename(obj.Key);
        if (filename === ALBUM_METADATA_FILE) continue;

        yield {
          id: obj.Key.slice(this.photosRoot.length),
          filename,
          versions: obj.Size === undefined ? {} : { original: { size: obj.Size } },
        };
      }
    }
  }

  /**
   * List pages under a prefix, handling pagination up to maxListPages.
   */
  private async *listPages(
    input: Omit<ListObjectsV2CommandInput, 'Bucket'>
  ): AsyncGenerator<ListObjectsV2CommandOutput> {
    let continuationToken: string | undefined;
    let pageCount = 0;

    do {
      const prefix = input.Prefix ?? '';
      let response: ListObjectsV2CommandOutput;
      try {
        response = await this.client.send(
          new ListObjectsV2Command({
            ...input,
            Bucket: this.config.bucketName,
            ContinuationToken: continuationToken,
            MaxKeys: MAX_LIST_KEYS,
          })
        );
      } catch (err) {
        throw new TransferError(
          prefix,
          `ListObjectsV2 failed for ${prefix}: ${errorMessage(err)}`,
          err
        );
      }
      yield response;

      continuationToken = response.NextContinuationToken;
      pageCount++;

      if (continuationToken && pageCount >= this.config.maxListPages) {
        this.logger.warn(
          { prefix: input.Prefix, maxListPages: this.config.maxListPages },
          'Reached max list pages limit; listing truncated'
        );
        break;
      }
    } while (continuationToken);
  }

  private async readAlbumTitle(albumPrefix: string): Promise<string | undefined> {
    const key = `${albumPrefix}${ALBUM_METADATA_FILE}`;
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.config.bucketName, Key: key })
      );
      if (!response.Body) return undefined;
      return parseAlbumTitle(await response.Body.transformToString());
    } catch (err) {
      if (isNotFound(err)) return undefined;
      if (err instanceof SyntaxError) {
        this.logger.warn({ key, error: err.message }, 'Ignoring unreadable album metadata');
        return undefined;
      }
      throw new TransferError(key, `GetObject failed for ${key}: ${errorMessage(err)}`, err);
    }
  }

  private async getObjectStream(key: string, range?: RangeHeaders): Promise<ByteStream> {
    let response: GetObjectCommandOutput;
    try {
      response = await this.client.send(
        new GetObjectCommand({
          Bucket: this.config.bucketName,
          Key: key,
          Range: range?.Range,
        })
      );
    } catch (err) {
      if (isNotFound(err)) {
        throw new NotFoundError(key, `Object not found: ${key}`);
      }
      throw new TransferError(key, `GetObject failed for ${key}: ${errorMessage(err)}`, err);
    }

    const body = response.Body;
    if (!body) {
      throw new TransferError(key, 'S3 response body is empty');
    }

    if (body instanceof Readable) {
      return body;
    }

    return singleChunk(await body.transformToByteArray());
  }
}
