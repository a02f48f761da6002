/**
 * MirrorEngine - runs one mirror request against a remote drive and photo
 * library.
 *
 * Integrates:
 * - TreeWalker: mirrors drive folders and files
 * - CollectionWalker: downloads the photo library and albums
 * - ItemFetcher: per-item skip / fresh / resume transfers
 *
 * Emits events for every decision, progress step, failure and listing line,
 * so callers render output without parsing logs.
 */

import { EventEmitter } from 'node:events';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { NotFoundError } from '../errors.js';
import type { AlbumIndex, PhotoLibrary, RemoteDrive } from '../remote/types.js';
import { ItemFetcher } from '../transfer/item-fetcher.js';
import type { FetchResult, TransferReporter } from '../transfer/types.js';
import { CollectionWalker } from '../walk/collection-walker.js';
import { TreeWalker } from '../walk/tree-walker.js';
import { validateMirrorConfig } from './config.js';
import { listAlbumAssetLabels, listAlbumNames, listAssetLabels } from './listing.js';
import { planRequest } from './request.js';
import type {
  MirrorConfig,
  MirrorEngineEvents,
  MirrorRequest,
  MirrorRunResult,
} from './types.js';

/**
 * Typed event emitter interface for the mirror engine.
 */
export interface TypedMirrorEngineEmitter {
  on<K extends keyof MirrorEngineEvents>(event: K, listener: MirrorEngineEvents[K]): this;
  off<K extends keyof MirrorEngineEvents>(event: K, listener: MirrorEngineEvents[K]): this;
  emit<K extends keyof MirrorEngineEvents>(
    event: K,
    ...args: Parameters<MirrorEngineEvents[K]>
  ): boolean;
}

/** Remote collaborators; each is only needed by the stages that use it */
export interface MirrorRemotes {
  drive?: RemoteDrive;
  library?: PhotoLibrary;
}

/** Per-run bookkeeping */
interface RunState {
  results: FetchResult[];
  notFound: string[];
  albums: AlbumIndex | null;
}

export class MirrorEngine extends EventEmitter implements TypedMirrorEngineEmitter {
  private readonly config: MirrorConfig;
  private readonly logger: Logger;
  private readonly remotes: MirrorRemotes;
  private _isRunning = false;

  constructor(config: MirrorConfig, logger: Logger, remotes: MirrorRemotes) {
    super();

    const errors = validateMirrorConfig(config);
    if (errors.length > 0) {
      throw new Error(`Invalid mirror config: ${errors.join('; ')}`);
    }

    this.config = config;
    this.logger = logger.child({ component: 'mirror-engine' });
    this.remotes = remotes;
  }

  /** Whether a run is in progress */
  get isRunning(): boolean {
    return this._isRunning;
  }

  /**
   * Execute a request: drive download, then listings, then photo downloads.
   *
   * Missing drive paths and albums are reported and skipped. A failed item
   * is recorded and the run moves on. A local IO error rejects the run
   * unless the config's ioErrorPolicy is 'skip-item'.
   */
  async run(request: MirrorRequest): Promise<MirrorRunResult> {
    if (this._isRunning) {
      throw new Error('A mirror run is already in progress');
    }

    const plan = planRequest(request);
    if (plan.requiresDestination && !this.config.destination) {
      throw new Error('A destination is required for download operations');
    }

    this._isRunning = true;
    const startedAt = Date.now();
    const state: RunState = { results: [], notFound: [], albums: null };
    const fetcher = new ItemFetcher(this.config, this.logger, this.reporter());

    this.emit('runStart', request);
    this.logger.info({ ...plan, destination: this.config.destination }, 'Mirror run started');

    try {
      if (plan.driveDownload) {
        await this.mirrorDrive(request, fetcher, state);
      }
      if (plan.listing) {
        await this.listLibrary(request, state);
      }
      if (plan.photosDownload) {
        await this.mirrorPhotos(request, fetcher, state);
      }
    } catch (err) {
      this.logger.error(
        { error: err instanceof Error ? err.message : String(err) },
        'Mirror run aborted'
      );
      throw err;
    } finally {
      this._isRunning = false;
    }

    const result = summarize(state, startedAt);
    this.logger.info(
      {
        skipped: result.skipped,
        fresh: result.fresh,
        resumed: result.resumed,
        failed: result.failed,
        notFound: result.notFound.length,
        bytesWritten: result.bytesWritten,
        durationMs: result.durationMs,
      },
      'Mirror run complete'
    );
    this.emit('runComplete', result);
    return result;
  }

  private async mirrorDrive(
    request: MirrorRequest,
    fetcher: ItemFetcher,
    state: RunState
  ): Promise<void> {
    const drive = this.requireDrive();
    const walker = new TreeWalker(drive, fetcher, this.logger);
    const destination = this.config.destination;

    if (request.items.length > 0) {
      this.emit('phase', 'drive-items');
      for (const item of request.items) {
        try {
          const node = await drive.lookupByPath(item);
          state.results.push(...(await walker.walk(node, path.join(destination, item))));
        } catch (err) {
          if (!(err instanceof NotFoundError)) throw err;
          this.reportNotFound(err, state);
        }
      }
      return;
    }

    this.emit('phase', 'drive-root');
    const root = await drive.root();
    for await (const child of drive.iterate(root)) {
      state.results.push(...(await walker.walk(child, path.join(destination, child.name))));
    }
  }

  private async listLibrary(request: MirrorRequest, state: RunState): Promise<void> {
    const library = this.requireLibrary();

    if (request.listPhotos) {
      this.emit('phase', 'list-library');
      for await (const label of listAssetLabels(library.allAssets())) {
        this.emit('listed', label);
      }
    }

    if (request.listAlbumAssets.length > 0) {
      const albums = await this.loadAlbums(library, state);
      for (const albumName of request.listAlbumAssets) {
        try {
          const labels = listAlbumAssetLabels(albumName, albums);
          this.emit('phase', 'list-album', albumName);
          for await (const label of labels) {
            this.emit('listed', label);
          }
        } catch (err) {
          if (!(err instanceof NotFoundError)) throw err;
          this.reportNotFound(err, state);
        }
      }
    }

    if (request.listAlbums) {
      const albums = await this.loadAlbums(library, state);
      this.emit('phase', 'list-albums');
      for (const name of listAlbumNames(albums)) {
        this.emit('listed', name);
      }
    }
  }

  private async mirrorPhotos(
    request: MirrorRequest,
    fetcher: ItemFetcher,
    state: RunState
  ): Promise<void> {
    const library = this.requireLibrary();
    const walker = new CollectionWalker(library, fetcher, this.logger);
    const photosRoot = path.join(this.config.destination, this.config.photosDirName);

    if (request.photosAll) {
      this.emit('phase', 'photos-all');
      state.results.push(...(await walker.walkAll(library.allAssets(), photosRoot)));
    }

    if (request.photosAlbums.length > 0) {
      const albums = await this.loadAlbums(library, state);
      for (const albumName of request.photosAlbums) {
        try {
          if (albums.has(albumName)) {
            this.emit('phase', 'photos-album', albumName);
          }
          state.results.push(
            ...(await walker.walkAlbum(albumName, albums, path.join(photosRoot, albumName)))
          );
        } catch (err) {
          if (!(err instanceof NotFoundError)) throw err;
          this.reportNotFound(err, state);
        }
      }
    }
  }

  private async loadAlbums(library: PhotoLibrary, state: RunState): Promise<AlbumIndex> {
    if (!state.albums) {
      state.albums = await library.albums();
    }
    return state.albums;
  }

  private reportNotFound(error: NotFoundError, state: RunState): void {
    state.notFound.push(error.target);
    this.logger.warn({ target: error.target }, error.message);
    this.emit('notFound', error);
  }

  private requireDrive(): RemoteDrive {
    if (!this.remotes.drive) {
      throw new Error('No remote drive configured');
    }
    return this.remotes.drive;
  }

  private requireLibrary(): PhotoLibrary {
    if (!this.remotes.library) {
      throw new Error('No photo library configured');
    }
    return this.remotes.library;
  }

  /** Forward fetcher observations as engine events. */
  private reporter(): TransferReporter {
    return {
      decision: (plan) => {
        this.emit('decision', plan);
      },
      progress: (event) => {
        this.emit('progress', event);
      },
      itemComplete: (result) => {
        this.emit('itemComplete', result);
      },
      itemFailed: (result, error) => {
        this.emit('itemFailed', result, error);
      },
    };
  }
}

function summarize(state: RunState, startedAt: number): MirrorRunResult {
  const { results } = state;
  const succeeded = results.filter((r) => r.success);
  const failed = results.length - succeeded.length;

  return {
    success: failed === 0,
    skipped: succeeded.filter((r) => r.decision === 'skip').length,
    fresh: succeeded.filter((r) => r.decision === 'fresh').length,
    resumed: succeeded.filter((r) => r.decision === 'resume').length,
    failed,
    notFound: state.notFound,
    bytesWritten: results.reduce((sum, r) => sum + r.bytesWritten, 0),
    results,
    durationMs: Date.now() - startedAt,
    startedAt,
  };
}
