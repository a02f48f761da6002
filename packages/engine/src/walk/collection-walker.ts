/**
 * Collection walker: downloads flat media collections (the whole library
 * or one album) into a destination directory.
 */

import type { Logger } from 'pino';
import { NotFoundError } from '../errors.js';
import type { AlbumIndex, MediaAsset, PhotoLibrary } from '../remote/types.js';
import type { ItemFetcher } from '../transfer/item-fetcher.js';
import type { FetchResult } from '../transfer/types.js';

export class CollectionWalker {
  private readonly library: PhotoLibrary;
  private readonly fetcher: ItemFetcher;
  private readonly logger: Logger;

  constructor(library: PhotoLibrary, fetcher: ItemFetcher, logger: Logger) {
    this.library = library;
    this.fetcher = fetcher;
    this.logger = logger.child({ component: 'collection-walker' });
  }

  /**
   * Fetch every asset of `assets` into `destinationDir`.
   *
   * The sequence is consumed lazily, one asset per fetch.
   */
  async walkAll(assets: AsyncIterable<MediaAsset>, destinationDir: string): Promise<FetchResult[]> {
    const results: FetchResult[] = [];

    for await (const asset of assets) {
      results.push(await this.fetcher.fetchAsset(this.library, asset, destinationDir));
    }

    this.logger.debug({ destinationDir, assets: results.length }, 'Collection walked');
    return results;
  }

  /**
   * Fetch the assets of one album into `destinationDir`.
   *
   * Throws NotFoundError when `albumName` is not in `albums`.
   */
  async walkAlbum(
    albumName: string,
    albums: AlbumIndex,
    destinationDir: string
  ): Promise<FetchResult[]> {
    const album = albums.get(albumName);
    if (!album) {
      throw new NotFoundError(albumName, `Album not found: ${albumName}`);
    }

    this.logger.info({ album: albumName, destinationDir }, 'Downloading album');
    return this.walkAll(album.assets(), destinationDir);
  }
}
