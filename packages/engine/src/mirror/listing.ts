/**
 * Read-only listings of the photo library, for list-only runs.
 */

import { NotFoundError } from '../errors.js';
import type { Album, AlbumIndex, MediaAsset } from '../remote/types.js';

/** File name of an asset, or its id when it has none */
export function assetLabel(asset: MediaAsset): string {
  return asset.filename ? asset.filename : asset.id;
}

/** Album display name, with the key appended when it differs from the title */
export function formatAlbumName(key: string, title: string): string {
  return key === title ? title : `${title} (id: ${key})`;
}

export async function* listAssetLabels(assets: AsyncIterable<MediaAsset>): AsyncGenerator<string> {
  for await (const asset of assets) {
    yield assetLabel(asset);
  }
}

/** Labels of one album's assets. Throws NotFoundError for an unknown album. */
export function listAlbumAssetLabels(albumName: string, albums: AlbumIndex): AsyncGenerator<string> {
  const album = albums.get(albumName);
  if (!album) {
    throw new NotFoundError(albumName, `Album not found: ${albumName}`);
  }
  return listAssetLabels(album.assets());
}

/** Display names of every album, in index order */
export function listAlbumNames(albums: AlbumIndex): string[] {
  const names: string[] = [];
  albums.forEach((album: Album) => {
    names.push(formatAlbumName(album.key, album.title));
  });
  return names;
}
