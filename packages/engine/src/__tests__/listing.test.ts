import { describe, it, expect } from 'vitest';
import {
  assetLabel,
  formatAlbumName,
  listAlbumAssetLabels,
  listAlbumNames,
} from '../mirror/listing.js';
import { MemoryRemoteStore } from '../remote/memory-remote-store.js';
import { NotFoundError } from '../errors.js';

async function collect(items: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const item of items) {
    out.push(item);
  }
  return out;
}

describe('listing', () => {
  const store = new MemoryRemoteStore({
    assets: [
      { asset: { id: 'a1', filename: 'IMG_0001.JPG', versions: {} }, content: Buffer.from('x') },
      { asset: { id: 'a2', versions: {} }, content: Buffer.from('y') },
    ],
    albums: [
      { key: 'Summer', title: 'Summer', assetIds: ['a1', 'a2'] },
      { key: 'album-9', title: 'Winter', assetIds: [] },
    ],
  });

  it('should label assets by file name, falling back to the id', () => {
    expect(assetLabel({ id: 'a1', filename: 'IMG_0001.JPG', versions: {} })).toBe('IMG_0001.JPG');
    expect(assetLabel({ id: 'a2', versions: {} })).toBe('a2');
  });

  it('should show the album key only when it differs from the title', () => {
    expect(formatAlbumName('Summer', 'Summer')).toBe('Summer');
    expect(formatAlbumName('album-9', 'Winter')).toBe('Winter (id: album-9)');
  });

  it('should list album names in index order', async () => {
    expect(listAlbumNames(await store.albums())).toEqual(['Summer', 'Winter (id: album-9)']);
  });

  it('should list the assets of one album', async () => {
    const labels = listAlbumAssetLabels('Summer', await store.albums());
    expect(await collect(labels)).toEqual(['IMG_0001.JPG', 'a2']);
  });

  it('should throw NotFoundError for an unknown album', async () => {
    const albums = await store.albums();
    expect(() => listAlbumAssetLabels('Autumn', albums)).toThrow(NotFoundError);
    expect(() => listAlbumAssetLabels('Autumn', albums)).toThrow('Album not found: Autumn');
  });
});
