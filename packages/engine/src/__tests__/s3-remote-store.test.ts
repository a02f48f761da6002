import { describe, it, expect, vi } from 'vitest';
import { Readable } from 'node:stream';
import {
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
} from '@aws-sdk/client-s3';
import type { Logger } from 'pino';
import { S3RemoteStore } from '../remote/s3-remote-store.js';
import type { S3RemoteConfig } from '../remote/config.js';
import type { ByteStream, MediaAsset, RemoteNode } from '../remote/types.js';
import { NotFoundError, TransferError } from '../errors.js';
import { createMockLogger } from './test-utils.js';

function makeConfig(overrides?: Partial<S3RemoteConfig>): S3RemoteConfig {
  return {
    bucketName: 'test-bucket',
    region: 'us-east-1',
    prefix: 'user1/',
    maxListPages: 100,
    ...overrides,
  };
}

function notFound(): Error {
  const err = new Error('Not Found');
  err.name = 'NotFound';
  return err;
}

function sdkBody(content: Buffer): Readable {
  return Object.assign(Readable.from([content]), {
    transformToString: async () => content.toString('utf-8'),
  });
}

/**
 * In-memory bucket answering ListObjectsV2, HeadObject and GetObject the
 * way S3 does, with a configurable page size.
 */
function createMockS3Client(objects: Record<string, string>, pageSize = 1000) {
  const keys = Object.keys(objects).sort();

  const list = (input: ListObjectsV2Command['input']) => {
    const prefix = input.Prefix ?? '';
    const entries: Array<{ prefix?: string; key?: string }> = [];
    const seen = new Set<string>();

    for (const key of keys) {
      if (!key.startsWith(prefix)) continue;
      const rest = key.slice(prefix.length);
      const slash = input.Delimiter ? rest.indexOf(input.Delimiter) : -1;
      if (slash >= 0) {
        const common = prefix + rest.slice(0, slash + 1);
        if (!seen.has(common)) {
          seen.add(common);
          entries.push({ prefix: common });
        }
      } else {
        entries.push({ key });
      }
    }

    const start = input.ContinuationToken ? parseInt(input.ContinuationToken, 10) : 0;
    const limit = Math.min(pageSize, input.MaxKeys ?? 1000);
    const page = entries.slice(start, start + limit);
    const next = start + limit;

    return {
      CommonPrefixes: page.filter((e) => e.prefix).map((e) => ({ Prefix: e.prefix })),
      Contents: page
        .filter((e) => e.key)
        .map((e) => ({ Key: e.key, Size: Buffer.byteLength(objects[e.key ?? ''] ?? '') })),
      KeyCount: page.length,
      NextContinuationToken: next < entries.length ? String(next) : undefined,
    };
  };

  return {
    send: vi.fn().mockImplementation(async (command: unknown) => {
      if (command instanceof ListObjectsV2Command) {
        return list(command.input);
      }
      if (command instanceof HeadObjectCommand) {
        const content = objects[command.input.Key ?? ''];
        if (content === undefined) throw notFound();
        return { ContentLength: Buffer.byteLength(content) };
      }
      if (command instanceof GetObjectCommand) {
        const content = objects[command.input.Key ?? ''];
        if (content === undefined) throw notFound();
        const match = /^bytes=(\d+)-$/.exec(command.input.Range ?? '');
        const start = match?.[1] ? parseInt(match[1], 10) : 0;
        return { Body: sdkBody(Buffer.from(content).subarray(start)) };
      }
      throw new Error('Unexpected command');
    }),
  };
}

async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of items) {
    out.push(item);
  }
  return out;
}

async function readAll(stream: ByteStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

const DRIVE = {
  'user1/drive/A/b.txt': '0123456789',
  'user1/drive/A/inner/c.txt': 'c',
  'user1/drive/notes.md': '# notes',
  'user1/drive/b.txt': 'bb',
  'other/drive/foreign.txt': 'not ours',
};

describe('S3RemoteStore', () => {
  it('should reject an invalid configuration', () => {
    expect(() => new S3RemoteStore(makeConfig({ bucketName: '' }), createMockLogger())).toThrow(
      'Invalid S3 remote config: bucketName is required'
    );
  });

  describe('drive', () => {
    it('should list folders and files of the root in key order', async () => {
      const client = createMockS3Client(DRIVE);
      const store = new S3RemoteStore(makeConfig(), createMockLogger(), client as never);

      const nodes = await collect(store.iterate(await store.root()));

      expect(nodes).toEqual<RemoteNode[]>([
        { kind: 'folder', name: 'A', path: 'A' },
        { kind: 'file', name: 'b.txt', path: 'b.txt', size: 2 },
        { kind: 'file', name: 'notes.md', path: 'notes.md', size: 7 },
      ]);
    });

    it('should list a nested folder', async () => {
      const client = createMockS3Client(DRIVE);
      const store = new S3RemoteStore(makeConfig(), createMockLogger(), client as never);

      const nodes = await collect(store.iterate({ kind: 'folder', name: 'A', path: 'A' }));

      expect(nodes).toEqual<RemoteNode[]>([
        { kind: 'file', name: 'b.txt', path: 'A/b.txt', size: 10 },
        { kind: 'folder', name: 'inner', path: 'A/inner' },
      ]);
    });

    it('should follow continuation tokens across pages', async () => {
      const client = createMockS3Client(DRIVE, 1);
      const store = new S3RemoteStore(makeConfig(), createMockLogger(), client as never);

      const nodes = await collect(store.iterate(await store.root()));

      expect(nodes.map((n) => n.name)).toEqual(['A', 'b.txt', 'notes.md']);
      expect(client.send).toHaveBeenCalledTimes(3);
    });

    it('should stop listing at maxListPages', async () => {
      const client = createMockS3Client(DRIVE, 1);
      const store = new S3RemoteStore(
        makeConfig({ maxListPages: 2 }),
        createMockLogger(),
        client as never
      );

      const nodes = await collect(store.iterate(await store.root()));

      expect(nodes.map((n) => n.name)).toEqual(['A', 'b.txt']);
    });

    it('should resolve a file path with its size', async () => {
      const store = new S3RemoteStore(makeConfig(), createMockLogger(), createMockS3Client(DRIVE) as never);

      await expect(store.lookupByPath('/A/b.txt')).resolves.toEqual({
        kind: 'file',
        name: 'b.txt',
        path: 'A/b.txt',
        size: 10,
      });
    });

    it('should resolve a folder path', async () => {
      const store = new S3RemoteStore(makeConfig(), createMockLogger(), createMockS3Client(DRIVE) as never);

      await expect(store.lookupByPath('A/inner/')).resolves.toEqual({
        kind: 'folder',
        name: 'inner',
        path: 'A/inner',
      });
    });

    it('should reject a missing path with NotFoundError', async () => {
      const store = new S3RemoteStore(makeConfig(), createMockLogger(), createMockS3Client(DRIVE) as never);

      const lookup = store.lookupByPath('Missing/x.txt');

      await expect(lookup).rejects.toBeInstanceOf(NotFoundError);
      await expect(lookup).rejects.toThrow('Not found in drive: Missing/x.txt');
    });

    it('should pass the Range header through to GetObject', async () => {
      const client = createMockS3Client(DRIVE);
      const store = new S3RemoteStore(makeConfig(), createMockLogger(), client as never);

      const stream = await store.openStream(
        { kind: 'file', name: 'b.txt', path: 'A/b.txt', size: 10 },
        { Range: 'bytes=4-' }
      );

      expect(await readAll(stream)).toBe('456789');
      const command: unknown = client.send.mock.calls[0]?.[0];
      expect(command).toBeInstanceOf(GetObjectCommand);
      expect(command instanceof GetObjectCommand && command.input).toEqual({
        Bucket: 'test-bucket',
        Key: 'user1/drive/A/b.txt',
        Range: 'bytes=4-',
      });
    });

    it('should map a missing object to NotFoundError', async () => {
      const store = new S3RemoteStore(makeConfig(), createMockLogger(), createMockS3Client(DRIVE) as never);

      await expect(
        store.openStream({ kind: 'file', name: 'gone.txt', path: 'gone.txt' })
      ).rejects.toThrow('Object not found: user1/drive/gone.txt');
    });

    it('should wrap other GetObject failures in TransferError', async () => {
      const client = { send: vi.fn().mockRejectedValue(new Error('SlowDown')) };
      const store = new S3RemoteStore(makeConfig(), createMockLogger(), client as never);

      const open = store.openStream({ kind: 'file', name: 'b.txt', path: 'b.txt' });

      await expect(open).rejects.toBeInstanceOf(TransferError);
      await expect(open).rejects.toThrow('GetObject failed for user1/drive/b.txt: SlowDown');
    });

    it('should wrap listing failures in TransferError with the prefix', async () => {
      const client = { send: vi.fn().mockRejectedValue(new Error('SlowDown')) };
      const store = new S3RemoteStore(makeConfig(), createMockLogger(), client as never);

      const listing = collect(store.iterate(await store.root()));

      await expect(listing).rejects.toBeInstanceOf(TransferError);
      await expect(listing).rejects.toThrow('ListObjectsV2 failed for user1/drive/: SlowDown');
    });

    it('should wrap HeadObject failures other than 404 in TransferError', async () => {
      const client = { send: vi.fn().mockRejectedValue(new Error('SlowDown')) };
      const store = new S3RemoteStore(makeConfig(), createMockLogger(), client as never);

      const lookup = store.lookupByPath('A/b.txt');

      await expect(lookup).rejects.toBeInstanceOf(TransferError);
      await expect(lookup).rejects.toThrow('HeadObject failed for user1/drive/A/b.txt: SlowDown');
    });

    it('should fail when the response has no body', async () => {
      const client = { send: vi.fn().mockResolvedValue({}) };
      const store = new S3RemoteStore(makeConfig(), createMockLogger(), client as never);

      await expect(
        store.openStream({ kind: 'file', name: 'b.txt', path: 'b.txt' })
      ).rejects.toThrow('S3 response body is empty');
    });
  });

  describe('photos', () => {
    const PHOTOS = {
      'user1/photos/library/IMG_0001.JPG': 'jpeg',
      'user1/photos/library/clip.mov': 'movie',
      'user1/photos/albums/k1/.album.json': '{"title":"Trip"}',
      'user1/photos/albums/k1/IMG_0001.JPG': 'jpeg',
      'user1/photos/albums/k2/beach.png': 'png',
      'user1/photos/albums/k3/.album.json': '{"title":"Trip"}',
    };

    it('should list every library asset with its original size', async () => {
      const store = new S3RemoteStore(makeConfig(), createMockLogger(), createMockS3Client(PHOTOS) as never);

      const assets = await collect(store.allAssets());

      expect(assets).toEqual<MediaAsset[]>([
        { id: 'library/IMG_0001.JPG', filename: 'IMG_0001.JPG', versions: { original: { size: 4 } } },
        { id: 'library/clip.mov', filename: 'clip.mov', versions: { original: { size: 5 } } },
      ]);
    });

    it('should index albums by title and fall back to the folder key', async () => {
      const store = new S3RemoteStore(makeConfig(), createMockLogger(), createMockS3Client(PHOTOS) as never);

      const albums = await store.albums();

      expect([...albums.keys()]).toEqual(['Trip', 'k2']);
      expect(albums.get('Trip')?.key).toBe('k1');
    });

    it('should list album assets without the metadata object', async () => {
      const store = new S3RemoteStore(makeConfig(), createMockLogger(), createMockS3Client(PHOTOS) as never);

      const trip = (await store.albums()).get('Trip');
      const assets = trip ? await collect(trip.assets()) : [];

      expect(assets.map((a) => a.id)).toEqual(['albums/k1/IMG_0001.JPG']);
    });

    it('should keep the first album when titles collide', async () => {
      const warn = vi.fn();
      const logger = { warn, debug: vi.fn(), info: vi.fn(), error: vi.fn() };
      const rootLogger = { ...logger, child: () => logger } as unknown as Logger;
      const store = new S3RemoteStore(makeConfig(), rootLogger, createMockS3Client(PHOTOS) as never);

      await store.albums();

      expect(warn).toHaveBeenCalledWith(
        { title: 'Trip', key: 'k3' },
        'Duplicate album title; keeping the first'
      );
    });

    it('should fall back to the folder key for titles that are not folder names', async () => {
      const store = new S3RemoteStore(
        makeConfig(),
        createMockLogger(),
        createMockS3Client({
          'user1/photos/albums/k4/.album.json': '{"title":"../escape"}',
          'user1/photos/albums/k4/x.jpg': 'x',
          'user1/photos/albums/k5/.album.json': '{"title":"a/b"}',
          'user1/photos/albums/k6/.album.json': '{"title":".."}',
        }) as never
      );

      const albums = await store.albums();

      expect([...albums.keys()]).toEqual(['k4', 'k5', 'k6']);
      expect(albums.get('k4')?.title).toBe('k4');
    });

    it('should download an asset by its key under the photos root', async () => {
      const client = createMockS3Client(PHOTOS);
      const store = new S3RemoteStore(makeConfig(), createMockLogger(), client as never);

      const stream = await store.downloadAsset(
        { id: 'library/clip.mov', filename: 'clip.mov', versions: {} },
        { Range: 'bytes=2-' }
      );

      expect(await readAll(stream)).toBe('vie');
    });
  });
});
