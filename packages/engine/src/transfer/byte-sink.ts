/**
 * Byte sink: writes a remote byte stream to a local file, one block at a
 * time, with optional periodic progress events.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { Readable } from 'node:stream';
import { LocalIOError, MirrorError, TransferError, errorMessage } from '../errors.js';
import type { ByteStream } from '../remote/types.js';
import type { ProgressEvent, WriteMode } from './types.js';

/** At most this many progress reports per file */
export const PROGRESS_REPORTS_PER_FILE = 20;

/** Never report more often than every this many bytes */
export const PROGRESS_MIN_STEP_BYTES = 1_000_000;

export interface WriteChunksOptions {
  /** Bytes already on disk before this write (resume offset) */
  startOffset: number;

  /** Remote size, when known; required for progress events */
  expectedSize?: number;

  /** Label carried on progress events (defaults to the file name) */
  label?: string;

  /** Receives progress events; omit to disable progress reporting */
  onProgress?: (event: ProgressEvent) => void;
}

/** Let go of a chunk source that will not be read (closes an HTTP body). */
async function releaseSource(chunks: ByteStream): Promise<void> {
  if (chunks instanceof Readable) {
    chunks.destroy();
    return;
  }
  await chunks[Symbol.asyncIterator]().return?.();
}

/** Distance between two progress reports for a file of the given size. */
export function progressStep(expectedSize: number): number {
  return Math.max(Math.floor(expectedSize / PROGRESS_REPORTS_PER_FILE), PROGRESS_MIN_STEP_BYTES);
}

/**
 * Write every non-empty block of `chunks` to `destinationPath`.
 *
 * Returns the total size on disk: startOffset plus the bytes written here.
 * Throws LocalIOError when the file cannot be opened or written, and
 * TransferError when the chunk source fails. The handle is always closed.
 */
export async function writeChunks(
  destinationPath: string,
  mode: WriteMode,
  chunks: ByteStream,
  options: WriteChunksOptions
): Promise<number> {
  const label = options.label ?? path.basename(destinationPath);
  const { expectedSize, onProgress } = options;

  let bytesWritten = options.startOffset;
  let step: number | null = null;
  let nextReport = 0;
  if (onProgress && expectedSize !== undefined && expectedSize > 0) {
    step = progressStep(expectedSize);
    nextReport = options.startOffset + step;
  }

  let handle: fs.FileHandle;
  try {
    handle = await fs.open(destinationPath, mode === 'append' ? 'a' : 'w');
  } catch (err) {
    await releaseSource(chunks);
    throw new LocalIOError(
      destinationPath,
      `Cannot open ${destinationPath}: ${errorMessage(err)}`,
      err
    );
  }

  try {
    for await (const chunk of chunks) {
      if (chunk.byteLength === 0) {
        continue;
      }

      try {
        await handle.write(chunk);
      } catch (err) {
        throw new LocalIOError(
          destinationPath,
          `Cannot write ${destinationPath}: ${errorMessage(err)}`,
          err
        );
      }
      bytesWritten += chunk.byteLength;

      if (step !== null && onProgress && expectedSize !== undefined && bytesWritten >= nextReport) {
        onProgress({
          label,
          destinationPath,
          bytesWritten,
          expectedSize,
          percent: (bytesWritten / expectedSize) * 100,
        });
        while (nextReport <= bytesWritten) {
          nextReport += step;
        }
      }
    }
  } catch (err) {
    if (err instanceof MirrorError) {
      throw err;
    }
    // Anything not raised by the write itself came from the remote stream
    throw new TransferError(
      destinationPath,
      `Stream failed after ${bytesWritten} bytes: ${errorMessage(err)}`,
      err
    );
  } finally {
    await handle.close();
  }

  return bytesWritten;
}
