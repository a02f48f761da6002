/**
 * Item fetcher.
 *
 * Brings one drive file or media asset up to date on disk: plans the
 * transfer, opens the remote stream (with a byte range when resuming) and
 * drives it through the byte sink.
 */

import * as path from 'node:path';
import type { Logger } from 'pino';
import { LocalIOError, NotFoundError, TransferError, errorMessage } from '../errors.js';
import type {
  ByteStream,
  MediaAsset,
  PhotoLibrary,
  RangeHeaders,
  RemoteDrive,
  RemoteFile,
} from '../remote/types.js';
import { assetFileName, expectedAssetSize, rangeFrom } from '../remote/types.js';
import { writeChunks } from './byte-sink.js';
import { ensureDirectory } from './local-fs.js';
import { planTransfer } from './transfer-planner.js';
import type {
  FetchOptions,
  FetchResult,
  TransferDecision,
  TransferPlan,
  TransferReporter,
} from './types.js';

/** Everything the fetcher needs to know about an item, whatever its kind */
interface FetchTarget {
  destinationPath: string;
  expectedSize: number | undefined;
  open: (range?: RangeHeaders) => Promise<ByteStream>;
}

/**
 * Fetches single items. One call is in flight at a time; callers await
 * each fetch before starting the next.
 */
export class ItemFetcher {
  private readonly options: FetchOptions;
  private readonly logger: Logger;
  private readonly reporter: TransferReporter | undefined;

  constructor(options: FetchOptions, logger: Logger, reporter?: TransferReporter) {
    this.options = options;
    this.logger = logger.child({ component: 'item-fetcher' });
    this.reporter = reporter;
  }

  /** Fetch a drive file to `destinationPath`. */
  fetchFile(drive: RemoteDrive, file: RemoteFile, destinationPath: string): Promise<FetchResult> {
    return this.fetch({
      destinationPath,
      expectedSize: file.size,
      open: (range) => drive.openStream(file, range),
    });
  }

  /** Fetch a media asset into `destinationDir` under its file name. */
  fetchAsset(library: PhotoLibrary, asset: MediaAsset, destinationDir: string): Promise<FetchResult> {
    return this.fetch({
      destinationPath: path.join(destinationDir, assetFileName(asset)),
      expectedSize: expectedAssetSize(asset),
      open: (range) => library.downloadAsset(asset, range),
    });
  }

  /**
   * Create a local folder before its children are fetched.
   *
   * Resolves to undefined when the folder is ready. Under the 'skip-item'
   * policy a LocalIOError resolves to a failed result instead, and the
   * caller skips the folder's subtree; under 'abort' it is rethrown.
   */
  async prepareFolder(destinationPath: string): Promise<FetchResult | undefined> {
    const startTime = Date.now();
    try {
      await ensureDirectory(destinationPath);
      return undefined;
    } catch (err) {
      if (!(err instanceof LocalIOError) || this.options.ioErrorPolicy === 'abort') {
        throw err;
      }
      return this.fail(destinationPath, 'fresh', err, startTime);
    }
  }

  private async fetch(target: FetchTarget): Promise<FetchResult> {
    const startTime = Date.now();
    const { destinationPath } = target;
    let plan: TransferPlan | null = null;

    try {
      await ensureDirectory(path.dirname(destinationPath));
      plan = await planTransfer(destinationPath, target.expectedSize, this.options.resume);
      this.logDecision(plan);
      this.reporter?.decision(plan);

      if (plan.decision === 'skip') {
        const result: FetchResult = {
          destinationPath,
          decision: 'skip',
          success: true,
          bytesWritten: 0,
          durationMs: Date.now() - startTime,
        };
        this.reporter?.itemComplete(result);
        return result;
      }

      const startOffset = plan.decision === 'resume' ? plan.rangeOffset : 0;
      const stream = await this.openRemote(target, plan);
      const total = await writeChunks(
        destinationPath,
        plan.decision === 'resume' ? 'append' : 'truncate',
        stream,
        {
          startOffset,
          expectedSize: target.expectedSize,
          onProgress: this.options.progress
            ? (event): void => {
                this.logger.debug({ ...event }, 'Transfer progress');
                this.reporter?.progress(event);
              }
            : undefined,
        }
      );

      const result: FetchResult = {
        destinationPath,
        decision: plan.decision,
        success: true,
        bytesWritten: total - startOffset,
        durationMs: Date.now() - startTime,
      };

      this.logger.debug(
        { destinationPath, bytesWritten: result.bytesWritten, totalSize: total },
        'Item fetched'
      );
      this.reporter?.itemComplete(result);
      return result;
    } catch (err) {
      if (err instanceof LocalIOError && this.options.ioErrorPolicy === 'abort') {
        throw err;
      }

      return this.fail(destinationPath, plan?.decision ?? 'fresh', err, startTime);
    }
  }

  private fail(
    destinationPath: string,
    decision: TransferDecision,
    err: unknown,
    startTime: number
  ): FetchResult {
    const error = err instanceof Error ? err : new Error(String(err));
    this.logger.error(
      { destinationPath, error: error.message },
      'Failed to fetch item'
    );

    const result: FetchResult = {
      destinationPath,
      decision,
      success: false,
      bytesWritten: 0,
      durationMs: Date.now() - startTime,
      error: error.message,
    };
    this.reporter?.itemFailed(result, error);
    return result;
  }

  private async openRemote(target: FetchTarget, plan: TransferPlan): Promise<ByteStream> {
    const range = plan.decision === 'resume' ? rangeFrom(plan.rangeOffset) : undefined;
    try {
      return await target.open(range);
    } catch (err) {
      if (err instanceof NotFoundError) {
        throw err;
      }
      throw new TransferError(
        target.destinationPath,
        `Cannot open remote stream: ${errorMessage(err)}`,
        err
      );
    }
  }

  private logDecision(plan: TransferPlan): void {
    const { destinationPath, existingLocalSize, expectedSize } = plan;

    switch (plan.decision) {
      case 'skip':
        this.logger.info({ destinationPath, size: existingLocalSize }, 'Skipping, size matches');
        break;

      case 'resume':
        this.logger.info(
          { destinationPath, existingLocalSize, expectedSize },
          'Resuming partial download'
        );
        break;

      case 'fresh':
        if (plan.oversized) {
          this.logger.warn(
            { destinationPath, existingLocalSize, expectedSize },
            'Local file is larger than remote; overwriting'
          );
        }
        this.logger.info({ destinationPath, expectedSize }, 'Downloading');
        break;
    }
  }
}
