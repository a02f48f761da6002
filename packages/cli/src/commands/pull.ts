/**
 * cloudmirror pull — mirror the remote drive and photo library locally
 *
 * With no item or photo flags the whole drive is mirrored under --dest.
 * Listing flags print labels instead of downloading and need no --dest.
 */

import { Command } from 'commander';
import type { Logger } from 'pino';
import {
  MirrorEngine,
  S3RemoteStore,
  buildMirrorConfig,
  buildS3RemoteConfig,
  ensureDirectory,
  errorMessage,
  planRequest,
} from '@cloudmirror/engine';
import type {
  IOErrorPolicy,
  MirrorConfig,
  MirrorRemotes,
  MirrorRequest,
} from '@cloudmirror/engine';
import { createLogger, isLogLevel, LOG_LEVELS } from '../utils/logger.js';
import { attachReporter, defaultOutput } from '../utils/reporter.js';
import type { ReporterOutput } from '../utils/reporter.js';

/** Parsed `pull` options, as commander hands them over */
export interface PullOptions {
  dest?: string;
  item: string[];
  photosAll?: boolean;
  photosAlbum: string[];
  photosList?: boolean;
  photosListAlbum: string[];
  photosListAlbums?: boolean;
  resume?: boolean;
  progress?: boolean;
  bucket?: string;
  region?: string;
  prefix?: string;
  ioErrorPolicy?: string;
  logLevel: string;
}

/** Collaborators of a pull run; tests replace the remote */
export interface PullDependencies {
  output: ReporterOutput;
  createLogger: (level: string) => Logger;
  createRemotes: (options: PullOptions, logger: Logger) => MirrorRemotes;
}

const IO_ERROR_POLICIES: IOErrorPolicy[] = ['abort', 'skip-item'];

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function toMirrorRequest(options: PullOptions): MirrorRequest {
  return {
    items: options.item,
    photosAll: options.photosAll === true,
    photosAlbums: options.photosAlbum,
    listPhotos: options.photosList === true,
    listAlbumAssets: options.photosListAlbum,
    listAlbums: options.photosListAlbums === true,
  };
}

/**
 * Translate flags into engine config. Unset flags fall back to the
 * CLOUDMIRROR_* environment variables.
 */
export function toMirrorConfig(options: PullOptions): MirrorConfig {
  const overrides: Partial<MirrorConfig> = {};
  if (options.dest !== undefined) overrides.destination = options.dest;
  if (options.resume) overrides.resume = true;
  if (options.progress) overrides.progress = true;
  if (options.ioErrorPolicy !== undefined) {
    const policy = IO_ERROR_POLICIES.find((p) => p === options.ioErrorPolicy);
    if (!policy) {
      throw new Error(
        `--io-error-policy must be one of: ${IO_ERROR_POLICIES.join(', ')}`
      );
    }
    overrides.ioErrorPolicy = policy;
  }
  return buildMirrorConfig(overrides);
}

function defaultDependencies(): PullDependencies {
  return {
    output: defaultOutput(),
    createLogger: (level) => createLogger(isLogLevel(level) ? level : 'warn'),
    createRemotes: (options, logger) => {
      const store = new S3RemoteStore(
        buildS3RemoteConfig({
          bucketName: options.bucket,
          region: options.region,
          prefix: options.prefix,
        }),
        logger
      );
      return { drive: store, library: store };
    },
  };
}

/**
 * Run one pull. Returns the process exit status: 0 when every item
 * succeeded, 1 when the run aborted or any item failed. Requests for
 * missing paths or albums are reported but do not change the status.
 */
export async function runPull(
  options: PullOptions,
  deps: PullDependencies = defaultDependencies()
): Promise<number> {
  const { output } = deps;
  const { color } = output;

  if (!isLogLevel(options.logLevel)) {
    output.error(color.red(`Error: --log-level must be one of: ${LOG_LEVELS.join(', ')}`));
    return 1;
  }

  const request = toMirrorRequest(options);
  let config: MirrorConfig;
  try {
    config = toMirrorConfig(options);
  } catch (error) {
    output.error(color.red(`Error: ${errorMessage(error)}`));
    return 1;
  }

  if (planRequest(request).requiresDestination && !config.destination) {
    output.error(color.red('Error: --dest is required for download operations.'));
    return 1;
  }

  const logger = deps.createLogger(options.logLevel);

  try {
    if (config.destination) {
      await ensureDirectory(config.destination);
    }

    const engine = new MirrorEngine(config, logger, deps.createRemotes(options, logger));
    attachReporter(engine, output);

    const result = await engine.run(request);

    if (result.failed > 0) {
      output.error(
        color.yellow(`${result.failed} item${result.failed !== 1 ? 's' : ''} failed; rerun with --resume to continue partial files.`)
      );
    }
    output.log(color.green('Done.'));
    return result.failed > 0 ? 1 : 0;
  } catch (error) {
    output.error(color.red(`Mirror failed: ${errorMessage(error)}`));
    return 1;
  }
}

export function registerPullCommand(program: Command): void {
  program
    .command('pull')
    .description('Mirror drive files and photos to a local destination')
    .option('--dest <path>', 'Destination path (required for any download)')
    .option('--item <path>', 'Drive path to download, relative to the drive root (repeatable)', collect, [])
    .option('--photos-all', 'Download every photo and video to DEST/Photos')
    .option('--photos-album <name>', 'Download an album to DEST/Photos/<name> (repeatable)', collect, [])
    .option('--photos-list', 'List the file name of every photo (no download)')
    .option('--photos-list-album <name>', 'List the file names in an album (repeatable)', collect, [])
    .option('--photos-list-albums', 'List every album name')
    .option('--resume', 'Resume partial downloads with HTTP Range requests')
    .option('--progress', 'Show per-file download progress')
    .option('--bucket <name>', 'S3 bucket holding the store (default: $CLOUDMIRROR_S3_BUCKET)')
    .option('--region <region>', 'AWS region (default: $CLOUDMIRROR_S3_REGION or us-east-1)')
    .option('--prefix <prefix>', 'Key prefix of the store inside the bucket')
    .option('--io-error-policy <policy>', 'On local IO errors: abort | skip-item')
    .option('--log-level <level>', `Structured log level: ${LOG_LEVELS.join(', ')}`, 'warn')
    .action(async (options: PullOptions) => {
      process.exitCode = await runPull(options);
    });
}
