/**
 * Types for a mirror run: configuration, what the user asked for, and
 * what happened.
 */

import type { NotFoundError } from '../errors.js';
import type {
  FetchResult,
  IOErrorPolicy,
  ProgressEvent,
  TransferPlan,
} from '../transfer/types.js';

/** Configuration for the mirror engine */
export interface MirrorConfig {
  /** Absolute path of the local mirror root ('' when only listing) */
  destination: string;

  /** Resume partial files with HTTP Range requests */
  resume: boolean;

  /** Emit per-file progress events */
  progress: boolean;

  /** How a local filesystem failure is handled */
  ioErrorPolicy: IOErrorPolicy;

  /** Directory under the destination that receives media assets */
  photosDirName: string;
}

/** Default configuration values */
export const DEFAULT_MIRROR_CONFIG: Omit<MirrorConfig, 'destination'> = {
  resume: false,
  progress: false,
  ioErrorPolicy: 'abort',
  photosDirName: 'Photos',
};

/** Operations requested for one invocation */
export interface MirrorRequest {
  /** Drive paths to mirror; empty means the whole drive when no photo work is asked */
  items: string[];

  /** Download every asset of the photo library */
  photosAll: boolean;

  /** Albums to download, by name */
  photosAlbums: string[];

  /** Print the label of every library asset */
  listPhotos: boolean;

  /** Albums whose asset labels are printed */
  listAlbumAssets: string[];

  /** Print every album name */
  listAlbums: boolean;
}

/** Which parts of a request need work, derived by planRequest() */
export interface RequestPlan {
  /** Mirror drive content (requested items, or the whole drive) */
  driveDownload: boolean;

  /** Download library assets or albums */
  photosDownload: boolean;

  /** Print library or album listings */
  listing: boolean;

  /** A local destination is needed for this request */
  requiresDestination: boolean;
}

/** Result of a full mirror run */
export interface MirrorRunResult {
  /** Whether every item finished without error */
  success: boolean;

  skipped: number;
  fresh: number;
  resumed: number;
  failed: number;

  /** Requested paths or albums that did not exist remotely */
  notFound: string[];

  /** Bytes written during this run */
  bytesWritten: number;

  /** Individual item results in processing order */
  results: FetchResult[];

  durationMs: number;

  /** Timestamp when the run started */
  startedAt: number;
}

/** Stages of a run, in the order they execute */
export type RunPhase =
  | 'drive-items'
  | 'drive-root'
  | 'list-library'
  | 'list-album'
  | 'list-albums'
  | 'photos-all'
  | 'photos-album';

/** Events emitted by the MirrorEngine */
export interface MirrorEngineEvents {
  /** A run started */
  runStart: (request: MirrorRequest) => void;

  /** A stage started; `subject` names the album for album stages */
  phase: (phase: RunPhase, subject?: string) => void;

  /** One line of a listing stage (asset label or album name) */
  listed: (label: string) => void;

  /** An item was planned; emitted before any network call */
  decision: (plan: TransferPlan) => void;

  /** Periodic progress while streaming */
  progress: (event: ProgressEvent) => void;

  /** An item finished (including skips) */
  itemComplete: (result: FetchResult) => void;

  /** An item failed; the run continues */
  itemFailed: (result: FetchResult, error: Error) => void;

  /** A requested drive path or album was missing */
  notFound: (error: NotFoundError) => void;

  /** A run finished */
  runComplete: (result: MirrorRunResult) => void;
}
