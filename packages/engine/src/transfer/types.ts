/**
 * Types for the per-item transfer pipeline:
 * plan (skip / fresh / resume) -> open remote stream -> write to disk.
 */

export type TransferDecision = 'skip' | 'fresh' | 'resume';

/** How the byte sink opens the destination */
export type WriteMode = 'truncate' | 'append';

interface TransferPlanBase {
  /** Absolute local path the item is written to */
  destinationPath: string;

  /** Whether the destination existed when planned */
  exists: boolean;

  /** Size of the destination when planned (0 if absent) */
  existingLocalSize: number;

  /** Size reported by the remote; absent when unknown */
  expectedSize?: number;
}

export interface SkipPlan extends TransferPlanBase {
  decision: 'skip';
}

export interface FreshPlan extends TransferPlanBase {
  decision: 'fresh';

  /** Local copy is larger than the remote reports and will be overwritten */
  oversized: boolean;
}

export interface ResumePlan extends TransferPlanBase {
  decision: 'resume';

  /** Byte offset to request from the remote (equals existingLocalSize) */
  rangeOffset: number;
}

/** Decision record computed right before each transfer attempt */
export type TransferPlan = SkipPlan | FreshPlan | ResumePlan;

/** Periodic, purely informational progress record */
export interface ProgressEvent {
  /** Short label, usually the destination file name */
  label: string;

  destinationPath: string;

  /** Cumulative bytes on disk, including bytes present before a resume */
  bytesWritten: number;

  expectedSize?: number;

  /** Percentage of expectedSize, when known */
  percent?: number;
}

/** Result of fetching a single drive file or media asset */
export interface FetchResult {
  destinationPath: string;

  /** Decision that was acted on */
  decision: TransferDecision;

  /** Whether the item ended up fully handled */
  success: boolean;

  /** Bytes written during this attempt (0 for a skip) */
  bytesWritten: number;

  /** Duration of the attempt in milliseconds */
  durationMs: number;

  /** Error message if the attempt failed */
  error?: string;
}

/** Sink for engine observations; implemented by MirrorEngine */
export interface TransferReporter {
  decision(plan: TransferPlan): void;
  progress(event: ProgressEvent): void;
  itemComplete(result: FetchResult): void;
  itemFailed(result: FetchResult, error: Error): void;
}

/** What to do when a local filesystem operation fails mid-item */
export type IOErrorPolicy = 'abort' | 'skip-item';

/** Per-run switches consumed by the item fetcher */
export interface FetchOptions {
  /** Continue partial files with a byte-range request */
  resume: boolean;

  /** Emit progress events while streaming */
  progress: boolean;

  /** 'abort' ends the run on a local IO error; 'skip-item' moves on */
  ioErrorPolicy: IOErrorPolicy;
}
