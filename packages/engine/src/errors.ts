/**
 * Error taxonomy for the mirror engine.
 *
 * - NotFoundError: a requested drive path or album does not exist remotely.
 *   The request is logged and skipped; the run continues.
 * - LocalIOError: a local filesystem operation failed. Aborts the run unless
 *   the config asks for per-item resilience.
 * - TransferError: the remote stream failed to open or broke mid-download.
 *   Aborts only the current item and leaves the partial file for a resume.
 */

export type MirrorErrorCode = 'NOT_FOUND' | 'LOCAL_IO' | 'TRANSFER';

export class MirrorError extends Error {
  public readonly code: MirrorErrorCode;

  constructor(code: MirrorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MirrorError';
    this.code = code;
  }
}

export class NotFoundError extends MirrorError {
  /** Drive path or album name that was requested */
  public readonly target: string;

  constructor(target: string, message: string) {
    super('NOT_FOUND', message);
    this.name = 'NotFoundError';
    this.target = target;
  }
}

export class LocalIOError extends MirrorError {
  public readonly path: string;

  constructor(path: string, message: string, cause?: unknown) {
    super('LOCAL_IO', message, { cause });
    this.name = 'LocalIOError';
    this.path = path;
  }
}

export class TransferError extends MirrorError {
  public readonly path: string;

  constructor(path: string, message: string, cause?: unknown) {
    super('TRANSFER', message, { cause });
    this.name = 'TransferError';
    this.path = path;
  }
}

/** Extract a printable message from anything thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Node's errno code on a filesystem error, if any. */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
