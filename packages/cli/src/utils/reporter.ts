/**
 * Console rendering of mirror engine events.
 */

import chalk from 'chalk';
import type { ChalkInstance } from 'chalk';
import type {
  FetchResult,
  MirrorEngine,
  NotFoundError,
  ProgressEvent,
  RunPhase,
  TransferPlan,
} from '@cloudmirror/engine';

export interface ReporterOutput {
  /** Normal output (stdout) */
  log: (line: string) => void;

  /** Error output (stderr) */
  error: (line: string) => void;

  color: ChalkInstance;
}

const PHASE_MESSAGES: Record<RunPhase, (subject?: string) => string> = {
  'drive-items': () => 'Downloading specified items…',
  'drive-root': () => 'Mirroring drive root…',
  'list-library': () => 'Listing all photos:',
  'list-album': (subject) => `Listing album: ${subject ?? ''}`,
  'list-albums': () => 'Listing all albums:',
  'photos-all': () => 'Downloading all photos (this may take a while)…',
  'photos-album': (subject) => `Downloading album: ${subject ?? ''}`,
};

/** One line describing a planned transfer, printed when it is decided. */
export function formatDecision(plan: TransferPlan): string {
  switch (plan.decision) {
    case 'skip':
      return `[skip] ${plan.destinationPath} (size matches)`;
    case 'resume':
      return `[resume] ${plan.destinationPath} (${plan.existingLocalSize}/${plan.expectedSize ?? '?'} bytes)`;
    case 'fresh':
      return plan.expectedSize === undefined
        ? `[get ] ${plan.destinationPath}`
        : `[get ] ${plan.destinationPath} (${plan.expectedSize} bytes)`;
  }
}

export function formatProgress(event: ProgressEvent): string {
  const total = event.expectedSize ?? '?';
  const percent = event.percent === undefined ? '' : ` (${event.percent.toFixed(1)}%)`;
  return `  ${event.label}: ${event.bytesWritten}/${total} bytes${percent}`;
}

export function formatFailure(result: FetchResult): string {
  return `[fail] ${result.destinationPath}: ${result.error ?? 'unknown error'}`;
}

export function defaultOutput(): ReporterOutput {
  return {
    log: (line) => console.log(line),
    error: (line) => console.error(line),
    color: chalk,
  };
}

/** Print engine events as they happen. */
export function attachReporter(engine: MirrorEngine, output: ReporterOutput): void {
  const { log, error, color } = output;

  engine.on('phase', (phase: RunPhase, subject?: string) => {
    log(color.blue(PHASE_MESSAGES[phase](subject)));
  });

  engine.on('listed', (label: string) => {
    log(label);
  });

  engine.on('decision', (plan: TransferPlan) => {
    const line = formatDecision(plan);
    log(plan.decision === 'skip' ? color.dim(line) : line);
    if (plan.decision === 'fresh' && plan.oversized) {
      error(
        color.yellow(
          `  local copy is larger than remote (${plan.existingLocalSize} > ${plan.expectedSize ?? '?'}); overwriting`
        )
      );
    }
  });

  engine.on('progress', (event: ProgressEvent) => {
    log(color.dim(formatProgress(event)));
  });

  engine.on('itemFailed', (result: FetchResult) => {
    error(color.red(formatFailure(result)));
  });

  engine.on('notFound', (err: NotFoundError) => {
    error(color.red(err.message));
  });
}
