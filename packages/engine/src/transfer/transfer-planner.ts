/**
 * Transfer planner.
 *
 * Decides, from one stat of the destination and the remote's reported size,
 * whether an item is skipped, downloaded from scratch, or resumed with a
 * byte range.
 */

import * as fs from 'node:fs/promises';
import { LocalIOError, errnoCode, errorMessage } from '../errors.js';
import type { TransferPlan } from './types.js';

interface LocalState {
  exists: boolean;
  size: number;
}

async function statDestination(destinationPath: string): Promise<LocalState> {
  try {
    const stat = await fs.stat(destinationPath);
    return { exists: true, size: stat.size };
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      return { exists: false, size: 0 };
    }
    throw new LocalIOError(
      destinationPath,
      `Cannot stat ${destinationPath}: ${errorMessage(err)}`,
      err
    );
  }
}

/**
 * Plan the transfer of one item.
 *
 * Decision table, first match wins:
 * 1. destination exists, size known and equal       -> skip
 * 2. resume on, size known, 0 < local < expected    -> resume at local size
 * 3. otherwise                                      -> fresh (overwrites)
 */
export async function planTransfer(
  destinationPath: string,
  expectedSize: number | undefined,
  resumeEnabled: boolean
): Promise<TransferPlan> {
  const local = await statDestination(destinationPath);
  const base = {
    destinationPath,
    exists: local.exists,
    existingLocalSize: local.size,
    expectedSize,
  };

  if (expectedSize === undefined) {
    return { ...base, decision: 'fresh', oversized: false };
  }

  if (local.exists && local.size === expectedSize) {
    return { ...base, decision: 'skip' };
  }

  if (resumeEnabled && local.exists && local.size > 0 && local.size < expectedSize) {
    return { ...base, decision: 'resume', rangeOffset: local.size };
  }

  return { ...base, decision: 'fresh', oversized: local.exists && local.size > expectedSize };
}
