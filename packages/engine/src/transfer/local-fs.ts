import * as fs from 'node:fs/promises';
import { LocalIOError, errorMessage } from '../errors.js';

/** mkdir -p, reporting failures as LocalIOError. */
export async function ensureDirectory(dir: string): Promise<void> {
  try {
    await fs.mkdir(dir, { recursive: true });
  } catch (err) {
    throw new LocalIOError(dir, `Cannot create directory ${dir}: ${errorMessage(err)}`, err);
  }
}
