/**
 * Mirror configuration builder.
 *
 * Reads from environment variables with sensible defaults.
 * All values can be overridden programmatically.
 */

import * as os from 'node:os';
import * as path from 'node:path';
import { isPathSegment } from '../remote/types.js';
import type { IOErrorPolicy } from '../transfer/types.js';
import type { MirrorConfig } from './types.js';
import { DEFAULT_MIRROR_CONFIG } from './types.js';

function getEnv(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function getEnvFlag(key: string, fallback: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  return raw === '1' || raw.toLowerCase() === 'true';
}

const VALID_IO_ERROR_POLICIES: IOErrorPolicy[] = ['abort', 'skip-item'];

function isIOErrorPolicy(value: string): value is IOErrorPolicy {
  return VALID_IO_ERROR_POLICIES.some((policy) => policy === value);
}

/** Expand a leading `~` and make the path absolute. */
export function resolveDestination(raw: string): string {
  if (!raw) return '';
  if (raw === '~') return os.homedir();
  if (raw.startsWith('~/')) return path.join(os.homedir(), raw.slice(2));
  return path.resolve(raw);
}

/**
 * Build mirror config from environment variables and optional overrides.
 *
 * Environment variables:
 * - CLOUDMIRROR_DEST: Local mirror root
 * - CLOUDMIRROR_RESUME: Resume partial downloads (1|true)
 * - CLOUDMIRROR_PROGRESS: Report per-file progress (1|true)
 * - CLOUDMIRROR_IO_ERROR_POLICY: abort|skip-item (default: abort)
 */
export function buildMirrorConfig(overrides?: Partial<MirrorConfig>): MirrorConfig {
  const envPolicy = getEnv('CLOUDMIRROR_IO_ERROR_POLICY', DEFAULT_MIRROR_CONFIG.ioErrorPolicy);
  const ioErrorPolicy =
    overrides?.ioErrorPolicy ??
    (isIOErrorPolicy(envPolicy) ? envPolicy : DEFAULT_MIRROR_CONFIG.ioErrorPolicy);

  return {
    destination: resolveDestination(overrides?.destination ?? getEnv('CLOUDMIRROR_DEST', '')),
    resume: overrides?.resume ?? getEnvFlag('CLOUDMIRROR_RESUME', DEFAULT_MIRROR_CONFIG.resume),
    progress:
      overrides?.progress ?? getEnvFlag('CLOUDMIRROR_PROGRESS', DEFAULT_MIRROR_CONFIG.progress),
    ioErrorPolicy,
    photosDirName: overrides?.photosDirName ?? DEFAULT_MIRROR_CONFIG.photosDirName,
  };
}

/**
 * Validate a mirror configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateMirrorConfig(config: MirrorConfig): string[] {
  const errors: string[] = [];

  if (config.destination && !path.isAbsolute(config.destination)) {
    errors.push('destination must be an absolute path');
  }

  if (!isIOErrorPolicy(config.ioErrorPolicy)) {
    errors.push(`ioErrorPolicy must be one of: ${VALID_IO_ERROR_POLICIES.join(', ')}`);
  }

  if (!config.photosDirName) {
    errors.push('photosDirName is required');
  } else if (!isPathSegment(config.photosDirName)) {
    errors.push('photosDirName must be a single path segment');
  }

  return errors;
}
