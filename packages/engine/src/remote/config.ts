/**
 * S3 remote store configuration builder.
 *
 * Reads from environment variables with sensible defaults.
 * All values can be overridden programmatically.
 */

export interface S3RemoteConfig {
  /** S3 bucket name */
  bucketName: string;

  /** AWS region */
  region: string;

  /** Key prefix the store lives under (e.g. "{userId}/"); '' for the bucket root */
  prefix: string;

  /** Maximum number of S3 list pages fetched per listing (safety limit) */
  maxListPages: number;
}

export const DEFAULT_S3_REMOTE_CONFIG: Omit<S3RemoteConfig, 'bucketName' | 'prefix'> = {
  region: 'us-east-1',
  maxListPages: 1000,
};

function getEnv(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function getEnvNumber(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) ? fallback : parsed;
}

/** Ensure a non-empty prefix ends with exactly one '/' and has no leading '/'. */
export function normalizePrefix(prefix: string): string {
  const trimmed = prefix.replace(/^\/+/, '').replace(/\/+$/, '');
  return trimmed ? `${trimmed}/` : '';
}

/**
 * Build S3 remote config from environment variables and optional overrides.
 *
 * Environment variables:
 * - CLOUDMIRROR_S3_BUCKET: S3 bucket name (required unless overridden)
 * - CLOUDMIRROR_S3_REGION: AWS region (default: us-east-1)
 * - CLOUDMIRROR_S3_PREFIX: Key prefix of the store (default: bucket root)
 * - CLOUDMIRROR_MAX_LIST_PAGES: List page safety limit (default: 1000)
 */
export function buildS3RemoteConfig(overrides?: Partial<S3RemoteConfig>): S3RemoteConfig {
  return {
    bucketName: overrides?.bucketName ?? getEnv('CLOUDMIRROR_S3_BUCKET', ''),
    region: overrides?.region ?? getEnv('CLOUDMIRROR_S3_REGION', DEFAULT_S3_REMOTE_CONFIG.region),
    prefix: normalizePrefix(overrides?.prefix ?? getEnv('CLOUDMIRROR_S3_PREFIX', '')),
    maxListPages:
      overrides?.maxListPages ??
      getEnvNumber('CLOUDMIRROR_MAX_LIST_PAGES', DEFAULT_S3_REMOTE_CONFIG.maxListPages),
  };
}

/**
 * Validate an S3 remote configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateS3RemoteConfig(config: S3RemoteConfig): string[] {
  const errors: string[] = [];

  if (!config.bucketName) {
    errors.push('bucketName is required');
  }

  if (!config.region) {
    errors.push('region is required');
  }

  if (config.maxListPages < 1) {
    errors.push('maxListPages must be at least 1');
  }

  return errors;
}
