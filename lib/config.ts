/**
 * Service configuration read from environment variables.
 */

import { ConfigurationError } from './errors';

export interface ServiceConfig {
  /** Maximum number of files accepted by one batch request */
  maxBatchFiles: number;

  /** Maximum size of a single uploaded PDF, in bytes */
  maxUploadBytes: number;
}

const DEFAULT_MAX_BATCH_FILES = 10;
const DEFAULT_MAX_UPLOAD_BYTES = 20 * 1024 * 1024;

function readPositiveInt(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number
): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(
      `${key} must be a positive integer, got "${raw}"`
    );
  }
  return value;
}

/**
 * Build the service configuration from the given environment.
 */
export function loadServiceConfig(
  env: NodeJS.ProcessEnv = process.env
): ServiceConfig {
  return {
    maxBatchFiles: readPositiveInt(env, 'MAX_BATCH_FILES', DEFAULT_MAX_BATCH_FILES),
    maxUploadBytes: readPositiveInt(env, 'MAX_UPLOAD_BYTES', DEFAULT_MAX_UPLOAD_BYTES),
  };
}
