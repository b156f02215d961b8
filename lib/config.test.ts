/**
 * Unit Tests for Service Configuration
 */

import { describe, it, expect } from 'vitest';
import { loadServiceConfig } from './config';
import { ConfigurationError } from './errors';

describe('loadServiceConfig', () => {
  it('uses defaults when nothing is set', () => {
    expect(loadServiceConfig({})).toEqual({
      maxBatchFiles: 10,
      maxUploadBytes: 20 * 1024 * 1024,
    });
  });

  it('reads overrides from the environment', () => {
    expect(
      loadServiceConfig({ MAX_BATCH_FILES: '3', MAX_UPLOAD_BYTES: ' 2048 ' })
    ).toEqual({ maxBatchFiles: 3, maxUploadBytes: 2048 });
  });

  it('treats blank values as unset', () => {
    expect(loadServiceConfig({ MAX_BATCH_FILES: '' }).maxBatchFiles).toBe(10);
  });

  it('rejects values that are not positive integers', () => {
    expect(() => loadServiceConfig({ MAX_BATCH_FILES: '0' })).toThrow(ConfigurationError);
    expect(() => loadServiceConfig({ MAX_BATCH_FILES: '2.5' })).toThrow(
      'MAX_BATCH_FILES must be a positive integer, got "2.5"'
    );
    expect(() => loadServiceConfig({ MAX_UPLOAD_BYTES: 'lots' })).toThrow(ConfigurationError);
  });
});
