/**
 * Vitest Test Setup
 *
 * Parsers and routes log progress to the console; the logs are silenced
 * here so test output stays readable. Tests that assert on logging spy
 * on the console themselves.
 */

import { vi, beforeEach, afterEach } from 'vitest';

// ============================================
// Test Lifecycle Hooks
// ============================================

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  // Clear all mocks after each test
  vi.clearAllMocks();
  vi.restoreAllMocks();
});
