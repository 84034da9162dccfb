/**
 * Test setup file for Vitest.
 * Runs before each test file.
 */
import { vi, afterEach } from 'vitest';

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
  vi.unstubAllGlobals();
});

// Keep library logging out of test output unless asked for
process.env['LOG_LEVEL'] = process.env['TEST_LOG_LEVEL'] ?? 'error';
