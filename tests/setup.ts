/**
 * tests/setup.ts
 * Global test setup file for vitest
 *
 * No test touches the disk or the network unless it asks to: file logging is
 * off, and tests that need HTTP stub the global fetch through
 * tests/utils/mock-fetch.ts.
 */

import { afterEach, vi } from 'vitest';

process.env.DISABLE_FILE_LOGGING = 'true';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';

afterEach(() => {
  vi.unstubAllGlobals();
  vi.unstubAllEnvs();
  vi.clearAllMocks();
});
