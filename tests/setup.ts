/**
 * Vitest setup file
 * Runs before all tests
 */

import { afterEach, vi } from 'vitest';

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});
