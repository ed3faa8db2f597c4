/**
 * Root test setup file
 *
 * Runs before every test file. Winston's console transport is already
 * silent under Vitest; this also keeps stray console output out of the
 * reporter.
 */

import { vi } from 'vitest';

process.env.NODE_ENV = 'test';

global.console = {
  ...console,
  log: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};
