/**
 * Mock logger for testing
 *
 * Every level is a vi.fn(), so tests can assert what was (not) logged.
 */

import { vi, type Mock } from 'vitest';
import type { ILogger } from '../../src/interfaces/logger.js';

export interface MockLogger extends ILogger {
  debug: Mock;
  info: Mock;
  warn: Mock;
  error: Mock;
}

export function createMockLogger(): MockLogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}
