/** Mock logger for testing */

import { vi } from 'vitest';
import type { Logger } from './types.js';

export interface MockLogger extends Logger {
  child: ReturnType<typeof vi.fn>;
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
  fatal: ReturnType<typeof vi.fn>;
}

/**
 * Creates a mock logger for testing with Vitest spy functions.
 * All methods are no-ops but can be asserted against in tests.
 *
 * @example
 * ```typescript
 * import { createMockLogger } from '@recordkit/logger/mock';
 *
 * const logger = createMockLogger();
 * const engine = createEngine({ logger });
 *
 * engine.validate('station', { ...validStation, crew_size: 25 });
 *
 * expect(logger.info).toHaveBeenCalledWith('record_rejected', {
 *   record_kind: 'station',
 *   phase: 'fields',
 *   violation_count: 1,
 * });
 * ```
 */
export function createMockLogger(): MockLogger {
  const mockLogger: MockLogger = {
    child: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  };

  // child() returns a fresh mock so nested loggers stay assertable
  mockLogger.child.mockImplementation(() => createMockLogger());

  return mockLogger;
}
