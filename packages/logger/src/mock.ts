/** Mock logger for testing */

import { vi, type Mock } from 'vitest';
import type { Logger } from './types.js';

type LogMethod = (event_type: string, metadata?: Record<string, unknown>) => void;

export interface MockLogger extends Logger {
  child: Mock<(metadata: Record<string, unknown>) => Logger>;
  debug: Mock<LogMethod>;
  info: Mock<LogMethod>;
  warn: Mock<LogMethod>;
  error: Mock<LogMethod>;
  fatal: Mock<LogMethod>;
}

/**
 * Creates a mock logger for testing with Vitest spy functions.
 * All methods are no-ops but can be asserted against in tests.
 * `child()` returns the same mock, so events logged by children land here too.
 *
 * @example
 * ```typescript
 * import { createMockLogger } from '@trialrun/logger/mock';
 *
 * const logger = createMockLogger();
 * const suite = new TestCase({ logger });
 *
 * await suite.run();
 *
 * expect(logger.info).toHaveBeenCalledWith('run_completed', expect.anything());
 * ```
 */
export function createMockLogger(): MockLogger {
  const mockLogger: MockLogger = {
    child: vi.fn<(metadata: Record<string, unknown>) => Logger>(),
    debug: vi.fn<LogMethod>(),
    info: vi.fn<LogMethod>(),
    warn: vi.fn<LogMethod>(),
    error: vi.fn<LogMethod>(),
    fatal: vi.fn<LogMethod>(),
  };

  mockLogger.child.mockImplementation(() => mockLogger);

  return mockLogger;
}
