import { vi } from 'vitest';
import type { Logger } from '@tagship/shared';

export function createMockLogger(): Logger {
  const logger: Logger = {
    log: vi.fn(),
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
}
