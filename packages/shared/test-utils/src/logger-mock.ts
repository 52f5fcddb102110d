import { vi, type Mock } from 'vitest';

export interface MockLogger {
  info: Mock;
  warn: Mock;
  error: Mock;
  debug: Mock;
  verbose: Mock;
  log: Mock;
}

export function createMockLogger(): MockLogger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    verbose: vi.fn(),
    log: vi.fn(),
  };
}
