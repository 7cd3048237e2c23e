import { vi } from 'vitest';

vi.mock('@lh/logger', () => {
  const noop = () => undefined;
  const logger: Record<string, unknown> = {
    info: vi.fn(noop),
    warn: vi.fn(noop),
    error: vi.fn(noop),
    debug: vi.fn(noop),
    trace: vi.fn(noop),
    fatal: vi.fn(noop),
  };
  logger.child = vi.fn(() => logger);
  logger.flush = vi.fn();

  return {
    makeLogger: vi.fn(() => logger),
    getLogFilePath: vi.fn(() => null),
    closeLogger: vi.fn(),
  };
});
