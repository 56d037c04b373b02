import { vi } from 'vitest';
import type { Logger } from '../logger.js';

export function createLoggerStub() {
  return {
    info: vi.fn<(message: string) => void>(),
    success: vi.fn<(message: string) => void>(),
    warn: vi.fn<(message: string) => void>(),
    error: vi.fn<(message: string, error?: unknown) => void>(),
  } satisfies Logger;
}
