import { vi } from 'vitest';

export function createLogSink() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export type MockLogSink = ReturnType<typeof createLogSink>;
